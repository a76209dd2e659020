/**
 * Municipal Forecast Pipeline — Dataset Summary
 *
 * Descriptive statistics of a clean table, for reports and the status API.
 */

import { formatDateTime } from './time';
import type { CleanRecord, CleanTable, WindStatus } from './types';

export interface ValueCount {
    value: string;
    count: number;
}

export interface DatasetSummary {
    rowCount: number;
    /** `yyyy-mm-dd HH:MM:SS`, or null for an empty table */
    firstDatetime: string | null;
    lastDatetime: string | null;
    meanTemperature: number | null;
    meanHumidity: number | null;
    meanWindSpeed: number | null;
    windStatusCounts: Record<WindStatus, number>;
    /** Most frequent sky conditions, highest count first (ties alphabetical) */
    topSkyConditions: ValueCount[];
}

/**
 * Mean of the non-null values, or null when there are none.
 */
export function mean(values: readonly (number | null)[]): number | null {
    let sum = 0;
    let count = 0;
    for (const value of values) {
        if (value === null) continue;
        sum += value;
        count++;
    }
    return count > 0 ? sum / count : null;
}

/**
 * Count non-null values, highest count first.
 */
export function valueCounts(values: readonly (string | null)[]): ValueCount[] {
    const counts = new Map<string, number>();
    for (const value of values) {
        if (value === null) continue;
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([value, count]) => ({ value, count }))
        .sort((a, b) => b.count - a.count || a.value.localeCompare(b.value));
}

export function summarize(table: CleanTable, topSkyLimit = 3): DatasetSummary {
    const rows = table.rows;
    const times = rows.map((row) => row.datetime.getTime());
    const column = <K extends keyof CleanRecord>(key: K): CleanRecord[K][] => rows.map((row) => row[key]);

    const windStatusCounts: Record<WindStatus, number> = { calm: 0, 'with wind': 0 };
    for (const row of rows) {
        windStatusCounts[row.wind_status]++;
    }

    return {
        rowCount: rows.length,
        firstDatetime: times.length > 0 ? formatDateTime(new Date(times.reduce((a, b) => Math.min(a, b)))) : null,
        lastDatetime: times.length > 0 ? formatDateTime(new Date(times.reduce((a, b) => Math.max(a, b)))) : null,
        meanTemperature: mean(column('temperature')),
        meanHumidity: mean(column('humidity')),
        meanWindSpeed: mean(column('wind_speed')),
        windStatusCounts,
        topSkyConditions: valueCounts(column('sky_condition')).slice(0, topSkyLimit)
    };
}

/**
 * Render a summary as console lines.
 */
export function formatSummary(summary: DatasetSummary): string[] {
    const fixed = (value: number | null, unit: string): string =>
        value === null ? 'n/a' : `${value.toFixed(1)}${unit}`;

    return [
        `Rows: ${summary.rowCount}`,
        `Date range: ${summary.firstDatetime ?? 'n/a'} to ${summary.lastDatetime ?? 'n/a'}`,
        `Mean temperature: ${fixed(summary.meanTemperature, '°C')}`,
        `Mean humidity: ${fixed(summary.meanHumidity, '%')}`,
        `Mean wind speed: ${fixed(summary.meanWindSpeed, ' km/h')}`,
        `Wind status: calm=${summary.windStatusCounts.calm}, with wind=${summary.windStatusCounts['with wind']}`,
        `Top sky conditions: ${summary.topSkyConditions.map(({ value, count }) => `${value} (${count})`).join(', ') || 'n/a'}`
    ];
}
