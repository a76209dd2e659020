/**
 * Municipal Forecast Pipeline — Outlier Detector
 *
 * Diagnostic only: `clean()` never calls this. It reports physically
 * implausible readings for inspection and leaves removal to the caller.
 */

import { ParseError } from './errors';
import { requireColumns } from './table';
import type { Cell, Row, Table } from './types';

export const OUTLIER_LIMITS = {
    minTemperature: -10,
    maxTemperature: 50,
    minHumidity: 0,
    maxHumidity: 100,
    minWindSpeed: 0
} as const;

function numeric(value: Cell, column: string, row: number): number | null {
    if (value === null) return null;
    if (typeof value !== 'number') {
        throw new ParseError(
            `Outlier detection needs numeric '${column}' at row ${row}: ${String(value)}`,
            column,
            row,
            value
        );
    }
    return value;
}

export function isOutlier(row: Row, index = 0): boolean {
    const temperature = numeric(row.temperature, 'temperature', index);
    const humidity = numeric(row.humidity, 'humidity', index);
    const windSpeed = numeric(row.wind_speed, 'wind_speed', index);

    // Missing readings never flag a row.
    return (
        (temperature !== null &&
            (temperature < OUTLIER_LIMITS.minTemperature || temperature > OUTLIER_LIMITS.maxTemperature)) ||
        (humidity !== null && (humidity < OUTLIER_LIMITS.minHumidity || humidity > OUTLIER_LIMITS.maxHumidity)) ||
        (windSpeed !== null && windSpeed < OUTLIER_LIMITS.minWindSpeed)
    );
}

/**
 * Positions of the rows holding at least one implausible reading.
 */
export function outlierIndices(table: Table): number[] {
    requireColumns(table, ['temperature', 'humidity', 'wind_speed'], 'detectOutliers');
    const indices: number[] = [];
    table.rows.forEach((row, index) => {
        if (isOutlier(row, index)) indices.push(index);
    });
    return indices;
}

/**
 * The subset of rows with temperature outside [-10, 50] °C, humidity outside
 * [0, 100] %, or negative wind speed.
 */
export function detectOutliers<R extends Row>(table: Table<R>): Table<R> {
    const flagged = new Set(outlierIndices(table));
    return {
        columns: [...table.columns],
        rows: table.rows.filter((_row, index) => flagged.has(index))
    };
}
