/**
 * Municipal Forecast Pipeline — Collector
 *
 * One update cycle: fetch the forecast, flatten it, merge it into the stored
 * raw dataset and write the dataset back, sorted by forecast date and hour.
 */
/* eslint-disable no-console */

import path from 'node:path';
import { rawTable } from '../clean';
import { concatTables, dropColumns, withColumn } from '../table';
import { formatDayFirstDate, formatFileStamp, parseCalendarDate } from '../time';
import type { Cell, Row, Table } from '../types';
import type { RawForecastSource } from './fetcher';
import { parseForecastPayload } from './parser';
import { isPermissionError, type TableStore } from './storage';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_MUNICIPALITY_CODE = '28079';
export const DEFAULT_DATASET_FILE = 'madrid_weather_forecast.csv';

export interface CollectorConfig {
    /** INE municipality code (default: 28079, Madrid) */
    municipalityCode?: string;
    /** Directory holding the dataset */
    dataDir: string;
    /** Dataset file name inside dataDir */
    fileName?: string;
}

export interface CollectorDeps {
    source: RawForecastSource;
    store: TableStore;
    /** Override the clock (collection timestamps, fallback file names) */
    now?: () => Date;
}

export type UpdateResult =
    | { ok: true; path: string; rowCount: number; fetchedRows: number }
    | { ok: false; reason: string };

const MERGE_KEY = 'unique_id';

// =============================================================================
// Merge Helpers
// =============================================================================

function dateKey(value: Cell): string {
    if (typeof value === 'string') {
        const parsed = parseCalendarDate(value);
        return parsed ? formatDayFirstDate(parsed) : value;
    }
    return value instanceof Date ? formatDayFirstDate(value) : String(value);
}

function hourKey(value: Cell): string {
    const hour = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof hour === 'number' && Number.isFinite(hour) ? String(hour) : String(value);
}

/**
 * Merge key of a raw row: `<dd/mm/yyyy>_<hour>`.
 */
export function mergeKey(row: Row): string {
    return `${dateKey(row.date)}_${hourKey(row.hour)}`;
}

/**
 * Replace stored rows that share a forecast date and hour with the fresh ones.
 */
export function mergeForecasts(existing: Table, incoming: Table): Table {
    const fresh = withColumn(incoming, MERGE_KEY, (row) => mergeKey(row));
    const freshKeys = new Set(fresh.rows.map((row) => row[MERGE_KEY]));
    const stored = withColumn(existing, MERGE_KEY, (row) => mergeKey(row));
    const kept: Table = {
        columns: stored.columns,
        rows: stored.rows.filter((row) => !freshKeys.has(row[MERGE_KEY]))
    };
    return dropColumns(concatTables(kept, fresh), [MERGE_KEY]);
}

/**
 * Stable sort by forecast date, then hour. Dates are written back as `dd/mm/yyyy`.
 * Throws if a row's date cannot be parsed.
 */
export function sortByForecastTime(table: Table): Table {
    const keyed = table.rows.map((row, index) => {
        const date = typeof row.date === 'string' ? parseCalendarDate(row.date) : null;
        if (!date) {
            throw new Error(`Unparseable date at row ${index}: ${String(row.date)}`);
        }
        const hour = Number(row.hour);
        return { row: { ...row, date: formatDayFirstDate(date) }, time: date.getTime(), hour };
    });
    keyed.sort((a, b) => a.time - b.time || a.hour - b.hour);
    return { columns: [...table.columns], rows: keyed.map(({ row }) => row) };
}

// =============================================================================
// Collector
// =============================================================================

export class ForecastCollector {
    readonly municipalityCode: string;
    private readonly dataDir: string;
    private readonly fileName: string;
    private readonly source: RawForecastSource;
    private readonly store: TableStore;
    private readonly now: () => Date;
    private csvPath: string;

    constructor(config: CollectorConfig, deps: CollectorDeps) {
        this.municipalityCode = config.municipalityCode ?? DEFAULT_MUNICIPALITY_CODE;
        this.dataDir = config.dataDir;
        this.fileName = config.fileName ?? DEFAULT_DATASET_FILE;
        this.source = deps.source;
        this.store = deps.store;
        this.now = deps.now ?? (() => new Date());
        this.csvPath = path.join(this.dataDir, this.fileName);

        console.log(`[collector] Collector ready for municipality ${this.municipalityCode}`);
        console.log(`[collector] Dataset: ${this.csvPath}`);
    }

    /** Where the dataset is currently written. Changes after a permission fallback. */
    get datasetPath(): string {
        return this.csvPath;
    }

    /** `<stem>_YYYYMMDD_HHMMSS.csv` beside the dataset. */
    fallbackPath(): string {
        const { name, ext } = path.parse(this.fileName);
        return path.join(this.dataDir, `${name}_${formatFileStamp(this.now())}${ext || '.csv'}`);
    }

    /**
     * Run one update cycle. Never throws; failures come back as `{ ok: false }`.
     */
    async updateDataset(): Promise<UpdateResult> {
        try {
            console.log('[collector] Fetching forecast...');
            let payload: unknown;
            try {
                payload = await this.source.fetchRawForecast(this.municipalityCode);
            } catch (error) {
                return this.fail(`Fetch failed: ${describe(error)}`);
            }

            console.log('[collector] Parsing forecast...');
            const records = parseForecastPayload(payload, this.now());
            if (records.length === 0) {
                return this.fail('Forecast contained no hourly rows');
            }
            const incoming = rawTable(records);

            const existing = await this.loadExisting();
            const merged = mergeForecasts(existing ?? emptyLike(incoming), incoming);

            console.log('[collector] Sorting by forecast date and hour...');
            const sorted = sortByForecastTime(merged);

            const savedTo = await this.save(sorted);
            if (!savedTo) {
                return this.fail(`Could not save ${this.csvPath}`);
            }

            console.log(`[collector] Dataset updated: ${savedTo}`);
            console.log(`[collector] Total rows: ${sorted.rows.length}`);
            return { ok: true, path: savedTo, rowCount: sorted.rows.length, fetchedRows: records.length };
        } catch (error) {
            return this.fail(`Update failed: ${describe(error)}`);
        }
    }

    private async loadExisting(): Promise<Table | null> {
        try {
            const existing = await this.store.load(this.csvPath);
            if (existing) {
                console.log(`[collector] Updating existing dataset: ${this.csvPath}`);
            } else {
                console.log('[collector] Creating new dataset');
            }
            return existing;
        } catch (error) {
            if (isPermissionError(error)) {
                console.error(`[collector] Permission denied reading ${this.csvPath}`);
                this.csvPath = this.fallbackPath();
                console.log(`[collector] Writing to new file: ${this.csvPath}`);
            } else {
                console.error(`[collector] Failed to read existing dataset: ${describe(error)}`);
            }
            return null;
        }
    }

    /**
     * Save to the dataset path; on a permission failure, retry once at a
     * timestamped file. Returns the path written, or null.
     */
    private async save(table: Table): Promise<string | null> {
        try {
            await this.store.save(table, this.csvPath);
            return this.csvPath;
        } catch (error) {
            if (!isPermissionError(error)) {
                console.error(`[collector] Failed to save dataset: ${describe(error)}`);
                return null;
            }
        }

        const backupPath = this.fallbackPath();
        try {
            await this.store.save(table, backupPath);
            console.warn(`[collector] Permission denied for ${this.csvPath}. Saved to: ${backupPath}`);
            return backupPath;
        } catch (error) {
            console.error(`[collector] Failed to save fallback dataset: ${describe(error)}`);
            return null;
        }
    }

    private fail(reason: string): UpdateResult {
        console.error(`[collector] ${reason}`);
        return { ok: false, reason };
    }
}

function emptyLike(table: Table): Table {
    return { columns: [...table.columns], rows: [] };
}

function describe(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
