/**
 * Municipal Forecast Pipeline — Cleaning Orchestrator
 *
 * Threads a raw table through every stage once, in a fixed order. Stage errors
 * propagate to the caller unchanged; there is no partial output.
 */

import { normalizeTypes, unifyDateTime } from './convert';
import { deduplicate } from './dedupe';
import { ParseError, SchemaError } from './errors';
import { normalizeColumnNames } from './schema';
import { tagWindStatus } from './status';
import { dropColumns, moveColumnFirst, selectColumns, tableFromRecords } from './table';
import { translateSkyCondition, translateWindDirection } from './translate';
import {
    CANONICAL_RENAMES,
    CLEAN_COLUMNS,
    RAW_COLUMNS,
    type Cell,
    type CleanRecord,
    type CleanTable,
    type RawRecord,
    type Table
} from './types';

/**
 * Build the pre-cleaning table from parsed raw records.
 */
export function rawTable(records: readonly RawRecord[]): Table {
    return tableFromRecords(records, RAW_COLUMNS);
}

/**
 * Run the full cleaning pipeline:
 * 1. Translate wind direction and sky condition
 * 2. Drop the raw wind, sky and collection timestamp columns
 * 3. Normalize types
 * 4. Combine date and hour into `datetime`, then drop them
 * 5. Put `datetime` first
 * 6. Rename the working columns to the canonical schema
 * 7. Tag wind status
 * 8. Remove exact duplicates
 */
export function clean(raw: Table): CleanTable {
    let table = translateWindDirection(raw);
    table = translateSkyCondition(table);
    table = dropColumns(table, ['wind_direction', 'sky_condition', 'timestamp']);
    table = normalizeTypes(table);
    table = unifyDateTime(table);
    table = dropColumns(table, ['date', 'hour']);
    table = moveColumnFirst(table, 'datetime');
    table = normalizeColumnNames(table, CANONICAL_RENAMES);
    table = tagWindStatus(table);
    const { table: unique } = deduplicate(table);
    return toCleanTable(unique);
}

// =============================================================================
// Output Narrowing
// =============================================================================

/**
 * Check a table against the canonical schema and return it with typed rows,
 * in canonical column order. Missing or extra columns are a SchemaError.
 */
export function toCleanTable(input: Table): CleanTable {
    const expected = new Set<string>(CLEAN_COLUMNS);
    const extra = input.columns.filter((column) => !expected.has(column));
    const missing = CLEAN_COLUMNS.filter((column) => !input.columns.includes(column));
    if (extra.length > 0 || missing.length > 0) {
        throw new SchemaError(
            `toCleanTable: expected columns [${CLEAN_COLUMNS.join(', ')}], got [${input.columns.join(', ')}]`,
            'toCleanTable',
            [...missing, ...extra]
        );
    }
    const table = selectColumns(input, CLEAN_COLUMNS);

    const rows = table.rows.map((row, index): CleanRecord => {
        const status = row.wind_status;
        if (status !== 'calm' && status !== 'with wind') {
            throw new ParseError(`Invalid wind status at row ${index}: ${String(status)}`, 'wind_status', index, status);
        }
        return {
            datetime: dateOf(row.datetime, 'datetime', index),
            temperature: numberOrNull(row.temperature, 'temperature', index),
            humidity: numberOrNull(row.humidity, 'humidity', index),
            wind_speed: numberOrNull(row.wind_speed, 'wind_speed', index),
            wind_direction: textOrNull(row.wind_direction, 'wind_direction', index),
            wind_direction_degrees: numberOrNull(row.wind_direction_degrees, 'wind_direction_degrees', index),
            sky_condition: textOrNull(row.sky_condition, 'sky_condition', index),
            wind_status: status
        };
    });

    return { columns: [...CLEAN_COLUMNS], rows };
}

function dateOf(value: Cell, column: string, row: number): Date {
    if (value instanceof Date) return value;
    throw new ParseError(`Expected a datetime in '${column}' at row ${row}: ${String(value)}`, column, row, value);
}

function numberOrNull(value: Cell, column: string, row: number): number | null {
    if (value === null || typeof value === 'number') return value;
    throw new ParseError(`Expected a number in '${column}' at row ${row}: ${String(value)}`, column, row, value);
}

function textOrNull(value: Cell, column: string, row: number): string | null {
    if (value === null || typeof value === 'string') return value;
    throw new ParseError(`Expected text in '${column}' at row ${row}: ${String(value)}`, column, row, value);
}
