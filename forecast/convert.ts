/**
 * Municipal Forecast Pipeline — Type Normalizer & Temporal Unifier
 *
 * Coerces raw cells to their canonical types. A value that cannot be parsed is
 * a ParseError naming the column and row; nothing is silently turned into null.
 * Cells that are already missing (null or blank) stay missing.
 */

import { ParseError } from './errors';
import { requireColumns, withColumn } from './table';
import { combineDateAndHour, formatHourSlot, parseCalendarDate, parseHourSlot } from './time';
import { WIND_DEGREES_COLUMN, type Cell, type Row, type Table } from './types';

export const MEASUREMENT_COLUMNS = ['temperature', 'humidity', 'wind_speed'] as const;

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^\d{1,2}$/;

// =============================================================================
// Cell Parsers
// =============================================================================

export function parseDateCell(value: Cell, column: string, row: number): Date {
    if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
            throw new ParseError(`Invalid date in '${column}' at row ${row}`, column, row, value);
        }
        return value;
    }
    const parsed = typeof value === 'string' ? parseCalendarDate(value) : null;
    if (!parsed) {
        throw new ParseError(
            `Unparseable date in '${column}' at row ${row}: ${String(value)}`,
            column,
            row,
            value
        );
    }
    return parsed;
}

/**
 * Accepts an integer 0–23, an integer-looking string, or an existing `HH:00` slot.
 */
export function parseHourCell(value: Cell, column: string, row: number): number {
    let hour: number | null = null;
    if (typeof value === 'number') {
        hour = Number.isInteger(value) ? value : null;
    } else if (typeof value === 'string') {
        const text = value.trim();
        hour = INTEGER.test(text) ? Number(text) : parseHourSlot(text);
    }
    if (hour === null || hour < 0 || hour > 23) {
        throw new ParseError(
            `Invalid hour in '${column}' at row ${row}: ${String(value)}`,
            column,
            row,
            value
        );
    }
    return hour;
}

/**
 * Parse a measurement to a float. Null and blank cells are missing values.
 */
export function parseFloatCell(value: Cell, column: string, row: number): number | null {
    if (value === null) return null;

    let parsed = Number.NaN;
    if (typeof value === 'number') {
        parsed = value;
    } else if (typeof value === 'string') {
        const text = value.trim();
        if (text === '') return null;
        if (DECIMAL.test(text)) parsed = Number(text);
    }

    if (!Number.isFinite(parsed)) {
        throw new ParseError(
            `Non-numeric value in '${column}' at row ${row}: ${String(value)}`,
            column,
            row,
            value
        );
    }
    return parsed;
}

// =============================================================================
// Stages
// =============================================================================

/**
 * Normalize column types:
 * - `date` → calendar Date
 * - `hour` → `HH:00`
 * - measurements (and `wind_direction_grados` when present) → float
 */
export function normalizeTypes(table: Table): Table {
    requireColumns(table, ['date', 'hour', ...MEASUREMENT_COLUMNS], 'normalizeTypes');
    const hasDegrees = table.columns.includes(WIND_DEGREES_COLUMN);

    const rows = table.rows.map((row, index): Row => {
        const normalized: Row = {
            ...row,
            date: parseDateCell(row.date, 'date', index),
            hour: formatHourSlot(parseHourCell(row.hour, 'hour', index))
        };
        for (const column of MEASUREMENT_COLUMNS) {
            normalized[column] = parseFloatCell(row[column], column, index);
        }
        if (hasDegrees) {
            normalized[WIND_DEGREES_COLUMN] = parseFloatCell(row[WIND_DEGREES_COLUMN], WIND_DEGREES_COLUMN, index);
        }
        return normalized;
    });

    return { columns: [...table.columns], rows };
}

/**
 * Add a `datetime` column combining `date` and the `HH:00` hour slot.
 *
 * Expects normalized input: `date` must already be a Date and `hour` a
 * zero-padded slot. Loosely formatted values are rejected, not reinterpreted.
 */
export function unifyDateTime(table: Table): Table {
    requireColumns(table, ['date', 'hour'], 'unifyDateTime');

    return withColumn(table, 'datetime', (row, index) => {
        const date = row.date;
        if (!(date instanceof Date)) {
            throw new ParseError(
                `Expected a calendar date in 'date' at row ${index}: ${String(date)}`,
                'date',
                index,
                date
            );
        }
        const hour = typeof row.hour === 'string' ? parseHourSlot(row.hour) : null;
        if (hour === null) {
            throw new ParseError(
                `Expected an HH:00 slot in 'hour' at row ${index}: ${String(row.hour)}`,
                'hour',
                index,
                row.hour
            );
        }
        return combineDateAndHour(date, hour);
    });
}
