/**
 * Municipal Forecast Pipeline — Table Operations
 *
 * Column-level helpers shared by the pipeline stages. All functions return
 * new tables and new row objects.
 */

import { SchemaError } from './errors';
import type { Cell, Row, Table } from './types';

/**
 * Build a table from plain records.
 * Missing cells are filled with null so every row carries every column.
 */
export function tableFromRecords(records: readonly Row[], columns: readonly string[]): Table {
    assertUniqueColumns(columns, 'tableFromRecords');
    return {
        columns: [...columns],
        rows: records.map((record) => pick(record, columns))
    };
}

/**
 * Throw a SchemaError unless every required column is present.
 */
export function requireColumns(table: Table, required: readonly string[], stage: string): void {
    const present = new Set(table.columns);
    const missing = required.filter((column) => !present.has(column));
    if (missing.length > 0) {
        throw new SchemaError(`${stage}: missing column(s) ${missing.join(', ')}`, stage, missing);
    }
}

/**
 * Remove columns from a table.
 *
 * Strict: asking for a column the table does not have is a SchemaError.
 */
export function dropColumns(table: Table, names: readonly string[]): Table {
    requireColumns(table, names, 'dropColumns');
    const dropped = new Set(names);
    const columns = table.columns.filter((column) => !dropped.has(column));
    return {
        columns,
        rows: table.rows.map((row) => pick(row, columns))
    };
}

/**
 * Reorder a table to exactly the given columns.
 * A missing column is a SchemaError; columns not named are left out.
 */
export function selectColumns(table: Table, names: readonly string[]): Table {
    requireColumns(table, names, 'selectColumns');
    assertUniqueColumns(names, 'selectColumns');
    return {
        columns: [...names],
        rows: table.rows.map((row) => pick(row, names))
    };
}

/**
 * Move one column to position 0, keeping the relative order of the rest.
 */
export function moveColumnFirst(table: Table, name: string): Table {
    requireColumns(table, [name], 'moveColumnFirst');
    const columns = [name, ...table.columns.filter((column) => column !== name)];
    return {
        columns,
        rows: table.rows.map((row) => pick(row, columns))
    };
}

/**
 * Set (or append) a column whose value is computed per row.
 */
export function withColumn(
    table: Table,
    name: string,
    compute: (row: Row, index: number) => Cell
): Table {
    const columns = table.columns.includes(name) ? [...table.columns] : [...table.columns, name];
    return {
        columns,
        rows: table.rows.map((row, index) => ({ ...row, [name]: compute(row, index) }))
    };
}

/**
 * Stack two tables. Columns are the union (first table's order, then any new
 * columns of the second); cells a table lacks are null.
 */
export function concatTables(first: Table, second: Table): Table {
    const columns = [...first.columns, ...second.columns.filter((column) => !first.columns.includes(column))];
    return {
        columns,
        rows: [...first.rows, ...second.rows].map((row) => pick(row, columns))
    };
}

/**
 * Throw a SchemaError if a column name appears more than once.
 */
export function assertUniqueColumns(columns: readonly string[], stage: string): void {
    const seen = new Set<string>();
    const duplicated = new Set<string>();
    for (const column of columns) {
        if (seen.has(column)) duplicated.add(column);
        seen.add(column);
    }
    if (duplicated.size > 0) {
        const names = [...duplicated];
        throw new SchemaError(`${stage}: duplicate column(s) ${names.join(', ')}`, stage, names);
    }
}

function pick(row: Row, columns: readonly string[]): Row {
    const picked: Row = {};
    for (const column of columns) {
        picked[column] = row[column] ?? null;
    }
    return picked;
}
