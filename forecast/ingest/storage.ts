/**
 * Municipal Forecast Pipeline — Table Storage
 *
 * Stores abstract over where tables live. The CSV store keeps the collected
 * dataset on disk; the memory store backs tests.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { formatDateTime } from '../time';
import type { Cell, Row, Table } from '../types';

// =============================================================================
// Storage Interface
// =============================================================================

export interface TableStore {
    /** Load a table, or null when nothing is stored at that path */
    load(location: string): Promise<Table | null>;

    /** Store a table, replacing whatever was there */
    save(table: Table, location: string): Promise<void>;
}

export class StorageError extends Error {
    constructor(
        message: string,
        public readonly location: string
    ) {
        super(message);
        this.name = 'StorageError';
    }
}

/**
 * True for file-system errors caused by missing permissions.
 */
export function isPermissionError(error: unknown): boolean {
    return (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        (error.code === 'EACCES' || error.code === 'EPERM')
    );
}

function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// CSV Codec
// =============================================================================

/**
 * Render a cell as CSV text: null → empty, Date → `yyyy-mm-dd HH:MM:SS`.
 */
export function formatCsvCell(cell: Cell): string {
    if (cell === null) return '';
    if (cell instanceof Date) return formatDateTime(cell);
    return String(cell);
}

export function encodeCsv(table: Table): string {
    return Papa.unparse(
        {
            fields: [...table.columns],
            data: table.rows.map((row) => table.columns.map((column) => formatCsvCell(row[column] ?? null)))
        },
        { newline: '\n' }
    );
}

/**
 * Parse CSV text with a header row. Every cell is read as text; empty cells
 * become null.
 */
export function decodeCsv(text: string, location = '(inline)'): Table {
    const result = Papa.parse<Record<string, string | undefined>>(text, {
        header: true,
        skipEmptyLines: true
    });

    // A header-only file parses with an empty data set and no errors.
    const fatal = result.errors.filter((error) => error.type !== 'Delimiter');
    if (fatal.length > 0) {
        const first = fatal[0];
        throw new StorageError(`Malformed CSV at row ${first.row ?? '?'}: ${first.message}`, location);
    }

    const columns = result.meta.fields ?? [];
    const rows = result.data.map((record) => {
        const row: Row = {};
        for (const column of columns) {
            const value = record[column];
            row[column] = value === undefined || value === '' ? null : value;
        }
        return row;
    });

    return { columns, rows };
}

// =============================================================================
// CSV File Storage
// =============================================================================

export class CsvTableStore implements TableStore {
    async load(location: string): Promise<Table | null> {
        let text: string;
        try {
            text = await readFile(location, 'utf8');
        } catch (error) {
            if (isMissingFileError(error)) return null;
            throw error;
        }
        return decodeCsv(text, location);
    }

    async save(table: Table, location: string): Promise<void> {
        await mkdir(path.dirname(location), { recursive: true });
        await writeFile(location, `${encodeCsv(table)}\n`, 'utf8');
    }
}

// =============================================================================
// In-Memory Storage (for testing)
// =============================================================================

export class MemoryTableStore implements TableStore {
    private store = new Map<string, Table>();

    async load(location: string): Promise<Table | null> {
        return this.store.get(location) ?? null;
    }

    async save(table: Table, location: string): Promise<void> {
        this.store.set(location, table);
    }

    /** Get all locations (for debugging) */
    keys(): string[] {
        return Array.from(this.store.keys());
    }

    /** Clear storage */
    clear(): void {
        this.store.clear();
    }
}
