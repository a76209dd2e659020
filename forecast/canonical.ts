/**
 * Municipal Forecast Pipeline — Canonical Row Encoding
 *
 * Equal rows must always produce identical bytes. A row is encoded as a JSON
 * array of its cells in column order. Cells are type-tagged so a Date never
 * collides with its ISO string and a numeric string never collides with the
 * number.
 */

import type { Cell } from './types';

export type CanonicalCell = string | number | null | { date: string } | { number: string };

/**
 * Encode one table cell.
 *
 * - Dates become `{ date: <ISO> }` (`Invalid Date` kept as text)
 * - Non-finite numbers become `{ number: "NaN" | "Infinity" | "-Infinity" }`,
 *   so NaN cells compare equal to each other
 * - -0 is normalized to 0
 */
export function canonicalCell(cell: Cell): CanonicalCell {
    if (cell instanceof Date) {
        const time = cell.getTime();
        return { date: Number.isNaN(time) ? 'Invalid Date' : cell.toISOString() };
    }
    if (typeof cell === 'number') {
        if (!Number.isFinite(cell)) return { number: String(cell) };
        return Object.is(cell, -0) ? 0 : cell;
    }
    return cell;
}

/**
 * Canonical bytes of a row's cells, read in the given column order.
 * Absent cells encode as null. The tag objects have a single key, so plain
 * JSON serialization is already stable.
 */
export function canonicalRowBytes(row: Readonly<Record<string, Cell>>, columns: readonly string[]): Uint8Array {
    const cells = columns.map((column) => canonicalCell(row[column] ?? null));
    return new TextEncoder().encode(JSON.stringify(cells));
}
