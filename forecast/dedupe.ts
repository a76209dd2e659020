/**
 * Municipal Forecast Pipeline — Deduplicator
 *
 * Two rows are duplicates only when every column matches, derived columns
 * included. Identity is the BLAKE3 hash of the row's canonical bytes.
 */

import { canonicalRowBytes } from './canonical';
import { hashHex } from './hash';
import type { Row, Table } from './types';

export interface DedupeResult<R extends Row = Row> {
    table: Table<R>;
    /** Number of rows removed */
    duplicateCount: number;
}

/**
 * Fingerprint of a full row, read in the table's column order.
 */
export function rowFingerprint(row: Row, columns: readonly string[]): string {
    return hashHex(canonicalRowBytes(row, columns));
}

/**
 * Remove exact duplicate rows, keeping the first occurrence.
 */
export function deduplicate<R extends Row>(table: Table<R>): DedupeResult<R> {
    const seen = new Set<string>();
    const rows = table.rows.filter((row) => {
        const fingerprint = rowFingerprint(row, table.columns);
        if (seen.has(fingerprint)) return false;
        seen.add(fingerprint);
        return true;
    });

    return {
        table: { columns: [...table.columns], rows },
        duplicateCount: table.rows.length - rows.length
    };
}
