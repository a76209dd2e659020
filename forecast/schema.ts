/**
 * Municipal Forecast Pipeline — Schema Normalizer
 */

import { assertUniqueColumns } from './table';
import type { Row, Table } from './types';

/**
 * Lower-case every column name, then apply the renames.
 *
 * Rename keys refer to the lower-cased names. Keys that match no column are
 * ignored. Two columns ending up with the same name is a SchemaError.
 */
export function normalizeColumnNames(
    table: Table,
    renames: Readonly<Record<string, string>> = {}
): Table {
    const renameMap = new Map(Object.entries(renames));
    const mapping = table.columns.map((from) => {
        const lower = from.toLowerCase();
        return { from, to: renameMap.get(lower) ?? lower };
    });
    const columns = mapping.map(({ to }) => to);
    assertUniqueColumns(columns, 'normalizeColumnNames');

    const rows = table.rows.map((row) => {
        const renamed: Row = {};
        for (const { from, to } of mapping) {
            renamed[to] = row[from] ?? null;
        }
        return renamed;
    });

    return { columns, rows };
}
