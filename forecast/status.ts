/**
 * Municipal Forecast Pipeline — Wind Status Tagger
 */

import { requireColumns, withColumn } from './table';
import type { Cell, Table, WindStatus } from './types';

export function windStatusFor(degrees: Cell): WindStatus {
    return degrees === null ? 'calm' : 'with wind';
}

/**
 * Add `wind_status`: "calm" where `wind_direction_degrees` is null, otherwise "with wind".
 */
export function tagWindStatus(table: Table): Table {
    requireColumns(table, ['wind_direction_degrees'], 'tagWindStatus');
    return withColumn(table, 'wind_status', (row) => windStatusFor(row.wind_direction_degrees));
}
