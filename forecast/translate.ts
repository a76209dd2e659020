/**
 * Municipal Forecast Pipeline — Field Translators
 *
 * Static lookups from provider vocabulary to English. Codes or phrases that are
 * not in a table produce null enrichment instead of an error, so new values
 * published by the provider flow through as missing data.
 */

import skyConditionTable from './data/sky_conditions.json';
import { requireColumns, withColumn } from './table';
import {
    SKY_ENGLISH_COLUMN,
    WIND_DEGREES_COLUMN,
    WIND_NAME_COLUMN,
    type Cell,
    type Table
} from './types';

export interface WindDirection {
    name: string;
    /** Compass degrees (N = 0, clockwise); null for calm */
    degrees: number | null;
}

const WIND_DIRECTIONS: ReadonlyMap<string, WindDirection> = new Map([
    ['N', { name: 'north', degrees: 0 }],
    ['NE', { name: 'northeast', degrees: 45 }],
    ['E', { name: 'east', degrees: 90 }],
    ['SE', { name: 'southeast', degrees: 135 }],
    ['S', { name: 'south', degrees: 180 }],
    ['SO', { name: 'southwest', degrees: 225 }],
    ['O', { name: 'west', degrees: 270 }],
    ['NO', { name: 'northwest', degrees: 315 }],
    ['C', { name: 'calm', degrees: null }]
]);

const SKY_CONDITIONS: ReadonlyMap<string, string> = new Map(Object.entries(skyConditionTable));

/** Every compass code the wind translator recognises. */
export const WIND_CODES: readonly string[] = [...WIND_DIRECTIONS.keys()];

/** Every sky phrase the sky translator recognises. */
export const SKY_PHRASES: readonly string[] = [...SKY_CONDITIONS.keys()];

export function lookupWindDirection(code: Cell): WindDirection | null {
    if (typeof code !== 'string') return null;
    return WIND_DIRECTIONS.get(code) ?? null;
}

export function lookupSkyCondition(phrase: Cell): string | null {
    if (typeof phrase !== 'string') return null;
    return SKY_CONDITIONS.get(phrase) ?? null;
}

/**
 * Add the English compass name and the direction in degrees for each raw
 * `wind_direction` code.
 */
export function translateWindDirection(table: Table): Table {
    requireColumns(table, ['wind_direction'], 'translateWindDirection');

    const named = withColumn(
        table,
        WIND_NAME_COLUMN,
        (row) => lookupWindDirection(row.wind_direction)?.name ?? null
    );
    return withColumn(
        named,
        WIND_DEGREES_COLUMN,
        (row) => lookupWindDirection(row.wind_direction)?.degrees ?? null
    );
}

/**
 * Add the English phrase for each raw `sky_condition` description.
 */
export function translateSkyCondition(table: Table): Table {
    requireColumns(table, ['sky_condition'], 'translateSkyCondition');
    return withColumn(table, SKY_ENGLISH_COLUMN, (row) => lookupSkyCondition(row.sky_condition));
}
