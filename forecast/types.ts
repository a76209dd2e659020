/**
 * Municipal Forecast Pipeline — Core Type Definitions
 *
 * Tables are column-ordered collections of rows. Every stage of the cleaning
 * pipeline takes a table and returns a new one; nothing is mutated in place.
 */

// =============================================================================
// Tables
// =============================================================================

/** A single cell value. Dates are wall-clock values held at the matching UTC instant. */
export type Cell = string | number | Date | null;

export type Row = Record<string, Cell>;

/**
 * A column-ordered table.
 * `columns` fixes the order; every row carries a value for every column.
 */
export interface Table<R extends Row = Row> {
    readonly columns: readonly string[];
    readonly rows: readonly R[];
}

// =============================================================================
// Raw Records (pre-cleaning schema)
// =============================================================================

/**
 * One hourly forecast reading as produced by the raw record parser.
 * Measurements may arrive as numeric strings; missing values are null.
 */
export type RawRecord = {
    /** Forecast date, `dd/mm/yyyy` (or ISO `yyyy-mm-dd` in older files) */
    date: string;
    /** Forecast hour of day, 0–23 */
    hour: number;
    temperature: string | number | null;
    humidity: string | number | null;
    wind_speed: string | number | null;
    /** Provider compass code (N, NE, E, SE, S, SO, O, NO, C) */
    wind_direction: string | null;
    /** Provider sky description, source language */
    sky_condition: string | null;
    /** Collection time, `dd/mm/yyyy HH:MM:SS` */
    timestamp: string;
};

export const RAW_COLUMNS = [
    'date',
    'hour',
    'temperature',
    'humidity',
    'sky_condition',
    'wind_direction',
    'wind_speed',
    'timestamp'
] as const satisfies readonly (keyof RawRecord)[];

// =============================================================================
// Clean Records (canonical output schema)
// =============================================================================

export type WindStatus = 'calm' | 'with wind';

export type CleanRecord = {
    /** Forecast date and hour combined */
    datetime: Date;
    /** °C */
    temperature: number | null;
    /** % */
    humidity: number | null;
    /** km/h */
    wind_speed: number | null;
    /** English compass name, or null for an unknown code */
    wind_direction: string | null;
    /** Compass degrees; null when calm or unknown */
    wind_direction_degrees: number | null;
    /** English sky description, or null for an unknown phrase */
    sky_condition: string | null;
    wind_status: WindStatus;
};

export const CLEAN_COLUMNS = [
    'datetime',
    'temperature',
    'humidity',
    'wind_speed',
    'wind_direction',
    'wind_direction_degrees',
    'sky_condition',
    'wind_status'
] as const satisfies readonly (keyof CleanRecord)[];

export type CleanColumn = (typeof CLEAN_COLUMNS)[number];

export interface CleanTable extends Table<CleanRecord> {
    readonly columns: readonly CleanColumn[];
}

// =============================================================================
// Intermediate Column Names
// =============================================================================

/**
 * Enrichment columns added by the translators. They keep their working names
 * until the schema normalizer renames them to the public ones.
 */
export const WIND_NAME_COLUMN = 'wind_direction_completo';
export const WIND_DEGREES_COLUMN = 'wind_direction_grados';
export const SKY_ENGLISH_COLUMN = 'sky_condition_ingles';

/** Renames applied at the end of the pipeline (working name → public name). */
export const CANONICAL_RENAMES: Readonly<Record<string, string>> = {
    [SKY_ENGLISH_COLUMN]: 'sky_condition',
    [WIND_DEGREES_COLUMN]: 'wind_direction_degrees',
    [WIND_NAME_COLUMN]: 'wind_direction'
};
