/**
 * Municipal Forecast Pipeline — Error Types
 *
 * Unknown enumeration values (wind codes, sky phrases) are not errors: the
 * translators leave their enrichment columns null and the pipeline continues.
 * Malformed primitive values and schema drift are fatal to a `clean()` call.
 */

/**
 * A cell could not be parsed into its canonical type.
 */
export class ParseError extends Error {
    constructor(
        message: string,
        public readonly column: string,
        public readonly row: number,
        public readonly value: unknown
    ) {
        super(message);
        this.name = 'ParseError';
    }
}

/**
 * A stage found its input columns missing, or would produce duplicate column names.
 */
export class SchemaError extends Error {
    constructor(
        message: string,
        public readonly stage: string,
        public readonly columns: readonly string[]
    ) {
        super(message);
        this.name = 'SchemaError';
    }
}
