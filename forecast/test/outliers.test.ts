import { describe, it, expect } from 'vitest';
import { ParseError, SchemaError } from '../errors';
import { detectOutliers, isOutlier, outlierIndices } from '../outliers';
import type { Row, Table } from '../types';

function reading(temperature: number | null, humidity: number | null, wind_speed: number | null): Row {
    return { temperature, humidity, wind_speed };
}

const columns = ['temperature', 'humidity', 'wind_speed'];

describe('Outlier detector', () => {
    it('flags readings outside the plausible ranges', () => {
        expect(isOutlier(reading(-10.5, 50, 5))).toBe(true);
        expect(isOutlier(reading(50.1, 50, 5))).toBe(true);
        expect(isOutlier(reading(20, -1, 5))).toBe(true);
        expect(isOutlier(reading(20, 101, 5))).toBe(true);
        expect(isOutlier(reading(20, 50, -0.1))).toBe(true);
    });

    it('keeps the bounds inclusive', () => {
        expect(isOutlier(reading(-10, 0, 0))).toBe(false);
        expect(isOutlier(reading(50, 100, 0))).toBe(false);
    });

    it('never flags missing readings', () => {
        expect(isOutlier(reading(null, null, null))).toBe(false);
        expect(isOutlier(reading(null, 120, null))).toBe(true);
    });

    it('returns the flagged rows in order', () => {
        const table: Table = {
            columns,
            rows: [reading(20, 50, 5), reading(-15, 50, 5), reading(25, 60, 3), reading(20, 150, 5)]
        };

        expect(outlierIndices(table)).toEqual([1, 3]);
        const result = detectOutliers(table);
        expect(result.columns).toEqual(columns);
        expect(result.rows).toEqual([reading(-15, 50, 5), reading(20, 150, 5)]);
    });

    it('returns an empty table when nothing is implausible', () => {
        const table: Table = { columns, rows: [reading(20, 50, 5)] };
        expect(detectOutliers(table).rows).toEqual([]);
    });

    it('needs numeric input', () => {
        const table: Table = { columns, rows: [{ temperature: '20', humidity: 50, wind_speed: 5 }] };
        expect(() => detectOutliers(table)).toThrow(ParseError);
    });

    it('requires the measurement columns', () => {
        const table: Table = { columns: ['temperature'], rows: [] };
        expect(() => detectOutliers(table)).toThrow(SchemaError);
    });
});
