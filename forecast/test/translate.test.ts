import { describe, it, expect } from 'vitest';
import { SchemaError } from '../errors';
import {
    lookupSkyCondition,
    lookupWindDirection,
    SKY_PHRASES,
    translateSkyCondition,
    translateWindDirection,
    WIND_CODES
} from '../translate';
import type { Table } from '../types';

function windTable(codes: (string | null)[]): Table {
    return { columns: ['wind_direction'], rows: codes.map((code) => ({ wind_direction: code })) };
}

describe('Wind direction translator', () => {
    it('maps every compass code to a name and degrees', () => {
        const result = translateWindDirection(windTable(['N', 'NE', 'E', 'SE', 'S', 'SO', 'O', 'NO', 'C']));

        expect(result.columns).toEqual(['wind_direction', 'wind_direction_completo', 'wind_direction_grados']);
        expect(result.rows.map((row) => row.wind_direction_completo)).toEqual([
            'north',
            'northeast',
            'east',
            'southeast',
            'south',
            'southwest',
            'west',
            'northwest',
            'calm'
        ]);
        expect(result.rows.map((row) => row.wind_direction_grados)).toEqual([
            0, 45, 90, 135, 180, 225, 270, 315, null
        ]);
    });

    it('leaves unknown and missing codes null', () => {
        const result = translateWindDirection(windTable(['XX', 'n', ' N', null]));

        for (const row of result.rows) {
            expect(row.wind_direction_completo).toBeNull();
            expect(row.wind_direction_grados).toBeNull();
        }
    });

    it('keeps the raw code column untouched', () => {
        const input = windTable(['SO']);
        const result = translateWindDirection(input);

        expect(result.rows[0].wind_direction).toBe('SO');
        expect(input.columns).toEqual(['wind_direction']);
        expect(input.rows[0]).toEqual({ wind_direction: 'SO' });
    });

    it('requires the wind_direction column', () => {
        const table: Table = { columns: ['temperature'], rows: [{ temperature: 20 }] };
        expect(() => translateWindDirection(table)).toThrow(SchemaError);
    });

    it('exposes the recognised codes', () => {
        expect(WIND_CODES).toEqual(['N', 'NE', 'E', 'SE', 'S', 'SO', 'O', 'NO', 'C']);
        expect(lookupWindDirection('O')).toEqual({ name: 'west', degrees: 270 });
        expect(lookupWindDirection(12)).toBeNull();
    });
});

describe('Sky condition translator', () => {
    it('translates known phrases and nulls unknown ones', () => {
        const table: Table = {
            columns: ['sky_condition'],
            rows: [
                { sky_condition: 'Despejado' },
                { sky_condition: 'Cubierto con tormenta y lluvia escasa' },
                { sky_condition: 'Granizo de colores' },
                { sky_condition: null }
            ]
        };

        const result = translateSkyCondition(table);

        expect(result.columns).toEqual(['sky_condition', 'sky_condition_ingles']);
        expect(result.rows.map((row) => row.sky_condition_ingles)).toEqual([
            'clear',
            'overcast with thunderstorm and light rain',
            null,
            null
        ]);
    });

    it('matches phrases exactly', () => {
        expect(lookupSkyCondition('Poco nuboso')).toBe('few clouds');
        expect(lookupSkyCondition('poco nuboso')).toBeNull();
        expect(lookupSkyCondition('Poco nuboso ')).toBeNull();
    });

    it('loads the phrase table from data', () => {
        expect(SKY_PHRASES).toContain('Niebla');
        expect(lookupSkyCondition('Niebla')).toBe('fog');
        expect(new Set(SKY_PHRASES).size).toBe(SKY_PHRASES.length);
    });

    it('requires the sky_condition column', () => {
        const table: Table = { columns: ['date'], rows: [] };
        expect(() => translateSkyCondition(table)).toThrow(/translateSkyCondition: missing column\(s\) sky_condition/);
    });
});
