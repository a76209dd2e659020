import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { cronForInterval, loadConfig } from '../config';

const cwd = path.join(path.sep, 'work');

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({ AEMET_API_KEY: 'test-secret' }, cwd)).toEqual({
            apiKey: 'test-secret',
            baseUrl: 'https://opendata.aemet.es/opendata/api',
            municipalityCode: '28079',
            dataDir: path.join(cwd, 'data'),
            datasetFile: 'madrid_weather_forecast.csv',
            collectIntervalHours: 6,
            retryDelayMinutes: 10,
            port: 3000
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig(
            {
                AEMET_API_KEY: 'test-secret',
                AEMET_BASE_URL: 'https://opendata.test/api',
                MUNICIPALITY_CODE: '08019',
                DATA_DIR: 'out',
                DATASET_FILE: 'city.csv',
                COLLECT_INTERVAL_HOURS: '3',
                RETRY_DELAY_MINUTES: '5',
                PORT: '8080'
            },
            cwd
        );

        expect(config).toMatchObject({
            baseUrl: 'https://opendata.test/api',
            municipalityCode: '08019',
            dataDir: path.join(cwd, 'out'),
            datasetFile: 'city.csv',
            collectIntervalHours: 3,
            retryDelayMinutes: 5,
            port: 8080
        });
    });

    it('requires an API key', () => {
        expect(() => loadConfig({}, cwd)).toThrow('Invalid configuration:\n  AEMET_API_KEY: Required');
        expect(() => loadConfig({ AEMET_API_KEY: '  ' }, cwd)).toThrow('AEMET_API_KEY: AEMET_API_KEY is required');
    });

    it('lists every invalid value', () => {
        expect(() =>
            loadConfig({ AEMET_API_KEY: 'test-secret', MUNICIPALITY_CODE: 'madrid', COLLECT_INTERVAL_HOURS: '48' }, cwd)
        ).toThrow(/MUNICIPALITY_CODE: MUNICIPALITY_CODE must be a 5-digit INE code\n {2}COLLECT_INTERVAL_HOURS: /);
    });
});

describe('cronForInterval', () => {
    it('runs on the hour', () => {
        expect(cronForInterval(1)).toBe('0 * * * *');
        expect(cronForInterval(6)).toBe('0 */6 * * *');
    });
});
