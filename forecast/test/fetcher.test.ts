import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FetchError, ForecastFetcher } from '../ingest/fetcher';

const BASE_URL = 'https://opendata.test/api/';
const DATA_URL = 'https://opendata.test/sh/abc123';

function json(body: unknown, init: ResponseInit = {}): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        headers: { 'content-type': 'application/json;charset=UTF-8' },
        ...init
    });
}

describe('ForecastFetcher', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('builds the hourly forecast endpoint', () => {
        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });
        expect(fetcher.forecastUrl('28079')).toBe('https://opendata.test/api/prediccion/especifica/municipio/horaria/28079');
    });

    it('follows the data URL from the envelope', async () => {
        const forecast = [{ nombre: 'Test Town', prediccion: { dia: [] } }];
        fetchMock
            .mockResolvedValueOnce(json({ descripcion: 'exito', estado: 200, datos: DATA_URL }))
            .mockResolvedValueOnce(json(forecast));

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });
        const result = await fetcher.fetchRawForecast('28079');

        expect(result).toEqual(forecast);
        expect(fetchMock).toHaveBeenCalledTimes(2);
        expect(fetchMock.mock.calls[0]).toEqual([
            'https://opendata.test/api/prediccion/especifica/municipio/horaria/28079',
            { headers: { api_key: 'test-secret', Accept: 'application/json' } }
        ]);
        expect(fetchMock.mock.calls[1]).toEqual([DATA_URL, { headers: undefined }]);
    });

    it('decodes the charset the data URL declares', async () => {
        const text = JSON.stringify([{ nombre: 'Leganés', prediccion: { dia: [] } }]);
        const latin1 = Uint8Array.from(text, (char) => char.charCodeAt(0));
        fetchMock
            .mockResolvedValueOnce(json({ datos: DATA_URL }))
            .mockResolvedValueOnce(
                new Response(latin1, { status: 200, headers: { 'content-type': 'text/plain;charset=ISO-8859-15' } })
            );

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });

        expect(await fetcher.fetchRawForecast('28074')).toEqual([{ nombre: 'Leganés', prediccion: { dia: [] } }]);
    });

    it('surfaces HTTP failures as FetchError', async () => {
        fetchMock.mockResolvedValueOnce(new Response('denied', { status: 401, statusText: 'Unauthorized' }));

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });
        const failure = fetcher.fetchRawForecast('28079');

        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({
            message: 'Fetch failed: 401 Unauthorized',
            status: 401,
            url: 'https://opendata.test/api/prediccion/especifica/municipio/horaria/28079'
        });
    });

    it('fails when the envelope has no data URL', async () => {
        fetchMock.mockResolvedValueOnce(json({ descripcion: 'API key invalid', estado: 401 }));

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });

        await expect(fetcher.fetchRawForecast('28079')).rejects.toMatchObject({
            name: 'FetchError',
            message: 'No data URL in response (API key invalid)',
            status: 401
        });
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('fails when the data URL serves an error', async () => {
        fetchMock
            .mockResolvedValueOnce(json({ datos: DATA_URL }))
            .mockResolvedValueOnce(new Response('', { status: 404, statusText: 'Not Found' }));

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });

        await expect(fetcher.fetchRawForecast('28079')).rejects.toMatchObject({ status: 404, url: DATA_URL });
    });

    it('rejects malformed JSON', async () => {
        fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

        const fetcher = new ForecastFetcher({ apiKey: 'test-secret', baseUrl: BASE_URL });

        await expect(fetcher.fetchRawForecast('28079')).rejects.toThrow(/^Invalid JSON/);
    });
});
