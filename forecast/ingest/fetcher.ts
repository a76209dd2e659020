/**
 * Municipal Forecast Pipeline — Forecast Fetcher
 *
 * The provider serves data in two steps: the endpoint answers with a short
 * JSON envelope whose `datos` field is a URL, and that URL serves the payload.
 * No retries here; the runner decides when to try again.
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_BASE_URL = 'https://opendata.aemet.es/opendata/api';

const HOURLY_FORECAST_PATH = '/prediccion/especifica/municipio/horaria/';

export interface ForecastFetcherOptions {
    apiKey: string;
    /** API root (default: AEMET OpenData) */
    baseUrl?: string;
}

/**
 * Anything that can produce a raw forecast payload for a municipality.
 */
export interface RawForecastSource {
    fetchRawForecast(municipalityCode: string): Promise<unknown>;
}

// =============================================================================
// Errors
// =============================================================================

export class FetchError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'FetchError';
    }
}

// =============================================================================
// Fetcher
// =============================================================================

const EnvelopeSchema = z
    .object({
        descripcion: z.string().optional(),
        estado: z.number().optional(),
        datos: z.string().optional()
    })
    .passthrough();

/**
 * Decode a response body as JSON, honouring the charset the server declares
 * (the data URLs are served as ISO-8859-15).
 */
async function readJson(response: Response, url: string): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    const charset = /charset=([^;]+)/i.exec(contentType)?.[1]?.trim() ?? 'utf-8';

    let text: string;
    try {
        text = new TextDecoder(charset).decode(await response.arrayBuffer());
    } catch (error) {
        throw new FetchError(`Cannot decode response (${charset}): ${String(error)}`, url, response.status);
    }

    try {
        const body: unknown = JSON.parse(text);
        return body;
    } catch (error) {
        throw new FetchError(`Invalid JSON: ${String(error)}`, url, response.status);
    }
}

async function get(url: string, headers?: Record<string, string>): Promise<Response> {
    const response = await fetch(url, { headers });
    if (!response.ok) {
        throw new FetchError(`Fetch failed: ${response.status} ${response.statusText}`, url, response.status);
    }
    return response;
}

export class ForecastFetcher implements RawForecastSource {
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(options: ForecastFetcherOptions) {
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    /** Endpoint of the first step, for a municipality (INE code). */
    forecastUrl(municipalityCode: string): string {
        return `${this.baseUrl}${HOURLY_FORECAST_PATH}${encodeURIComponent(municipalityCode)}`;
    }

    /**
     * Fetch the hourly forecast payload for a municipality.
     * Throws FetchError on an HTTP failure, a missing data URL, or malformed JSON.
     */
    async fetchRawForecast(municipalityCode: string): Promise<unknown> {
        const initialUrl = this.forecastUrl(municipalityCode);
        const envelopeResponse = await get(initialUrl, { api_key: this.apiKey, Accept: 'application/json' });
        const envelope = EnvelopeSchema.safeParse(await readJson(envelopeResponse, initialUrl));

        const dataUrl = envelope.success ? envelope.data.datos : undefined;
        if (!dataUrl) {
            const detail = envelope.success ? envelope.data.descripcion ?? 'no description' : 'malformed envelope';
            const status = envelope.success ? envelope.data.estado : undefined;
            throw new FetchError(`No data URL in response (${detail})`, initialUrl, status ?? envelopeResponse.status);
        }

        const dataResponse = await get(dataUrl);
        return readJson(dataResponse, dataUrl);
    }
}
