/**
 * Runner configuration.
 *
 * All environment-dependent values are read here once and passed on as a
 * typed object; nothing downstream reads process.env.
 */

import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../forecast/ingest/fetcher';
import { DEFAULT_DATASET_FILE, DEFAULT_MUNICIPALITY_CODE } from '../forecast/ingest/collector';

const EnvSchema = z.object({
    AEMET_API_KEY: z.string().trim().min(1, 'AEMET_API_KEY is required'),
    AEMET_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    MUNICIPALITY_CODE: z.string().regex(/^\d{5}$/, 'MUNICIPALITY_CODE must be a 5-digit INE code').default(DEFAULT_MUNICIPALITY_CODE),
    DATA_DIR: z.string().min(1).default('data'),
    DATASET_FILE: z.string().min(1).default(DEFAULT_DATASET_FILE),
    COLLECT_INTERVAL_HOURS: z.coerce.number().int().min(1).max(24).default(6),
    RETRY_DELAY_MINUTES: z.coerce.number().int().min(1).default(10),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000)
});

export interface RunnerConfig {
    apiKey: string;
    baseUrl: string;
    municipalityCode: string;
    /** Absolute data directory */
    dataDir: string;
    datasetFile: string;
    collectIntervalHours: number;
    retryDelayMinutes: number;
    port: number;
}

/**
 * Build the runner configuration from environment variables.
 * Throws with every problem listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): RunnerConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
    }

    const parsed = result.data;
    return {
        apiKey: parsed.AEMET_API_KEY,
        baseUrl: parsed.AEMET_BASE_URL,
        municipalityCode: parsed.MUNICIPALITY_CODE,
        dataDir: path.resolve(cwd, parsed.DATA_DIR),
        datasetFile: parsed.DATASET_FILE,
        collectIntervalHours: parsed.COLLECT_INTERVAL_HOURS,
        retryDelayMinutes: parsed.RETRY_DELAY_MINUTES,
        port: parsed.PORT
    };
}

/**
 * Cron expression running every `hours` hours, on the hour.
 */
export function cronForInterval(hours: number): string {
    return hours === 1 ? '0 * * * *' : `0 */${hours} * * *`;
}
