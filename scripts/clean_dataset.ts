/**
 * Clean the collected dataset and print a summary.
 *
 * Usage: npm run clean:dataset -- [input.csv] [output.csv]
 *
 * Defaults to the configured dataset and `madrid_weather_clean.csv` beside it.
 * Needs no API key.
 */

import 'dotenv/config';
import path from 'node:path';
import { clean, detectOutliers, formatSummary, summarize } from '../forecast';
import { DEFAULT_DATASET_FILE } from '../forecast/ingest/collector';
import { CsvTableStore } from '../forecast/ingest/storage';

const DEFAULT_CLEAN_FILE = 'madrid_weather_clean.csv';

async function main(): Promise<void> {
    const dataDir = path.resolve(process.env.DATA_DIR ?? 'data');
    const input = path.resolve(process.argv[2] ?? path.join(dataDir, process.env.DATASET_FILE ?? DEFAULT_DATASET_FILE));
    const output = path.resolve(process.argv[3] ?? path.join(path.dirname(input), DEFAULT_CLEAN_FILE));

    const store = new CsvTableStore();
    const raw = await store.load(input);
    if (!raw) {
        console.error(`[clean] Dataset not found: ${input}`);
        process.exitCode = 1;
        return;
    }

    console.log(`[clean] Cleaning ${raw.rows.length} rows from ${input}`);
    const table = clean(raw);
    const removed = raw.rows.length - table.rows.length;
    if (removed > 0) {
        console.log(`[clean] Removed ${removed} duplicate rows`);
    }

    const outliers = detectOutliers(table);
    if (outliers.rows.length > 0) {
        console.warn(`[clean] ${outliers.rows.length} rows with implausible readings`);
    }

    await store.save(table, output);
    console.log(`[clean] Clean dataset saved: ${output}`);

    for (const line of formatSummary(summarize(table))) {
        console.log(`[clean] ${line}`);
    }
}

main().catch((error) => {
    console.error('[clean] Failed:', error);
    process.exit(1);
});
