/**
 * Run one collection cycle and exit.
 *
 * Usage: npm run collect
 */

import { ForecastCollector } from '../forecast/ingest/collector';
import { ForecastFetcher } from '../forecast/ingest/fetcher';
import { CsvTableStore } from '../forecast/ingest/storage';
import { loadConfig } from '../server/config';

async function main(): Promise<void> {
    const config = loadConfig();
    const collector = new ForecastCollector(
        { municipalityCode: config.municipalityCode, dataDir: config.dataDir, fileName: config.datasetFile },
        {
            source: new ForecastFetcher({ apiKey: config.apiKey, baseUrl: config.baseUrl }),
            store: new CsvTableStore()
        }
    );

    const result = await collector.updateDataset();
    if (!result.ok) {
        process.exitCode = 1;
        return;
    }
    console.log(`[collector] ${result.fetchedRows} rows fetched, ${result.rowCount} rows stored`);
}

main().catch((error) => {
    console.error('[collector] Fatal:', error);
    process.exit(1);
});
