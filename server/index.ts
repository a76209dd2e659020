/**
 * Runner entry point: scheduled collection plus the read-only HTTP API.
 */
/* eslint-disable no-console */

import cron from 'node-cron';
import { ForecastCollector } from '../forecast/ingest/collector';
import { ForecastFetcher } from '../forecast/ingest/fetcher';
import { CsvTableStore } from '../forecast/ingest/storage';
import { createApp } from './app';
import { cronForInterval, loadConfig } from './config';
import { CollectionRunner } from './runner';

async function startServer() {
    const config = loadConfig();
    const store = new CsvTableStore();
    const collector = new ForecastCollector(
        { municipalityCode: config.municipalityCode, dataDir: config.dataDir, fileName: config.datasetFile },
        { source: new ForecastFetcher({ apiKey: config.apiKey, baseUrl: config.baseUrl }), store }
    );
    const runner = new CollectionRunner(collector, { retryDelayMinutes: config.retryDelayMinutes });

    const schedule = cronForInterval(config.collectIntervalHours);
    const app = createApp({
        store,
        datasetPath: () => collector.datasetPath,
        status: () => runner.status(),
        municipalityCode: config.municipalityCode,
        schedule
    });

    const task = cron.schedule(schedule, () => {
        runner.runCycle().catch((error) => console.error('[runner] Scheduled cycle failed:', error));
    });
    console.log(`[runner] Collecting every ${config.collectIntervalHours}h (${schedule})`);

    const server = app.listen(config.port, () => {
        console.log(`[runner] Server running on http://localhost:${config.port}/`);
    });

    const shutdown = () => {
        console.log('[runner] Shutting down');
        task.stop();
        runner.stop();
        server.close();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    await runner.runCycle();
}

startServer().catch((error) => {
    console.error('[runner] Failed to start:', error);
    process.exit(1);
});
