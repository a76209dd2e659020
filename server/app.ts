/* eslint-disable no-console */

import express, { type Express } from 'express';
import { clean } from '../forecast/clean';
import type { TableStore } from '../forecast/ingest/storage';
import { detectOutliers } from '../forecast/outliers';
import { summarize } from '../forecast/summary';
import { formatDateTime } from '../forecast/time';
import type { CleanRecord, CleanTable, Table } from '../forecast/types';
import type { RunnerStatus } from './runner';

export interface AppDeps {
    store: TableStore;
    /** Current dataset location (moves after a permission fallback) */
    datasetPath: () => string;
    status: () => RunnerStatus;
    municipalityCode: string;
    /** Cron expression of the collection schedule */
    schedule: string;
}

export type ForecastJson = Omit<CleanRecord, 'datetime'> & { datetime: string };

export function toForecastJson(table: Table<CleanRecord>): ForecastJson[] {
    return table.rows.map((row) => ({ ...row, datetime: formatDateTime(row.datetime) }));
}

async function loadCleanTable(deps: AppDeps): Promise<CleanTable | null> {
    const raw = await deps.store.load(deps.datasetPath());
    return raw ? clean(raw) : null;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.get('/api/status', (_req, res) => {
        res.json({
            municipality: deps.municipalityCode,
            dataset: deps.datasetPath(),
            schedule: deps.schedule,
            ...deps.status()
        });
    });

    app.get('/api/forecast', async (req, res) => {
        try {
            const table = await loadCleanTable(deps);
            if (!table) {
                res.status(404).json({ error: 'No dataset collected yet' });
                return;
            }
            const rows = req.query.outliers === '1' ? detectOutliers(table) : table;
            res.json(toForecastJson(rows));
        } catch (error) {
            console.error('[runner] Forecast request failed:', error);
            res.status(500).json({ error: String(error) });
        }
    });

    app.get('/api/summary', async (_req, res) => {
        try {
            const table = await loadCleanTable(deps);
            if (!table) {
                res.status(404).json({ error: 'No dataset collected yet' });
                return;
            }
            res.json(summarize(table));
        } catch (error) {
            console.error('[runner] Summary request failed:', error);
            res.status(500).json({ error: String(error) });
        }
    });

    return app;
}
