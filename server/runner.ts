/**
 * Collection runner: runs update cycles without overlap and schedules a single
 * retry after a failed cycle.
 */
/* eslint-disable no-console */

import type { UpdateResult } from '../forecast/ingest/collector';

export interface DatasetUpdater {
    updateDataset(): Promise<UpdateResult>;
}

export interface RunnerOptions {
    retryDelayMinutes: number;
    /** Override clock (status reporting) */
    now?: () => Date;
}

export interface RunnerStatus {
    running: boolean;
    lastRunAt: string | null;
    lastResult: UpdateResult | null;
    retryAt: string | null;
}

export class CollectionRunner {
    private running = false;
    private lastRunAt: Date | null = null;
    private lastResult: UpdateResult | null = null;
    private retryTimer: ReturnType<typeof setTimeout> | null = null;
    private retryAt: Date | null = null;
    private readonly now: () => Date;

    constructor(
        private readonly updater: DatasetUpdater,
        private readonly options: RunnerOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Run one cycle. Returns null when a cycle is already in progress.
     */
    async runCycle(): Promise<UpdateResult | null> {
        if (this.running) {
            console.log('[runner] Cycle already running, skipping.');
            return null;
        }
        this.running = true;
        this.clearRetry();

        const startedAt = this.now();
        console.log(`[runner] Starting collection at ${startedAt.toISOString()}`);

        let result: UpdateResult;
        try {
            result = await this.updater.updateDataset();
        } catch (error) {
            result = { ok: false, reason: `Unexpected error: ${String(error)}` };
        } finally {
            this.running = false;
        }

        this.lastRunAt = startedAt;
        this.lastResult = result;

        if (result.ok) {
            console.log(`[runner] Collection complete (${result.rowCount} rows in ${result.path})`);
        } else {
            console.warn(`[runner] Collection failed: ${result.reason}`);
            this.scheduleRetry();
        }
        return result;
    }

    status(): RunnerStatus {
        return {
            running: this.running,
            lastRunAt: this.lastRunAt?.toISOString() ?? null,
            lastResult: this.lastResult,
            retryAt: this.retryAt?.toISOString() ?? null
        };
    }

    /** Cancel a pending retry. */
    stop(): void {
        this.clearRetry();
    }

    private scheduleRetry(): void {
        if (this.retryTimer) return;
        const delayMs = this.options.retryDelayMinutes * 60_000;
        this.retryAt = new Date(this.now().getTime() + delayMs);
        console.log(`[runner] Retrying in ${this.options.retryDelayMinutes} minutes`);

        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.retryAt = null;
            this.runCycle().catch((error) => console.error('[runner] Retry failed:', error));
        }, delayMs);
        this.retryTimer.unref?.();
    }

    private clearRetry(): void {
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }
        this.retryAt = null;
    }
}
