import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { UpdateResult } from '../../forecast/ingest/collector';
import { CollectionRunner } from '../runner';

const SUCCESS: UpdateResult = { ok: true, path: '/srv/forecast/data.csv', rowCount: 48, fetchedRows: 24 };
const FAILURE: UpdateResult = { ok: false, reason: 'Fetch failed: Error: offline' };
const RETRY_MS = 10 * 60_000;
const now = () => new Date('2025-02-18T06:00:00.000Z');

describe('CollectionRunner', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('records a successful cycle', async () => {
        const updateDataset = vi.fn(async () => SUCCESS);
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        expect(await runner.runCycle()).toBe(SUCCESS);
        expect(runner.status()).toEqual({
            running: false,
            lastRunAt: '2025-02-18T06:00:00.000Z',
            lastResult: SUCCESS,
            retryAt: null
        });
    });

    it('retries a failed cycle after the delay', async () => {
        const updateDataset = vi.fn<() => Promise<UpdateResult>>().mockResolvedValueOnce(FAILURE).mockResolvedValue(SUCCESS);
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        expect(await runner.runCycle()).toBe(FAILURE);
        expect(runner.status().retryAt).toBe('2025-02-18T06:10:00.000Z');

        await vi.advanceTimersByTimeAsync(RETRY_MS - 1);
        expect(updateDataset).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1);
        expect(updateDataset).toHaveBeenCalledTimes(2);
        expect(runner.status().retryAt).toBeNull();
    });

    it('turns a thrown error into a failed result', async () => {
        const updateDataset = vi.fn(async (): Promise<UpdateResult> => {
            throw new Error('boom');
        });
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        expect(await runner.runCycle()).toEqual({ ok: false, reason: 'Unexpected error: Error: boom' });
        runner.stop();
    });

    it('skips a cycle while another is running', async () => {
        let finish: (result: UpdateResult) => void = () => {};
        const updateDataset = vi.fn(
            () =>
                new Promise<UpdateResult>((resolve) => {
                    finish = resolve;
                })
        );
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        const first = runner.runCycle();
        expect(runner.status().running).toBe(true);
        expect(await runner.runCycle()).toBeNull();

        finish(SUCCESS);
        expect(await first).toBe(SUCCESS);
        expect(updateDataset).toHaveBeenCalledTimes(1);
        expect(runner.status().running).toBe(false);
    });

    it('cancels a pending retry on stop', async () => {
        const updateDataset = vi.fn(async () => FAILURE);
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        await runner.runCycle();
        runner.stop();
        await vi.advanceTimersByTimeAsync(RETRY_MS * 2);

        expect(updateDataset).toHaveBeenCalledTimes(1);
        expect(runner.status().retryAt).toBeNull();
    });

    it('replaces a pending retry when a scheduled cycle runs first', async () => {
        const updateDataset = vi.fn<() => Promise<UpdateResult>>().mockResolvedValueOnce(FAILURE).mockResolvedValue(SUCCESS);
        const runner = new CollectionRunner({ updateDataset }, { retryDelayMinutes: 10, now });

        await runner.runCycle();
        await runner.runCycle();
        await vi.advanceTimersByTimeAsync(RETRY_MS);

        expect(updateDataset).toHaveBeenCalledTimes(2);
    });
});
