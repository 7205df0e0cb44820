import { describe, it, expect, vi, afterEach } from 'vitest';
import type { AutoCloseSummary } from '@barflow/module-orders';
import { startAutoCloseJob } from '../jobs/auto-close';

const emptySummary: AutoCloseSummary = { checked: 2, closed: [], failed: [] };

describe('startAutoCloseJob', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the current time and default timezone to each run', async () => {
    const run = vi.fn(async () => emptySummary);
    const job = startAutoCloseJob({ intervalMs: 0, defaultTimezone: 'Europe/Zurich', run });

    await expect(job.tick()).resolves.toBe(true);

    expect(run).toHaveBeenCalledWith(expect.any(Date), 'Europe/Zurich');
    job.stop();
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: (summary: AutoCloseSummary) => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<AutoCloseSummary>((resolve) => {
          finish = resolve;
        }),
    );
    const job = startAutoCloseJob({ intervalMs: 0, defaultTimezone: 'UTC', run });

    const first = job.tick();
    await expect(job.tick()).resolves.toBe(false);
    finish(emptySummary);

    await expect(first).resolves.toBe(true);
    expect(run).toHaveBeenCalledOnce();
    await expect(job.tick()).resolves.toBe(true);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('survives a failed run', async () => {
    const run = vi
      .fn<(now: Date, tz: string) => Promise<AutoCloseSummary>>()
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValueOnce(emptySummary);
    const job = startAutoCloseJob({ intervalMs: 0, defaultTimezone: 'UTC', run });

    await expect(job.tick()).resolves.toBe(true);
    await expect(job.tick()).resolves.toBe(true);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('runs on its interval until stopped', async () => {
    vi.useFakeTimers();
    const run = vi.fn(async () => emptySummary);
    const job = startAutoCloseJob({ intervalMs: 60_000, defaultTimezone: 'UTC', run });

    await vi.advanceTimersByTimeAsync(180_000);
    expect(run).toHaveBeenCalledTimes(3);

    job.stop();
    await vi.advanceTimersByTimeAsync(180_000);
    expect(run).toHaveBeenCalledTimes(3);
  });
});
