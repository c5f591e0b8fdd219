import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SweepReport } from '../../application/dto/CheckOutcomeDTO.js';
import { SweepScheduler } from './SweepScheduler.js';

const report: SweepReport = {
  startedAt: '2025-10-17T08:00:00.000Z',
  finishedAt: '2025-10-17T08:00:05.000Z',
  checked: 1,
  skipped: 0,
  notified: 0,
  timedOut: 0,
  failed: 0,
};

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('SweepScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs after the start delay and then on every interval', async () => {
    const sweep = vi.fn(async () => report);
    const scheduler = new SweepScheduler(sweep, { startDelayMs: 10_000, intervalMs: 300_000 }, createLogger());

    scheduler.start();
    expect(scheduler.state).toBe('waiting');

    await vi.advanceTimersByTimeAsync(9_999);
    expect(sweep).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(sweep).toHaveBeenCalledTimes(1);
    expect(scheduler.lastSweep).toEqual(report);

    await vi.advanceTimersByTimeAsync(300_000);
    expect(sweep).toHaveBeenCalledTimes(2);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(600_000);
    expect(sweep).toHaveBeenCalledTimes(2);
    expect(scheduler.state).toBe('stopped');
  });

  it('skips ticks while a sweep is still running', async () => {
    let finish: () => void = () => undefined;
    const sweep = vi.fn(
      () =>
        new Promise<SweepReport>((resolve) => {
          finish = () => resolve(report);
        }),
    );
    const logger = createLogger();
    const scheduler = new SweepScheduler(sweep, { startDelayMs: 0, intervalMs: 1_000 }, logger);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.state).toBe('running');

    await vi.advanceTimersByTimeAsync(2_000);
    expect(sweep).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(2);

    finish();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(sweep).toHaveBeenCalledTimes(2);

    finish();
    await scheduler.stop();
  });

  it('logs a failed sweep and keeps the schedule', async () => {
    const sweep = vi
      .fn<() => Promise<SweepReport>>()
      .mockRejectedValueOnce(new Error('database is locked'))
      .mockResolvedValue(report);
    const logger = createLogger();
    const scheduler = new SweepScheduler(sweep, { startDelayMs: 0, intervalMs: 1_000 }, logger);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(logger.error).toHaveBeenCalledWith('Balance sweep failed', { error: 'database is locked' });

    await vi.advanceTimersByTimeAsync(1_000);
    expect(sweep).toHaveBeenCalledTimes(2);
    expect(scheduler.lastSweep).toEqual(report);

    await scheduler.stop();
  });
});
