import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { IntervalScheduler } from '../../src/monitors/scheduler.js';

describe('IntervalScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('rejects a non-positive interval', () => {
    expect(() => new IntervalScheduler(0, async () => undefined)).toThrow(RangeError);
  });

  it('runs immediately and then on every interval', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new IntervalScheduler(1000, task);

    scheduler.start();
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(2000);
    expect(task).toHaveBeenCalledTimes(4);

    await scheduler.stop();
  });

  it('ignores a second start', async () => {
    const task = vi.fn().mockResolvedValue(undefined);
    const scheduler = new IntervalScheduler(1000, task);

    scheduler.start();
    scheduler.start();

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isStarted()).toBe(true);
    await scheduler.stop();
  });

  it('skips ticks while a run is still in flight', async () => {
    let release: () => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<void>(resolve => {
          release = resolve;
        })
    );
    const scheduler = new IntervalScheduler(1000, task);

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(3000);
    expect(task).toHaveBeenCalledTimes(1);

    release();
    await scheduler.idle();
    expect(scheduler.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(2);

    release();
    await scheduler.stop();
  });

  it('keeps ticking after a failed run', async () => {
    const task = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue(undefined);
    const scheduler = new IntervalScheduler(1000, task);

    scheduler.start();
    await scheduler.idle();
    expect(console.error).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('survives a task that throws synchronously', async () => {
    const task = vi.fn(() => {
      throw new Error('sync boom');
    });
    const scheduler = new IntervalScheduler(1000, task);

    scheduler.start();
    await scheduler.idle();

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
    await scheduler.stop();
  });

  it('waits for the in-flight run when stopped', async () => {
    let finished = false;
    let release: () => void = () => undefined;
    const scheduler = new IntervalScheduler(1000, async () => {
      await new Promise<void>(resolve => {
        release = resolve;
      });
      finished = true;
    });

    scheduler.start();
    const stopped = scheduler.stop();
    expect(scheduler.isStarted()).toBe(false);

    release();
    await stopped;

    expect(finished).toBe(true);
    await vi.advanceTimersByTimeAsync(5000);
    expect(scheduler.isRunning()).toBe(false);
  });
});
