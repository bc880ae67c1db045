/**
 * Runs a task on a fixed interval. A tick that fires while the previous run
 * is still in flight is skipped, so runs never overlap.
 */
export class IntervalScheduler {
  private intervalMs: number;
  private task: () => Promise<unknown>;
  private intervalId: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(intervalMs: number, task: () => Promise<unknown>) {
    if (!(intervalMs > 0)) {
      throw new RangeError(`Interval must be positive, got ${intervalMs}`);
    }
    this.intervalMs = intervalMs;
    this.task = task;
  }

  start(): void {
    if (this.intervalId) return;

    console.log(`[Scheduler] Starting (interval: ${this.intervalMs}ms)`);
    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.intervalMs);
  }

  /** Clears the timer and resolves once the in-flight run, if any, has finished. */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      console.log('[Scheduler] Stopped');
    }
    await this.idle();
  }

  /** Resolves once the current run, if any, has settled. */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  isStarted(): boolean {
    return this.intervalId !== null;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  private tick(): void {
    if (this.inFlight) {
      console.log('[Scheduler] Previous run still in progress; skipping tick');
      return;
    }

    this.inFlight = new Promise<unknown>(resolve => resolve(this.task()))
      .then(
        () => undefined,
        (error: unknown) => {
          console.error('[Scheduler] Scheduled task failed:', error);
        }
      )
      .finally(() => {
        this.inFlight = null;
      });
  }
}
