import type { SweepReport } from '../../application/dto/CheckOutcomeDTO.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';

export interface SweepSchedulerOptions {
  startDelayMs: number;
  intervalMs: number;
}

export type SchedulerState = 'idle' | 'waiting' | 'running' | 'stopped';

export class SweepScheduler {
  private startTimer: NodeJS.Timeout | undefined;
  private intervalTimer: NodeJS.Timeout | undefined;
  private current: Promise<void> | null = null;
  private started = false;
  private stopped = false;
  private lastReport: SweepReport | null = null;

  constructor(
    private readonly sweep: () => Promise<SweepReport>,
    private readonly options: SweepSchedulerOptions,
    private readonly logger: LoggerPort,
  ) {}

  start(): void {
    if (this.started || this.stopped) {
      return;
    }

    this.started = true;
    this.logger.info('Balance sweeps scheduled', {
      startDelayMs: this.options.startDelayMs,
      intervalMs: this.options.intervalMs,
    });

    this.startTimer = setTimeout(() => {
      this.startTimer = undefined;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.options.intervalMs);
    }, this.options.startDelayMs);
  }

  /** Stops future ticks and waits for a sweep already underway. */
  async stop(): Promise<void> {
    this.stopped = true;
    clearTimeout(this.startTimer);
    clearInterval(this.intervalTimer);
    this.startTimer = undefined;
    this.intervalTimer = undefined;

    if (this.current) {
      await this.current;
    }
  }

  get state(): SchedulerState {
    if (this.stopped) {
      return 'stopped';
    }
    if (this.current) {
      return 'running';
    }
    return this.started ? 'waiting' : 'idle';
  }

  get lastSweep(): SweepReport | null {
    return this.lastReport;
  }

  private tick(): void {
    if (this.stopped) {
      return;
    }

    if (this.current) {
      this.logger.warn('Previous sweep still running, skipping this tick');
      return;
    }

    this.current = this.runOnce().finally(() => {
      this.current = null;
    });
  }

  private async runOnce(): Promise<void> {
    try {
      this.lastReport = await this.sweep();
    } catch (error) {
      this.logger.error('Balance sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
