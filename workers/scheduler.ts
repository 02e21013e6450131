import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';

export type SchedulerTimers = {
  setTimeout: (fn: () => void, ms: number) => ReturnType<typeof setTimeout>;
  clearTimeout: (handle: ReturnType<typeof setTimeout>) => void;
};

export type IntervalSchedulerOptions = {
  name: string;
  intervalMs: number;
  task: () => Promise<void>;
  /** Run once immediately on start instead of waiting a full interval. */
  runOnStart?: boolean;
  logger?: Logger;
  timers?: SchedulerTimers;
};

/** Longest delay Node's timers accept; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const defaultTimers: SchedulerTimers = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

/**
 * Repeats `task` every `intervalMs`. The next run is armed only after the
 * previous one settles, so runs of the same scheduler never overlap.
 */
export class IntervalScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private current: Promise<void> | null = null;
  private active = false;
  private readonly logger: Logger;
  private readonly timers: SchedulerTimers;

  constructor(private readonly options: IntervalSchedulerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`${options.name}: interval must be a positive number of milliseconds`);
    }
    if (options.intervalMs > MAX_TIMER_DELAY_MS) {
      throw new Error(`${options.name}: interval must be at most ${MAX_TIMER_DELAY_MS}ms`);
    }
    this.logger = options.logger ?? taggedLogger('scheduler');
    this.timers = options.timers ?? defaultTimers;
  }

  get running(): boolean {
    return this.active;
  }

  /** True while a run is executing. */
  get busy(): boolean {
    return this.current !== null;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.logger.info(`${this.options.name}: every ${Math.round(this.options.intervalMs / 1000)}s`);
    if (this.options.runOnStart) {
      this.fire();
    } else {
      this.arm();
    }
  }

  /** Cancels the pending run and waits for the one in progress, if any. */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      this.timers.clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
  }

  private arm(): void {
    if (!this.active) return;
    this.timer = this.timers.setTimeout(() => {
      this.timer = null;
      this.fire();
    }, this.options.intervalMs);
  }

  private fire(): void {
    this.current = this.runOnce().finally(() => {
      this.current = null;
      this.arm();
    });
  }

  private async runOnce(): Promise<void> {
    try {
      await this.options.task();
    } catch (error) {
      this.logger.error(`${this.options.name} failed: ${errorMessage(error)}`);
    }
  }
}
