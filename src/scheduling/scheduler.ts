import * as cron from 'node-cron';
import { ConfigError } from '../errors';
import { CycleResult, FailedCycle } from '../triage/orchestrator';

export type FailurePolicy = 'continue' | 'exit';

export interface TriageSchedulerOptions {
  expression: string;
  timezone?: string;
  /** `continue` logs a failed cycle and waits for the next tick; `exit` hands it to `onFatal`. */
  failurePolicy?: FailurePolicy;
  onFatal?: (result: FailedCycle) => void;
}

/** Cron expression firing every `intervalHours` hours at `minute` past. */
export function buildCronExpression(intervalHours: number, minute: number): string {
  if (!Number.isInteger(intervalHours) || intervalHours < 1 || intervalHours > 24) {
    throw new ConfigError(`interval must be between 1 and 24 hours to be scheduled, got ${intervalHours}`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new ConfigError(`minute must be between 0 and 59, got ${minute}`);
  }
  return `${minute} */${intervalHours} * * *`;
}

export class TriageScheduler {
  private task: cron.ScheduledTask | null = null;
  private inFlight: Promise<CycleResult> | null = null;
  private stopped = false;

  constructor(
    private readonly runCycle: () => Promise<CycleResult>,
    private readonly options: TriageSchedulerOptions
  ) {
    if (!cron.validate(options.expression)) {
      throw new ConfigError(`invalid cron expression: ${options.expression}`);
    }
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.stopped = false;
    this.task = cron.schedule(
      this.options.expression,
      () => {
        this.tick().catch((error: unknown) => {
          console.error('❌ scheduled triage cycle crashed:', error);
        });
      },
      { timezone: this.options.timezone ?? 'UTC' }
    );
    console.log(`🗓️ triage scheduled at "${this.options.expression}" (${this.options.timezone ?? 'UTC'})`);
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Runs one cycle unless the scheduler is stopped or a cycle is already
   * running, in which case the tick is skipped and null returned.
   */
  async tick(): Promise<CycleResult | null> {
    if (this.stopped) {
      return null;
    }
    if (this.inFlight) {
      console.warn('⚠️ previous triage cycle still running, skipping this tick');
      return null;
    }

    const cycle = this.runCycle();
    this.inFlight = cycle;
    try {
      const result = await cycle;
      if (result.status === 'failed' && this.options.failurePolicy === 'exit') {
        this.options.onFatal?.(result);
      }
      return result;
    } finally {
      this.inFlight = null;
    }
  }

  /** Stops new ticks and waits for the running cycle, if any, to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.task?.stop();
    this.task = null;

    if (this.inFlight) {
      console.log('⏳ waiting for the running triage cycle to finish');
      await Promise.allSettled([this.inFlight]);
    }
  }
}
