import { logger } from '../utils/logger';
import type { CycleReport } from './job-pipeline';

export interface CycleRunner {
  runCycle(): Promise<CycleReport>;
}

/**
 * Calls back every ms until the returned cancel function is called
 */
export type ScheduleFunction = (callback: () => void, ms: number) => () => void;

const scheduleInterval: ScheduleFunction = (callback, ms) => {
  const handle = setInterval(callback, ms);
  return () => clearInterval(handle);
};

/**
 * Runs the pipeline once on start and then every intervalMs.
 * A tick that fires while a cycle is still running is dropped.
 */
export class CycleScheduler {
  private cancel: (() => void) | null = null;
  private inFlight: Promise<void> | null = null;
  private cycles = 0;

  constructor(
    private readonly runner: CycleRunner,
    private readonly intervalMs: number,
    private readonly schedule: ScheduleFunction = scheduleInterval
  ) {}

  get isStarted(): boolean {
    return this.cancel !== null;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  start(): void {
    if (this.cancel) return;

    logger.info(`Scheduler started, cycle every ${Math.round(this.intervalMs / 1000)}s`);
    this.cancel = this.schedule(() => {
      this.tick();
    }, this.intervalMs);
    this.tick();
  }

  /**
   * Stops future ticks and waits for the running cycle, if any
   */
  async stop(): Promise<void> {
    if (this.cancel) {
      this.cancel();
      this.cancel = null;
      logger.info('Scheduler stopped');
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Resolves once the cycle currently running (if any) has finished
   */
  async idle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (this.inFlight) {
      logger.warn('Previous cycle still running, skipping tick');
      return;
    }

    this.inFlight = this.runOnce().finally(() => {
      this.inFlight = null;
    });
  }

  private async runOnce(): Promise<void> {
    try {
      const report = await this.runner.runCycle();
      this.cycles++;
      if (report.errors.length > 0) {
        logger.warn(`Cycle finished with ${report.errors.length} error(s)`, {
          stages: [...new Set(report.errors.map(e => e.stage))],
        });
      }
    } catch (error) {
      logger.error('Cycle failed unexpectedly', error);
    }
  }
}
