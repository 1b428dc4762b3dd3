import { Logger } from '../core/logger.js';
import type { CycleReport } from './cycle.js';

export interface CycleRunner {
  runCycle(signal?: AbortSignal): Promise<CycleReport>;
}

export interface ScanSchedulerParams {
  cycle: CycleRunner;
  intervalMinutes: number;
  logger?: Logger;
  onReport?: (report: CycleReport) => void | Promise<void>;
}

/**
 * Runs a cycle now and then every `intervalMinutes`. A run that comes due
 * while the previous one is still going is skipped, never queued.
 */
export class ScanScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<CycleReport | null> | null = null;
  private controller = new AbortController();
  private logger: Logger;

  constructor(private params: ScanSchedulerParams) {
    this.logger = params.logger ?? new Logger('info');
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (this.timer) return;
    this.controller = new AbortController();
    const intervalMs = Math.max(1, this.params.intervalMinutes * 60_000);
    this.timer = setInterval(() => {
      this.trigger().catch((err) => this.logger.error('Scheduled cycle failed', err));
    }, intervalMs);
    this.trigger().catch((err) => this.logger.error('Initial cycle failed', err));
  }

  /** Runs one cycle unless one is in flight; resolves null when skipped. */
  async trigger(): Promise<CycleReport | null> {
    if (this.running) {
      this.logger.warn('Previous cycle still running; skipping this run');
      return null;
    }
    const run = this.execute();
    this.running = run;
    try {
      return await run;
    } finally {
      this.running = null;
    }
  }

  /** Stops the interval, aborts the in-flight cycle and waits for it to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();
    if (this.running) {
      await this.running;
    }
  }

  private async execute(): Promise<CycleReport | null> {
    try {
      const report = await this.params.cycle.runCycle(this.controller.signal);
      await this.params.onReport?.(report);
      return report;
    } catch (error) {
      this.logger.error('Cycle failed', error);
      return null;
    }
  }
}
