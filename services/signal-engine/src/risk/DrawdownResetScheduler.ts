/**
 * DrawdownResetScheduler
 *
 * Runs the daily drawdown reset at a fixed wall-clock time (node-cron,
 * operator timezone). Failed accounts are retried with exponential backoff;
 * the daily schedule keeps running regardless.
 */

import * as cron from 'node-cron';
import { AccountRef } from '@signalbridge/shared-types';
import { DrawdownConfig } from '@signalbridge/shared-config';
import { Logger, errorMessage, formatDateForOperator } from '@signalbridge/shared-utils';
import { DrawdownGuard } from './DrawdownGuard';

const logger = new Logger('DrawdownResetScheduler');

const MAX_RETRIES = 5;

export class DrawdownResetScheduler {
  private cronJob: cron.ScheduledTask | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private currentRun: Promise<void> | null = null;
  private isRunning: boolean = false;

  constructor(
    private guard: DrawdownGuard,
    private accounts: () => AccountRef[],
    private config: DrawdownConfig
  ) {}

  start(): void {
    if (this.isRunning) {
      logger.warn('[DrawdownResetScheduler] Scheduler is already running');
      return;
    }
    if (!cron.validate(this.config.resetCron)) {
      throw new Error(`Invalid drawdown reset schedule: ${this.config.resetCron}`);
    }

    this.cronJob = cron.schedule(
      this.config.resetCron,
      async () => {
        await this.trigger(this.accounts(), 0);
      },
      {
        scheduled: false,
        timezone: this.config.timezone,
      }
    );
    this.cronJob.start();
    this.isRunning = true;
    logger.info(
      `[DrawdownResetScheduler] Daily reset scheduled (${this.config.resetCron}, ${this.config.timezone})`
    );
  }

  /**
   * Stop scheduling and wait for an in-flight reset to finish
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    if (this.currentRun) {
      await this.currentRun;
    }
    logger.info('[DrawdownResetScheduler] Stopped');
  }

  /**
   * Reset the given accounts now. Resolves once this attempt finishes;
   * retries are scheduled in the background.
   */
  async trigger(accounts: AccountRef[], attempt: number = 0): Promise<void> {
    const run = this.runReset(accounts, attempt);
    this.currentRun = run;
    try {
      await run;
    } finally {
      if (this.currentRun === run) {
        this.currentRun = null;
      }
    }
  }

  retryDelayMs(attempt: number): number {
    const minutes = Math.min(this.config.retryBaseMinutes * Math.pow(2, attempt), this.config.retryMaxMinutes);
    return minutes * 60_000;
  }

  private async runReset(accounts: AccountRef[], attempt: number): Promise<void> {
    logger.info(
      `[DrawdownResetScheduler] Running ${formatDateForOperator(new Date(), this.config.timezone)} reset for ` +
        `${accounts.length} account(s) (attempt ${attempt + 1})`
    );
    let failedIds: string[];
    try {
      failedIds = await this.guard.resetAll(accounts);
    } catch (error) {
      logger.error(`[DrawdownResetScheduler] Reset run failed: ${errorMessage(error)}`);
      failedIds = accounts.map(account => account.id);
    }

    if (failedIds.length === 0) {
      return;
    }
    if (attempt + 1 >= MAX_RETRIES) {
      logger.error(`[DrawdownResetScheduler] Giving up on ${failedIds.join(', ')} until the next scheduled reset`);
      return;
    }
    if (!this.isRunning) {
      return;
    }

    const failed = accounts.filter(account => failedIds.includes(account.id));
    const delay = this.retryDelayMs(attempt);
    logger.warn(`[DrawdownResetScheduler] Retrying ${failedIds.join(', ')} in ${delay / 60_000} minute(s)`);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.trigger(failed, attempt + 1).catch(error =>
        logger.error(`[DrawdownResetScheduler] Retry failed: ${errorMessage(error)}`)
      );
    }, delay);
  }
}
