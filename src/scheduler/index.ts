/**
 * Feedcast — Scheduler
 *
 * Fires the daily broadcast at a configured time of day and runs cache
 * maintenance on its own schedule. At most one broadcast runs at a time;
 * a firing that arrives while one is running is dropped, not queued.
 */

import cron from 'node-cron';
import type { DeliveryRecord } from '../types';
import { ConfigError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'scheduler' });

export type SchedulerState = 'idle' | 'running';

export type TriggerResult =
  | { status: 'completed'; records: DeliveryRecord[] }
  | { status: 'skipped' };

export interface ScheduleConfig {
  enabled: boolean;
  dailySendHour: number;
  dailySendMinute: number;
  timezone?: string;
  cachePurgeCron: string;
}

export interface SchedulerJobs {
  broadcast(): Promise<DeliveryRecord[]>;
  purgeCache(): Promise<number>;
}

/**
 * Cron expression firing once a day at hour:minute.
 */
export function dailyCronExpression(hour: number, minute: number): string {
  const issues: string[] = [];
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    issues.push(`hour must be an integer between 0 and 23, got ${hour}`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    issues.push(`minute must be an integer between 0 and 59, got ${minute}`);
  }
  if (issues.length > 0) {
    throw new ConfigError('Invalid daily schedule', issues);
  }

  return `${minute} ${hour} * * *`;
}

export class BroadcastScheduler {
  private state: SchedulerState = 'idle';
  private tasks: cron.ScheduledTask[] = [];

  constructor(
    private readonly jobs: SchedulerJobs,
    private readonly config: ScheduleConfig
  ) {}

  get currentState(): SchedulerState {
    return this.state;
  }

  /**
   * Run the broadcast unless one is already running.
   */
  async trigger(): Promise<TriggerResult> {
    // Check and set before the first await
    if (this.state === 'running') {
      log.info('Broadcast already running, dropping trigger');
      return { status: 'skipped' };
    }
    this.state = 'running';

    const startTime = Date.now();
    try {
      const records = await this.jobs.broadcast();
      log.info('Scheduled broadcast finished', {
        deliveries: records.length,
        durationMs: Date.now() - startTime,
      });
      return { status: 'completed', records };
    } catch (error) {
      log.error('Scheduled broadcast failed', {
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      });
      return { status: 'completed', records: [] };
    } finally {
      this.state = 'idle';
    }
  }

  async runMaintenance(): Promise<number> {
    try {
      return await this.jobs.purgeCache();
    } catch (error) {
      log.error('Cache maintenance failed', { error: errorMessage(error) });
      return 0;
    }
  }

  start(): void {
    if (this.tasks.length > 0) return;

    const { timezone } = this.config;

    if (!cron.validate(this.config.cachePurgeCron)) {
      throw new ConfigError('Invalid cache purge schedule', [
        `CACHE_PURGE_CRON: ${this.config.cachePurgeCron}`,
      ]);
    }

    if (this.config.enabled) {
      const expression = dailyCronExpression(this.config.dailySendHour, this.config.dailySendMinute);
      this.tasks.push(
        cron.schedule(expression, () => void this.trigger(), timezone ? { timezone } : undefined)
      );
      log.info('Daily broadcast scheduled', { cron: expression, timezone: timezone ?? 'local' });
    } else {
      log.info('Scheduled news disabled (ENABLE_SCHEDULED_NEWS=false)');
    }

    this.tasks.push(
      cron.schedule(this.config.cachePurgeCron, () => void this.runMaintenance(), timezone ? { timezone } : undefined)
    );
    log.info('Cache maintenance scheduled', { cron: this.config.cachePurgeCron });
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    log.info('Scheduler stopped');
  }
}
