import { DateTime } from 'luxon';
import cron from 'node-cron';
import { errorMessage, logger } from '@/config/logger';
import { DeliveryWorker } from '@/infra/delivery/delivery-worker';
import { Clock, systemClock } from '@/shared/types';
import { DAY_FORMAT } from './timezone-resolver';
import { DailyScheduler } from './scheduler.service';

/**
 * Wraps a job so that a run still in progress makes the next trigger a no-op
 */
export class ExclusiveJob {
  private running: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly job: () => Promise<void>
  ) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  run = async (): Promise<boolean> => {
    if (this.running) {
      logger.warn({ job: this.name }, 'Previous run still in progress, skipping');
      return false;
    }

    this.running = this.job()
      .catch((error: unknown) => {
        logger.error({ job: this.name, error: errorMessage(error) }, 'Scheduled job failed');
      })
      .finally(() => {
        this.running = null;
      });

    await this.running;
    return true;
  };

  /**
   * Wait for an in-flight run, used on shutdown
   */
  drain = async (): Promise<void> => {
    if (this.running) {
      await this.running;
    }
  };
}

/**
 * Calendar days to schedule on each run. Every local day lies within one day of
 * the UTC date, so scheduling today and tomorrow reaches every zone before its window opens.
 */
export const daysToSchedule = (now: Date): string[] => {
  const today = DateTime.fromJSDate(now, { zone: 'utc' });
  return [today.toFormat(DAY_FORMAT), today.plus({ days: 1 }).toFormat(DAY_FORMAT)];
};

export interface CronJobsOptions {
  scheduleCron: string;
  tickCron: string;
  clock?: Clock;
}

export class CronJobs {
  readonly scheduleJob: ExclusiveJob;
  readonly tickJob: ExclusiveJob;
  private tasks: cron.ScheduledTask[] = [];
  private readonly clock: Clock;

  constructor(
    scheduler: DailyScheduler,
    worker: DeliveryWorker,
    private readonly options: CronJobsOptions
  ) {
    this.clock = options.clock ?? systemClock;

    for (const expression of [options.scheduleCron, options.tickCron]) {
      if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression: ${expression}`);
      }
    }

    this.scheduleJob = new ExclusiveJob('schedule', async () => {
      for (const day of daysToSchedule(this.clock())) {
        await scheduler.scheduleActive(day);
      }
    });

    this.tickJob = new ExclusiveJob('tick', async () => {
      await worker.tick();
    });
  }

  start = (): void => {
    this.tasks = [
      cron.schedule(this.options.scheduleCron, () => {
        void this.scheduleJob.run();
      }),
      cron.schedule(this.options.tickCron, () => {
        void this.tickJob.run();
      }),
    ];

    logger.info(
      { scheduleCron: this.options.scheduleCron, tickCron: this.options.tickCron },
      'Scheduler and delivery tick started'
    );
  };

  stop = async (): Promise<void> => {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];

    await Promise.all([this.scheduleJob.drain(), this.tickJob.drain()]);
    logger.info('Scheduler and delivery tick stopped');
  };
}
