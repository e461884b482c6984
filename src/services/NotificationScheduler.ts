/**
 * NotificationScheduler - fires cron-scheduled jobs into the queue
 */

import { Mutex } from 'async-mutex';
import cron from 'node-cron';
import { Logger } from 'winston';
import { ScheduledJobPatch, ScheduledJobStore } from '../database/dao';
import {
  CreateScheduledJobData,
  QueuedJob,
  ScheduledJob,
  UpdateScheduledJobData,
} from '../database/models';
import { parseCron } from '../utils/cron';
import {
  AppError,
  ConflictError,
  errorMessage,
  NotFoundError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  createScheduledJobSchema,
  updateScheduledJobSchema,
  ValidationUtils,
} from '../utils/validation';
import { NotificationQueue } from './NotificationQueue';

export interface TickerHandle {
  stop(): void;
}

/**
 * Calls `onTick` on every occurrence of a cron expression
 */
export interface CronTicker {
  schedule(expression: string, onTick: () => void): TickerHandle;
}

export const nodeCronTicker: CronTicker = {
  schedule(expression, onTick) {
    const task = cron.schedule(expression, onTick);
    return { stop: () => task.stop() };
  },
};

export interface SchedulerStatus {
  running: boolean;
  registered_jobs: number;
}

export interface NotificationSchedulerOptions {
  ticker?: CronTicker;
  clock?: () => Date;
  validateServices?: (serviceUrls: readonly string[]) => void;
}

export class NotificationScheduler {
  private logger: Logger;
  private readonly ticker: CronTicker;
  private readonly clock: () => Date;
  private readonly tasks = new Map<number, TickerHandle>();
  private readonly lock = new Mutex();
  private running = false;

  constructor(
    private readonly store: ScheduledJobStore,
    private readonly queue: NotificationQueue,
    private readonly options: NotificationSchedulerOptions = {},
  ) {
    this.logger = createLogger('NotificationScheduler');
    this.ticker = options.ticker ?? nodeCronTicker;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Loads enabled jobs and registers them with the ticker
   */
  async start(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.running) {
        throw new AppError('Scheduler is already running', 'SCHEDULER_STATE');
      }

      const jobs = await this.store.list({ enabled: true });
      for (const job of jobs) {
        this.register(job);
      }
      this.running = true;

      this.logger.info('Scheduler started', { jobs: jobs.length });
    });
  }

  async stop(): Promise<void> {
    await this.lock.runExclusive(() => {
      if (!this.running) {
        throw new AppError('Scheduler is not running', 'SCHEDULER_STATE');
      }

      for (const task of this.tasks.values()) {
        task.stop();
      }
      this.tasks.clear();
      this.running = false;

      this.logger.info('Scheduler stopped');
    });
  }

  getStatus(): SchedulerStatus {
    return { running: this.running, registered_jobs: this.tasks.size };
  }

  async add(data: CreateScheduledJobData): Promise<ScheduledJob> {
    const input = ValidationUtils.parse(
      createScheduledJobSchema,
      data,
      'Invalid scheduled job',
    );
    this.options.validateServices?.(input.services);

    if (await this.store.findByName(input.name)) {
      throw new ConflictError(`Scheduled job '${input.name}' already exists`);
    }

    const now = this.clock();
    const job = await this.store.insert({
      ...input,
      created_at: now,
      updated_at: now,
      next_run: input.enabled ? parseCron(input.cron_expression).next(now) : null,
    });

    await this.lock.runExclusive(() => {
      if (this.running && job.enabled) {
        this.register(job);
      }
    });

    this.logger.info('Scheduled job added', {
      id: job.id,
      name: job.name,
      cron: job.cron_expression,
      next_run: job.next_run,
    });
    return job;
  }

  async get(id: number): Promise<ScheduledJob> {
    const job = await this.store.findById(id);
    if (!job) {
      throw new NotFoundError(`Scheduled job ${id}`);
    }
    return job;
  }

  async list(filter: { enabled?: boolean } = {}): Promise<ScheduledJob[]> {
    return this.store.list(filter);
  }

  /**
   * Applies changes; a new cron expression or enabled flag re-registers the
   * job with the ticker
   */
  async update(id: number, data: UpdateScheduledJobData): Promise<ScheduledJob> {
    const changes = ValidationUtils.parse(
      updateScheduledJobSchema,
      data,
      'Invalid scheduled job update',
    );
    const current = await this.get(id);

    if (changes.services) {
      this.options.validateServices?.(changes.services);
    }
    if (changes.name !== undefined && changes.name !== current.name) {
      const clash = await this.store.findByName(changes.name);
      if (clash) {
        throw new ConflictError(`Scheduled job '${changes.name}' already exists`);
      }
    }

    const now = this.clock();
    const scheduleChanged =
      changes.cron_expression !== undefined || changes.enabled !== undefined;
    const patch: ScheduledJobPatch = { ...changes, updated_at: now };

    if (scheduleChanged) {
      const enabled = changes.enabled ?? current.enabled;
      const expression = changes.cron_expression ?? current.cron_expression;
      patch.next_run = enabled ? parseCron(expression).next(now) : null;
    }

    const updated = await this.store.update(id, patch);
    if (!updated) {
      throw new NotFoundError(`Scheduled job ${id}`);
    }

    if (scheduleChanged) {
      await this.lock.runExclusive(() => {
        this.unregister(id);
        if (this.running && updated.enabled) {
          this.register(updated);
        }
      });
    }

    this.logger.info('Scheduled job updated', {
      id,
      fields: Object.keys(changes),
    });
    return updated;
  }

  async delete(id: number): Promise<void> {
    await this.lock.runExclusive(() => this.unregister(id));
    if (!(await this.store.delete(id))) {
      throw new NotFoundError(`Scheduled job ${id}`);
    }
    this.logger.info('Scheduled job deleted', { id });
  }

  async enable(id: number): Promise<ScheduledJob> {
    return this.update(id, { enabled: true });
  }

  async disable(id: number): Promise<ScheduledJob> {
    return this.update(id, { enabled: false });
  }

  /**
   * Fires a job immediately, outside its schedule
   */
  async runNow(id: number): Promise<QueuedJob> {
    const job = await this.get(id);
    return this.fire(job);
  }

  /**
   * One ticker occurrence. Disabled or deleted jobs are skipped.
   */
  async tick(id: number): Promise<QueuedJob | null> {
    const job = await this.store.findById(id);
    if (!job || !job.enabled) {
      this.logger.warn('Tick for missing or disabled job skipped', { id });
      return null;
    }

    try {
      return await this.fire(job);
    } catch (error) {
      this.logger.error('Scheduled job tick failed', {
        id,
        name: job.name,
        error: errorMessage(error),
      });
      return null;
    }
  }

  private async fire(job: ScheduledJob): Promise<QueuedJob> {
    const now = this.clock();
    const nextRun = job.enabled ? parseCron(job.cron_expression).next(now) : null;

    let queued: QueuedJob;
    try {
      queued = await this.queue.enqueue({
        scheduled_id: job.id,
        title: job.title,
        body: job.body,
        notify_type: job.notify_type,
        services: job.services,
        tags: job.tags,
        metadata: job.metadata,
        template_name: job.template_name,
        priority: ValidationUtils.metadataInt(job.metadata, 'priority', 1),
        max_retries: ValidationUtils.metadataInt(job.metadata, 'max_retries', 0),
        retry_delay_ms: ValidationUtils.metadataInt(
          job.metadata,
          'retry_delay_ms',
          1,
        ),
      });
    } catch (error) {
      // A tick that queued nothing is not a run
      await this.store.recordRun(
        job.id,
        {
          last_run: now,
          next_run: nextRun,
          last_status: `error: ${errorMessage(error)}`,
        },
        { counted: false },
      );
      throw error;
    }

    await this.store.recordRun(job.id, {
      last_run: now,
      next_run: nextRun,
      last_status: `queued job #${queued.id}`,
    });

    this.logger.info('Scheduled job fired', {
      id: job.id,
      name: job.name,
      queued_id: queued.id,
    });
    return queued;
  }

  private register(job: ScheduledJob): void {
    this.unregister(job.id);

    const task = this.ticker.schedule(job.cron_expression, () => {
      this.tick(job.id).catch((error: unknown) => {
        this.logger.error('Unhandled tick error', {
          id: job.id,
          error: errorMessage(error),
        });
      });
    });
    this.tasks.set(job.id, task);

    this.logger.debug('Job registered with ticker', {
      id: job.id,
      cron: job.cron_expression,
    });
  }

  private unregister(id: number): void {
    const task = this.tasks.get(id);
    if (task) {
      task.stop();
      this.tasks.delete(id);
    }
  }
}
