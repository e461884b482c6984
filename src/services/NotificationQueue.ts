/**
 * NotificationQueue - durable priority queue with exponential-backoff retries
 */

import { Logger } from 'winston';
import { QueueStore } from '../database/dao';
import {
  EnqueueJobData,
  JOB_STATUSES,
  JobStatus,
  QueuedJob,
  QueuedJobPatch,
  QueueListFilter,
  QueueStats,
} from '../database/models';
import {
  AppError,
  errorMessage,
  NotFoundError,
  QueueStateError,
  ValidationError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { enqueueJobSchema, ValidationUtils } from '../utils/validation';

export const MAX_BACKOFF_MULTIPLIER = 64;

/**
 * Delay before the next attempt, given the retry count after increment:
 * base * min(2^(retryCount-1), 64)
 */
export const retryDelayFor = (baseDelayMs: number, retryCount: number): number =>
  baseDelayMs *
  Math.min(2 ** Math.max(retryCount - 1, 0), MAX_BACKOFF_MULTIPLIER);

export interface QueueDefaults {
  priority: number;
  maxRetries: number;
  retryDelayMs: number;
}

export const DEFAULT_QUEUE_DEFAULTS: Readonly<QueueDefaults> = {
  priority: 1,
  maxRetries: 3,
  retryDelayMs: 5 * 60 * 1000,
};

export interface NotificationQueueOptions {
  defaults?: Partial<QueueDefaults>;
  clock?: () => Date;
  /** Checks service URLs before anything is stored. */
  validateServices?: (serviceUrls: readonly string[]) => void;
}

export type EnqueueBatchResult =
  | { index: number; success: true; job: QueuedJob }
  | { index: number; success: false; error: string };

// Statuses a job may be in for each target status
const ALLOWED_SOURCES: Record<JobStatus, readonly JobStatus[]> = {
  pending: [],
  running: ['pending', 'retrying'],
  retrying: ['running'],
  completed: ['running'],
  failed: ['pending', 'running', 'retrying'],
};

export class NotificationQueue {
  private logger: Logger;
  private readonly defaults: QueueDefaults;
  private readonly clock: () => Date;

  constructor(
    private readonly store: QueueStore,
    private readonly options: NotificationQueueOptions = {},
  ) {
    this.logger = createLogger('NotificationQueue');
    this.defaults = { ...DEFAULT_QUEUE_DEFAULTS, ...options.defaults };
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validates and stores a new pending job
   */
  async enqueue(data: EnqueueJobData): Promise<QueuedJob> {
    const input = ValidationUtils.parse(enqueueJobSchema, data, 'Invalid job');
    this.options.validateServices?.(input.services);

    const now = this.clock();
    const job = await this.store.insert({
      scheduled_id: input.scheduled_id ?? null,
      title: input.title,
      body: input.body,
      notify_type: input.notify_type ?? 'info',
      services: input.services,
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
      template_name: input.template_name ?? null,
      priority: input.priority ?? this.defaults.priority,
      max_retries: input.max_retries ?? this.defaults.maxRetries,
      retry_count: 0,
      retry_delay_ms: input.retry_delay_ms ?? this.defaults.retryDelayMs,
      status: 'pending',
      error_message: '',
      created_at: now,
      scheduled_at: now,
    });

    this.logger.info('Job enqueued', {
      id: job.id,
      scheduled_id: job.scheduled_id,
      priority: job.priority,
      services: job.services.length,
    });
    return job;
  }

  /**
   * Enqueues each item independently; one bad item does not stop the rest
   */
  async enqueueBatch(
    items: readonly EnqueueJobData[],
  ): Promise<EnqueueBatchResult[]> {
    const results: EnqueueBatchResult[] = [];

    for (const [index, item] of items.entries()) {
      try {
        results.push({ index, success: true, job: await this.enqueue(item) });
      } catch (error) {
        // Storage failures are not per-item problems
        if (!(error instanceof AppError) || error.code === 'QUEUE_BACKEND_ERROR') {
          throw error;
        }
        results.push({ index, success: false, error: errorMessage(error) });
      }
    }

    return results;
  }

  /**
   * Leases up to `limit` due jobs, highest priority first. Each returned job
   * is already `running` and held by this caller alone.
   */
  async leaseDue(limit: number): Promise<QueuedJob[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('Lease limit must be a positive integer');
    }

    const jobs = await this.store.claimDue(this.clock(), limit);
    if (jobs.length > 0) {
      this.logger.debug('Leased jobs', { ids: jobs.map((job) => job.id) });
    }
    return jobs;
  }

  /**
   * Moves a job to `status`, applying the state machine's side effects
   */
  async transition(
    id: number,
    status: JobStatus,
    error?: string,
  ): Promise<QueuedJob> {
    const sources = ALLOWED_SOURCES[status];
    if (sources.length === 0) {
      throw new QueueStateError(`Jobs cannot be moved back to ${status}`);
    }

    const now = this.clock();
    let patch: QueuedJobPatch;

    switch (status) {
      case 'running':
        patch = { status, started_at: now };
        break;
      case 'completed':
        patch = {
          status,
          completed_at: now,
          next_retry_at: null,
          error_message: error ?? '',
        };
        break;
      case 'failed':
        patch = {
          status,
          completed_at: now,
          next_retry_at: null,
          error_message: error ?? '',
        };
        break;
      case 'retrying':
        patch = await this.retryPatch(id, now, error);
        break;
      default:
        throw new QueueStateError(`Unsupported target status: ${status}`);
    }

    const updated = await this.store.compareAndSet(id, sources, patch);
    if (!updated) {
      const current = await this.store.findById(id);
      if (!current) {
        throw new NotFoundError(`Queued job ${id}`);
      }
      throw new QueueStateError(
        `Cannot move job ${id} from ${current.status} to ${status}`,
      );
    }

    this.logger.info('Job state changed', {
      id,
      status,
      retry_count: updated.retry_count,
      next_retry_at: updated.next_retry_at,
    });
    return updated;
  }

  private async retryPatch(
    id: number,
    now: Date,
    error?: string,
  ): Promise<QueuedJobPatch> {
    const job = await this.get(id);
    if (job.retry_count >= job.max_retries) {
      throw new QueueStateError(
        `Job ${id} has no retries left (${job.retry_count}/${job.max_retries})`,
      );
    }

    const retryCount = job.retry_count + 1;
    const delay = retryDelayFor(job.retry_delay_ms, retryCount);

    return {
      status: 'retrying',
      retry_count: retryCount,
      next_retry_at: new Date(now.getTime() + delay),
      error_message: error ?? '',
    };
  }

  async get(id: number): Promise<QueuedJob> {
    const job = await this.store.findById(id);
    if (!job) {
      throw new NotFoundError(`Queued job ${id}`);
    }
    return job;
  }

  async delete(id: number): Promise<void> {
    if (!(await this.store.delete(id))) {
      throw new NotFoundError(`Queued job ${id}`);
    }
    this.logger.info('Job deleted', { id });
  }

  async list(filter: QueueListFilter = {}): Promise<QueuedJob[]> {
    return this.store.list(filter);
  }

  /**
   * Job counts per status plus a total
   */
  async stats(): Promise<QueueStats> {
    const counts = await this.store.countByStatus();
    const stats: QueueStats = {
      pending: 0,
      running: 0,
      retrying: 0,
      completed: 0,
      failed: 0,
      total: 0,
    };

    for (const status of JOB_STATUSES) {
      const count = counts[status] ?? 0;
      stats[status] = count;
      stats.total += count;
    }
    return stats;
  }

  /**
   * Removes completed and failed jobs that finished before `olderThan`
   */
  async purge(olderThan: Date): Promise<number> {
    const removed = await this.store.deleteFinishedBefore(olderThan);
    this.logger.info('Queue purged', { removed, olderThan });
    return removed;
  }
}
