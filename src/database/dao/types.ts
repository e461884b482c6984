/**
 * Storage contracts the services depend on. The DAOs in this directory
 * implement them against PostgreSQL.
 */

import {
  JobStatus,
  MetricsSample,
  NewMetricsSample,
  NewQueuedJob,
  NotificationTemplate,
  QueuedJob,
  QueuedJobPatch,
  QueueListFilter,
  ScheduledJob,
  ScheduledJobRunUpdate,
} from '../models';

export type NewScheduledJob = Omit<
  ScheduledJob,
  'id' | 'last_run' | 'last_status' | 'run_count'
>;

export type ScheduledJobPatch = Partial<
  Omit<
    ScheduledJob,
    'id' | 'created_at' | 'updated_at' | 'last_run' | 'last_status' | 'run_count'
  >
> & { updated_at: Date };

export interface ScheduledJobListFilter {
  enabled?: boolean;
}

export interface RecordRunOptions {
  /** False for ticks that failed to enqueue. */
  counted?: boolean;
}

export interface ScheduledJobStore {
  insert(job: NewScheduledJob): Promise<ScheduledJob>;
  findById(id: number): Promise<ScheduledJob | null>;
  findByName(name: string): Promise<ScheduledJob | null>;
  list(filter?: ScheduledJobListFilter): Promise<ScheduledJob[]>;
  update(id: number, patch: ScheduledJobPatch): Promise<ScheduledJob | null>;
  /**
   * Stores the outcome of a tick. run_count grows by one unless the tick is
   * recorded with `counted: false`.
   */
  recordRun(
    id: number,
    run: ScheduledJobRunUpdate,
    options?: RecordRunOptions,
  ): Promise<ScheduledJob | null>;
  delete(id: number): Promise<boolean>;
}

export interface QueueStore {
  insert(job: NewQueuedJob): Promise<QueuedJob>;
  findById(id: number): Promise<QueuedJob | null>;
  /**
   * Atomically moves up to `limit` due pending/retrying jobs to running.
   * A job is handed to at most one caller.
   */
  claimDue(now: Date, limit: number): Promise<QueuedJob[]>;
  /**
   * Applies `patch` only if the job's current status is one of `expected`.
   * Returns null when the job is missing or in another state.
   */
  compareAndSet(
    id: number,
    expected: readonly JobStatus[],
    patch: QueuedJobPatch,
  ): Promise<QueuedJob | null>;
  delete(id: number): Promise<boolean>;
  countByStatus(): Promise<Partial<Record<JobStatus, number>>>;
  list(filter: QueueListFilter): Promise<QueuedJob[]>;
  /** Removes completed and failed jobs finished before `cutoff`. */
  deleteFinishedBefore(cutoff: Date): Promise<number>;
}

export type NewTemplate = Omit<NotificationTemplate, 'id'>;

export type TemplatePatch = Partial<
  Pick<
    NotificationTemplate,
    'title_template' | 'body_template' | 'variables' | 'description'
  >
> & { updated_at: Date };

export interface TemplateStore {
  insert(template: NewTemplate): Promise<NotificationTemplate>;
  findByName(name: string): Promise<NotificationTemplate | null>;
  list(): Promise<NotificationTemplate[]>;
  update(name: string, patch: TemplatePatch): Promise<NotificationTemplate | null>;
  delete(name: string): Promise<boolean>;
}

export interface MetricsStore {
  insert(sample: NewMetricsSample): Promise<MetricsSample>;
  /** Samples with start <= timestamp < end, oldest first. */
  findSamples(start: Date, end: Date): Promise<MetricsSample[]>;
  deleteBefore(cutoff: Date): Promise<number>;
}
