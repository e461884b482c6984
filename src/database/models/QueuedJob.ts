/**
 * QueuedJob model - a materialized notification waiting in the durable queue
 */

import { NotifyType } from './Notification';

export const JOB_STATUSES = [
  'pending',
  'running',
  'retrying',
  'completed',
  'failed',
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface QueuedJob {
  id: number;
  scheduled_id: number | null;
  title: string;
  body: string;
  notify_type: NotifyType;
  services: string[];
  tags: string[];
  metadata: Record<string, string>;
  template_name: string | null;
  priority: number;
  max_retries: number;
  retry_count: number;
  retry_delay_ms: number;
  status: JobStatus;
  error_message: string;
  created_at: Date;
  scheduled_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  next_retry_at: Date | null;
}

export interface EnqueueJobData {
  scheduled_id?: number | null;
  title: string;
  body: string;
  notify_type?: NotifyType;
  services: string[];
  tags?: string[];
  metadata?: Record<string, string>;
  template_name?: string | null;
  priority?: number;
  max_retries?: number;
  retry_delay_ms?: number;
}

/**
 * Fully-defaulted row handed to the store on insert
 */
export type NewQueuedJob = Omit<
  QueuedJob,
  'id' | 'started_at' | 'completed_at' | 'next_retry_at'
>;

/**
 * Columns a state transition may change
 */
export interface QueuedJobPatch {
  status: JobStatus;
  error_message?: string;
  retry_count?: number;
  started_at?: Date | null;
  completed_at?: Date | null;
  next_retry_at?: Date | null;
}

export interface QueueListFilter {
  status?: JobStatus;
  scheduled_id?: number;
  limit?: number;
}

export type QueueStats = Record<JobStatus | 'total', number>;
