/**
 * QueueDAO - data access for the durable notification queue
 */

import { z } from 'zod';
import { Logger } from 'winston';
import { db, Queryable } from '../connection';
import {
  JobStatus,
  NewQueuedJob,
  QueuedJob,
  QueuedJobPatch,
  QueueListFilter,
} from '../models';
import { createLogger } from '../../utils/logger';
import { handleDatabaseError } from '../../utils/errors';
import {
  jobStatusSchema,
  metadataColumnSchema,
  notifyTypeSchema,
  servicesColumnSchema,
  tagsColumnSchema,
  ValidationUtils,
} from '../../utils/validation';
import { QueueStore } from './types';

const NANOS_PER_MILLI = 1_000_000;

const queuedJobRowSchema = z.object({
  id: z.coerce.number().int(),
  scheduled_id: z.coerce.number().int().nullable(),
  title: z.string(),
  body: z.string(),
  notify_type: notifyTypeSchema,
  services: z.unknown(),
  tags: z.unknown(),
  metadata: z.unknown(),
  template: z.string().nullable(),
  priority: z.coerce.number().int(),
  max_retries: z.coerce.number().int(),
  retry_count: z.coerce.number().int(),
  // BIGINT arrives as a string from pg
  retry_delay_ns: z.coerce.number(),
  status: jobStatusSchema,
  error_message: z.string().nullable(),
  created_at: z.date(),
  scheduled_at: z.date(),
  started_at: z.date().nullable(),
  completed_at: z.date().nullable(),
  next_retry_at: z.date().nullable(),
});

const statusCountRowSchema = z.object({
  status: jobStatusSchema,
  count: z.coerce.number().int(),
});

export const mapQueuedJobRow = (raw: unknown): QueuedJob => {
  const row = ValidationUtils.parse(
    queuedJobRowSchema,
    raw,
    'Corrupt notification_queue row',
  );

  return {
    id: row.id,
    scheduled_id: row.scheduled_id,
    title: row.title,
    body: row.body,
    notify_type: row.notify_type,
    services: ValidationUtils.parseJsonColumn(
      row.services,
      servicesColumnSchema,
      [],
      'services',
    ),
    tags: ValidationUtils.parseJsonColumn(row.tags, tagsColumnSchema, [], 'tags'),
    metadata: ValidationUtils.parseJsonColumn(
      row.metadata,
      metadataColumnSchema,
      {},
      'metadata',
    ),
    template_name: row.template === '' ? null : row.template,
    priority: row.priority,
    max_retries: row.max_retries,
    retry_count: row.retry_count,
    retry_delay_ms: Math.round(row.retry_delay_ns / NANOS_PER_MILLI),
    status: row.status,
    error_message: row.error_message ?? '',
    created_at: row.created_at,
    scheduled_at: row.scheduled_at,
    started_at: row.started_at,
    completed_at: row.completed_at,
    next_retry_at: row.next_retry_at,
  };
};

/**
 * Lease order within one batch: priority DESC, created_at ASC, id ASC
 */
export const compareLeaseOrder = (a: QueuedJob, b: QueuedJob): number =>
  b.priority - a.priority ||
  a.created_at.getTime() - b.created_at.getTime() ||
  a.id - b.id;

export class QueueDAO implements QueueStore {
  private logger: Logger;

  constructor(private readonly client: Queryable = db) {
    this.logger = createLogger('QueueDAO');
  }

  async insert(job: NewQueuedJob): Promise<QueuedJob> {
    try {
      const query = `
        INSERT INTO notification_queue (
          scheduled_id, title, body, notify_type, services, tags, metadata,
          template, priority, max_retries, retry_count, retry_delay_ns,
          status, error_message, created_at, scheduled_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
        RETURNING *
      `;

      const values = [
        job.scheduled_id,
        job.title,
        job.body,
        job.notify_type,
        JSON.stringify(job.services),
        JSON.stringify(job.tags),
        JSON.stringify(job.metadata),
        job.template_name,
        job.priority,
        job.max_retries,
        job.retry_count,
        job.retry_delay_ms * NANOS_PER_MILLI,
        job.status,
        job.error_message,
        job.created_at,
        job.scheduled_at,
      ];

      const result = await this.client.query(query, values);
      return mapQueuedJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error inserting queued job', {
        scheduled_id: job.scheduled_id,
      });
      throw handleDatabaseError(error, 'Enqueue job');
    }
  }

  async findById(id: number): Promise<QueuedJob | null> {
    try {
      const result = await this.client.query(
        'SELECT * FROM notification_queue WHERE id = $1',
        [id],
      );
      return result.rows.length === 0 ? null : mapQueuedJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error getting queued job by ID', { id });
      throw handleDatabaseError(error, 'Get queued job');
    }
  }

  /**
   * Leases due jobs in one statement. SKIP LOCKED keeps concurrent workers
   * from picking the same rows.
   */
  async claimDue(now: Date, limit: number): Promise<QueuedJob[]> {
    try {
      const query = `
        UPDATE notification_queue q
        SET status = 'running', started_at = $1
        FROM (
          SELECT id
          FROM notification_queue
          WHERE status IN ('pending', 'retrying')
            AND (next_retry_at IS NULL OR next_retry_at <= $1)
          ORDER BY priority DESC, created_at ASC, id ASC
          LIMIT $2
          FOR UPDATE SKIP LOCKED
        ) due
        WHERE q.id = due.id
        RETURNING q.*
      `;

      const result = await this.client.query(query, [now, limit]);
      // RETURNING does not preserve the subquery order
      return result.rows.map(mapQueuedJobRow).sort(compareLeaseOrder);
    } catch (error) {
      this.logger.error('Error leasing due jobs', { limit });
      throw handleDatabaseError(error, 'Lease due jobs');
    }
  }

  async compareAndSet(
    id: number,
    expected: readonly JobStatus[],
    patch: QueuedJobPatch,
  ): Promise<QueuedJob | null> {
    try {
      const updates: string[] = [];
      const values: unknown[] = [id, [...expected]];
      let valueIndex = 3;

      const set = (column: string, value: unknown): void => {
        updates.push(`${column} = $${valueIndex++}`);
        values.push(value);
      };

      set('status', patch.status);
      if (patch.error_message !== undefined) {
        set('error_message', patch.error_message);
      }
      if (patch.retry_count !== undefined) set('retry_count', patch.retry_count);
      if (patch.started_at !== undefined) set('started_at', patch.started_at);
      if (patch.completed_at !== undefined) {
        set('completed_at', patch.completed_at);
      }
      if (patch.next_retry_at !== undefined) {
        set('next_retry_at', patch.next_retry_at);
      }

      const query = `
        UPDATE notification_queue
        SET ${updates.join(', ')}
        WHERE id = $1 AND status = ANY($2)
        RETURNING *
      `;

      const result = await this.client.query(query, values);
      return result.rows.length === 0 ? null : mapQueuedJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error updating queued job state', {
        id,
        status: patch.status,
      });
      throw handleDatabaseError(error, 'Transition queued job');
    }
  }

  async delete(id: number): Promise<boolean> {
    try {
      const result = await this.client.query(
        'DELETE FROM notification_queue WHERE id = $1',
        [id],
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      this.logger.error('Error deleting queued job', { id });
      throw handleDatabaseError(error, 'Delete queued job');
    }
  }

  async countByStatus(): Promise<Partial<Record<JobStatus, number>>> {
    try {
      const result = await this.client.query(
        'SELECT status, COUNT(*)::int AS count FROM notification_queue GROUP BY status',
      );

      const counts: Partial<Record<JobStatus, number>> = {};
      for (const raw of result.rows) {
        const row = ValidationUtils.parse(
          statusCountRowSchema,
          raw,
          'Corrupt queue stats row',
        );
        counts[row.status] = row.count;
      }
      return counts;
    } catch (error) {
      this.logger.error('Error counting queued jobs');
      throw handleDatabaseError(error, 'Queue stats');
    }
  }

  /**
   * Lists queued jobs, newest first
   */
  async list(filter: QueueListFilter): Promise<QueuedJob[]> {
    try {
      const conditions: string[] = [];
      const values: unknown[] = [];
      let valueIndex = 1;

      if (filter.status !== undefined) {
        conditions.push(`status = $${valueIndex++}`);
        values.push(filter.status);
      }
      if (filter.scheduled_id !== undefined) {
        conditions.push(`scheduled_id = $${valueIndex++}`);
        values.push(filter.scheduled_id);
      }

      const where = conditions.length
        ? `WHERE ${conditions.join(' AND ')}`
        : '';
      values.push(filter.limit ?? 100);

      const query = `
        SELECT * FROM notification_queue
        ${where}
        ORDER BY created_at DESC, id DESC
        LIMIT $${valueIndex}
      `;

      const result = await this.client.query(query, values);
      return result.rows.map(mapQueuedJobRow);
    } catch (error) {
      this.logger.error('Error listing queued jobs', { filter });
      throw handleDatabaseError(error, 'List queued jobs');
    }
  }

  async deleteFinishedBefore(cutoff: Date): Promise<number> {
    try {
      const result = await this.client.query(
        `DELETE FROM notification_queue
         WHERE status IN ('completed', 'failed') AND completed_at < $1`,
        [cutoff],
      );
      const removed = result.rowCount ?? 0;
      this.logger.info('Purged finished queued jobs', { removed, cutoff });
      return removed;
    } catch (error) {
      this.logger.error('Error purging queued jobs', { cutoff });
      throw handleDatabaseError(error, 'Purge queue');
    }
  }
}
