/**
 * ScheduledJobDAO - data access for cron-triggered job definitions
 */

import { z } from 'zod';
import { Logger } from 'winston';
import { db, Queryable } from '../connection';
import { ScheduledJob, ScheduledJobRunUpdate } from '../models';
import { createLogger } from '../../utils/logger';
import { handleDatabaseError } from '../../utils/errors';
import {
  metadataColumnSchema,
  notifyTypeSchema,
  servicesColumnSchema,
  tagsColumnSchema,
  ValidationUtils,
} from '../../utils/validation';
import {
  NewScheduledJob,
  RecordRunOptions,
  ScheduledJobListFilter,
  ScheduledJobPatch,
  ScheduledJobStore,
} from './types';

const scheduledJobRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  cron_expression: z.string(),
  title: z.string(),
  body: z.string(),
  notify_type: notifyTypeSchema,
  services: z.unknown(),
  tags: z.unknown(),
  metadata: z.unknown(),
  template: z.string().nullable(),
  enabled: z.boolean(),
  created_at: z.date(),
  updated_at: z.date(),
  next_run: z.date().nullable(),
  last_run: z.date().nullable(),
  last_status: z.string().nullable(),
  run_count: z.coerce.number().int(),
});

export const mapScheduledJobRow = (raw: unknown): ScheduledJob => {
  const row = ValidationUtils.parse(
    scheduledJobRowSchema,
    raw,
    'Corrupt scheduled_jobs row',
  );

  return {
    id: row.id,
    name: row.name,
    cron_expression: row.cron_expression,
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
    enabled: row.enabled,
    created_at: row.created_at,
    updated_at: row.updated_at,
    next_run: row.next_run,
    last_run: row.last_run,
    last_status: row.last_status ?? '',
    run_count: row.run_count,
  };
};

export class ScheduledJobDAO implements ScheduledJobStore {
  private logger: Logger;

  constructor(private readonly client: Queryable = db) {
    this.logger = createLogger('ScheduledJobDAO');
  }

  /**
   * Creates a scheduled job; a duplicate name raises ConflictError
   */
  async insert(job: NewScheduledJob): Promise<ScheduledJob> {
    try {
      const query = `
        INSERT INTO scheduled_jobs (
          name, cron_expression, title, body, notify_type,
          services, tags, metadata, template, enabled,
          created_at, updated_at, next_run
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
        RETURNING *
      `;

      const values = [
        job.name,
        job.cron_expression,
        job.title,
        job.body,
        job.notify_type,
        JSON.stringify(job.services),
        JSON.stringify(job.tags),
        JSON.stringify(job.metadata),
        job.template_name,
        job.enabled,
        job.created_at,
        job.updated_at,
        job.next_run,
      ];

      const result = await this.client.query(query, values);
      const created = mapScheduledJobRow(result.rows[0]);

      this.logger.info('Scheduled job created', {
        id: created.id,
        name: created.name,
      });

      return created;
    } catch (error) {
      this.logger.error('Error creating scheduled job', { name: job.name });
      throw handleDatabaseError(error, 'Create scheduled job');
    }
  }

  async findById(id: number): Promise<ScheduledJob | null> {
    try {
      const result = await this.client.query(
        'SELECT * FROM scheduled_jobs WHERE id = $1',
        [id],
      );
      return result.rows.length === 0 ? null : mapScheduledJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error getting scheduled job by ID', { id });
      throw handleDatabaseError(error, 'Get scheduled job');
    }
  }

  async findByName(name: string): Promise<ScheduledJob | null> {
    try {
      const result = await this.client.query(
        'SELECT * FROM scheduled_jobs WHERE name = $1',
        [name],
      );
      return result.rows.length === 0 ? null : mapScheduledJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error getting scheduled job by name', { name });
      throw handleDatabaseError(error, 'Get scheduled job');
    }
  }

  /**
   * Lists jobs ordered by id, optionally only enabled or disabled ones
   */
  async list(filter: ScheduledJobListFilter = {}): Promise<ScheduledJob[]> {
    try {
      let query = 'SELECT * FROM scheduled_jobs';
      const values: unknown[] = [];

      if (filter.enabled !== undefined) {
        query += ' WHERE enabled = $1';
        values.push(filter.enabled);
      }
      query += ' ORDER BY id ASC';

      const result = await this.client.query(query, values);
      return result.rows.map(mapScheduledJobRow);
    } catch (error) {
      this.logger.error('Error listing scheduled jobs', { filter });
      throw handleDatabaseError(error, 'List scheduled jobs');
    }
  }

  async update(
    id: number,
    patch: ScheduledJobPatch,
  ): Promise<ScheduledJob | null> {
    try {
      const updates: string[] = [];
      const values: unknown[] = [];
      let valueIndex = 1;

      const set = (column: string, value: unknown): void => {
        updates.push(`${column} = $${valueIndex++}`);
        values.push(value);
      };

      if (patch.name !== undefined) set('name', patch.name);
      if (patch.cron_expression !== undefined) {
        set('cron_expression', patch.cron_expression);
      }
      if (patch.title !== undefined) set('title', patch.title);
      if (patch.body !== undefined) set('body', patch.body);
      if (patch.notify_type !== undefined) set('notify_type', patch.notify_type);
      if (patch.services !== undefined) {
        set('services', JSON.stringify(patch.services));
      }
      if (patch.tags !== undefined) set('tags', JSON.stringify(patch.tags));
      if (patch.metadata !== undefined) {
        set('metadata', JSON.stringify(patch.metadata));
      }
      if (patch.template_name !== undefined) {
        set('template', patch.template_name);
      }
      if (patch.enabled !== undefined) set('enabled', patch.enabled);
      if (patch.next_run !== undefined) set('next_run', patch.next_run);
      set('updated_at', patch.updated_at);

      values.push(id);
      const query = `
        UPDATE scheduled_jobs
        SET ${updates.join(', ')}
        WHERE id = $${valueIndex}
        RETURNING *
      `;

      const result = await this.client.query(query, values);
      if (result.rows.length === 0) {
        return null;
      }

      this.logger.info('Scheduled job updated', {
        id,
        fields: Object.keys(patch),
      });
      return mapScheduledJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error updating scheduled job', { id });
      throw handleDatabaseError(error, 'Update scheduled job');
    }
  }

  async recordRun(
    id: number,
    run: ScheduledJobRunUpdate,
    options: RecordRunOptions = {},
  ): Promise<ScheduledJob | null> {
    const increment = options.counted === false ? 0 : 1;
    try {
      const query = `
        UPDATE scheduled_jobs
        SET last_run = $2,
            next_run = $3,
            last_status = $4,
            run_count = run_count + $5,
            updated_at = $2
        WHERE id = $1
        RETURNING *
      `;
      const result = await this.client.query(query, [
        id,
        run.last_run,
        run.next_run,
        run.last_status,
        increment,
      ]);
      return result.rows.length === 0 ? null : mapScheduledJobRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error recording scheduled job run', { id });
      throw handleDatabaseError(error, 'Record scheduled job run');
    }
  }

  async delete(id: number): Promise<boolean> {
    try {
      const result = await this.client.query(
        'DELETE FROM scheduled_jobs WHERE id = $1',
        [id],
      );
      const deleted = (result.rowCount ?? 0) > 0;
      if (deleted) {
        this.logger.info('Scheduled job deleted', { id });
      }
      return deleted;
    } catch (error) {
      this.logger.error('Error deleting scheduled job', { id });
      throw handleDatabaseError(error, 'Delete scheduled job');
    }
  }
}
