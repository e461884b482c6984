/**
 * MetricsDAO - append-only storage for delivery samples
 */

import { z } from 'zod';
import { Logger } from 'winston';
import { db, Queryable } from '../connection';
import { MetricsSample, NewMetricsSample } from '../models';
import { createLogger } from '../../utils/logger';
import { handleDatabaseError } from '../../utils/errors';
import {
  metadataColumnSchema,
  notifyTypeSchema,
  ValidationUtils,
} from '../../utils/validation';
import { MetricsStore } from './types';

const metricsRowSchema = z.object({
  id: z.coerce.number().int(),
  job_id: z.coerce.number().int().nullable(),
  scheduled_job_id: z.coerce.number().int().nullable(),
  service_id: z.string(),
  service_url: z.string(),
  notification_type: notifyTypeSchema,
  status: z.enum(['success', 'failed']),
  duration_ms: z.coerce.number(),
  error_message: z.string().nullable(),
  metadata: z.unknown(),
  timestamp: z.date(),
});

export const mapMetricsRow = (raw: unknown): MetricsSample => {
  const row = ValidationUtils.parse(
    metricsRowSchema,
    raw,
    'Corrupt notification_metrics row',
  );

  return {
    ...row,
    error_message: row.error_message ?? '',
    metadata: ValidationUtils.parseJsonColumn(
      row.metadata,
      metadataColumnSchema,
      {},
      'metadata',
    ),
  };
};

export class MetricsDAO implements MetricsStore {
  private logger: Logger;

  constructor(private readonly client: Queryable = db) {
    this.logger = createLogger('MetricsDAO');
  }

  async insert(sample: NewMetricsSample): Promise<MetricsSample> {
    try {
      const query = `
        INSERT INTO notification_metrics (
          job_id, scheduled_job_id, service_id, service_url,
          notification_type, status, duration_ms, error_message,
          metadata, timestamp
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        RETURNING *
      `;

      const result = await this.client.query(query, [
        sample.job_id,
        sample.scheduled_job_id,
        sample.service_id,
        sample.service_url,
        sample.notification_type,
        sample.status,
        Math.round(sample.duration_ms),
        sample.error_message,
        JSON.stringify(sample.metadata),
        sample.timestamp,
      ]);

      return mapMetricsRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error storing metrics sample', {
        service_id: sample.service_id,
      });
      throw handleDatabaseError(error, 'Record metrics sample');
    }
  }

  async findSamples(start: Date, end: Date): Promise<MetricsSample[]> {
    try {
      const result = await this.client.query(
        `SELECT * FROM notification_metrics
         WHERE timestamp >= $1 AND timestamp < $2
         ORDER BY timestamp ASC, id ASC`,
        [start, end],
      );
      return result.rows.map(mapMetricsRow);
    } catch (error) {
      this.logger.error('Error reading metrics samples', { start, end });
      throw handleDatabaseError(error, 'Read metrics samples');
    }
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    try {
      const result = await this.client.query(
        'DELETE FROM notification_metrics WHERE timestamp < $1',
        [cutoff],
      );
      const removed = result.rowCount ?? 0;
      this.logger.info('Cleaned up old metrics', { removed, cutoff });
      return removed;
    } catch (error) {
      this.logger.error('Error cleaning up metrics', { cutoff });
      throw handleDatabaseError(error, 'Clean up metrics');
    }
  }
}
