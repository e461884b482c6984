/**
 * Table and index definitions for the scheduler, queue, templates and metrics
 */

import { Queryable } from './connection';
import { createLogger } from '../utils/logger';

const logger = createLogger('Schema');

export interface TransactionRunner {
  transaction<T>(callback: (tx: Queryable) => Promise<T>): Promise<T>;
}

export const TABLE_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS scheduled_jobs (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    cron_expression TEXT NOT NULL,
    title TEXT NOT NULL,
    body TEXT NOT NULL,
    notify_type TEXT NOT NULL DEFAULT 'info',
    services TEXT NOT NULL DEFAULT '[]',
    tags TEXT NOT NULL DEFAULT '[]',
    metadata TEXT NOT NULL DEFAULT '{}',
    template TEXT,
    enabled BOOLEAN NOT NULL DEFAULT true,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    next_run TIMESTAMPTZ,
    last_run TIMESTAMPTZ,
    last_status TEXT NOT NULL DEFAULT '',
    run_count INTEGER NOT NULL DEFAULT 0 CHECK (run_count >= 0)
  )`,
  `CREATE TABLE IF NOT EXISTS notification_queue (
    id SERIAL PRIMARY KEY,
    scheduled_id INTEGER REFERENCES scheduled_jobs(id) ON DELETE SET NULL,
    title TEXT NOT NULL,
    body TEXT NOT NULL,
    notify_type TEXT NOT NULL DEFAULT 'info',
    services TEXT NOT NULL DEFAULT '[]',
    tags TEXT NOT NULL DEFAULT '[]',
    metadata TEXT NOT NULL DEFAULT '{}',
    template TEXT,
    priority INTEGER NOT NULL DEFAULT 1,
    max_retries INTEGER NOT NULL DEFAULT 3,
    retry_count INTEGER NOT NULL DEFAULT 0,
    retry_delay_ns BIGINT NOT NULL DEFAULT 300000000000,
    status TEXT NOT NULL DEFAULT 'pending',
    error_message TEXT NOT NULL DEFAULT '',
    created_at TIMESTAMPTZ NOT NULL,
    scheduled_at TIMESTAMPTZ NOT NULL,
    started_at TIMESTAMPTZ,
    completed_at TIMESTAMPTZ,
    next_retry_at TIMESTAMPTZ,
    CHECK (retry_count <= max_retries)
  )`,
  `CREATE TABLE IF NOT EXISTS notification_templates (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    body TEXT NOT NULL,
    variables TEXT NOT NULL DEFAULT '{}',
    description TEXT NOT NULL DEFAULT '',
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS notification_metrics (
    id SERIAL PRIMARY KEY,
    job_id INTEGER REFERENCES notification_queue(id) ON DELETE SET NULL,
    scheduled_job_id INTEGER REFERENCES scheduled_jobs(id) ON DELETE SET NULL,
    service_id TEXT NOT NULL,
    service_url TEXT NOT NULL,
    notification_type TEXT NOT NULL,
    status TEXT NOT NULL,
    duration_ms INTEGER NOT NULL DEFAULT 0,
    error_message TEXT NOT NULL DEFAULT '',
    metadata TEXT NOT NULL DEFAULT '{}',
    timestamp TIMESTAMPTZ NOT NULL
  )`,
];

export const INDEX_STATEMENTS: readonly string[] = [
  'CREATE INDEX IF NOT EXISTS idx_scheduled_jobs_enabled ON scheduled_jobs(enabled)',
  'CREATE INDEX IF NOT EXISTS idx_scheduled_jobs_next_run ON scheduled_jobs(next_run)',
  'CREATE INDEX IF NOT EXISTS idx_queue_status ON notification_queue(status)',
  'CREATE INDEX IF NOT EXISTS idx_queue_priority ON notification_queue(priority DESC, created_at)',
  'CREATE INDEX IF NOT EXISTS idx_queue_next_retry ON notification_queue(next_retry_at)',
  'CREATE INDEX IF NOT EXISTS idx_metrics_timestamp ON notification_metrics(timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_metrics_service ON notification_metrics(service_id)',
  'CREATE INDEX IF NOT EXISTS idx_metrics_status ON notification_metrics(status)',
];

/**
 * Creates all tables and indexes if they do not exist yet.
 */
export const initSchema = async (runner: TransactionRunner): Promise<void> => {
  await runner.transaction(async (tx) => {
    for (const statement of [...TABLE_STATEMENTS, ...INDEX_STATEMENTS]) {
      await tx.query(statement);
    }
  });

  logger.info('Database schema ready', {
    tables: TABLE_STATEMENTS.length,
    indexes: INDEX_STATEMENTS.length,
  });
};
