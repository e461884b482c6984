/**
 * QueueProcessor - worker loop that leases due jobs, renders templates,
 * fans out deliveries and settles job state
 */

import { Logger } from 'winston';
import {
  BODY_FORMATS,
  BodyFormat,
  createNotification,
  QueuedJob,
} from '../database/models';
import { EndpointRegistry, schemeOf } from '../endpoints';
import { errorMessage } from '../utils/errors';
import { createLogger, redactUrl } from '../utils/logger';
import {
  aggregateOutcomes,
  DeliveryDispatcher,
  DeliveryOutcome,
  DeliveryTarget,
} from './DeliveryDispatcher';
import { MetricsRecorder } from './MetricsRecorder';
import { NotificationQueue } from './NotificationQueue';
import { CronTicker, nodeCronTicker, TickerHandle } from './NotificationScheduler';
import { TemplateEngine } from './TemplateEngine';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface QueueProcessorDeps {
  queue: NotificationQueue;
  dispatcher: DeliveryDispatcher;
  registry: EndpointRegistry;
  templates: TemplateEngine;
  metrics: MetricsRecorder;
}

export interface QueueProcessorOptions {
  pollIntervalMs: number;
  batchSize: number;
  dispatchTimeoutMs: number;
  queueRetentionDays: number;
  metricsRetentionDays: number;
  cleanupCron: string;
  ticker?: CronTicker;
  clock?: () => Date;
}

export interface MaintenanceResult {
  queue_removed: number;
  metrics_removed: number;
}

type Resolution =
  | { kind: 'target'; target: DeliveryTarget }
  | { kind: 'failed'; outcome: DeliveryOutcome };

const isBodyFormat = (value: string | undefined): value is BodyFormat =>
  BODY_FORMATS.some((format) => format === value);

export class QueueProcessor {
  private logger: Logger;
  private readonly clock: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private maintenance: TickerHandle | null = null;
  private inFlight: Promise<number> | null = null;

  constructor(
    private readonly deps: QueueProcessorDeps,
    private readonly options: QueueProcessorOptions,
  ) {
    this.logger = createLogger('QueueProcessor');
    this.clock = options.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.poll(), this.options.pollIntervalMs);
    this.maintenance = (this.options.ticker ?? nodeCronTicker).schedule(
      this.options.cleanupCron,
      () => {
        this.runMaintenance().catch((error: unknown) => {
          this.logger.error('Maintenance failed', { error: errorMessage(error) });
        });
      },
    );

    this.logger.info('Queue processor started', {
      pollIntervalMs: this.options.pollIntervalMs,
      batchSize: this.options.batchSize,
    });
  }

  /**
   * Stops polling and waits for the batch in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.maintenance?.stop();
    this.maintenance = null;

    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info('Queue processor stopped');
  }

  private poll(): void {
    // One batch at a time; a slow batch delays the next poll
    if (this.inFlight) {
      return;
    }

    this.inFlight = this.processBatch()
      .catch((error: unknown) => {
        this.logger.error('Queue batch failed', { error: errorMessage(error) });
        return 0;
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  /**
   * Leases one batch and processes its jobs concurrently. Returns the number
   * of jobs handled.
   */
  async processBatch(): Promise<number> {
    const jobs = await this.deps.queue.leaseDue(this.options.batchSize);
    if (jobs.length > 0) {
      this.logger.info(`Processing ${jobs.length} queued jobs`);
      await Promise.all(
        jobs.map((job) =>
          this.processJob(job).catch((error: unknown) => {
            this.logger.error('Job processing failed', {
              id: job.id,
              error: errorMessage(error),
            });
            return null;
          }),
        ),
      );
    }

    await this.refreshQueueGauge();
    return jobs.length;
  }

  /**
   * Delivers one leased (running) job and records its new state
   */
  async processJob(job: QueuedJob): Promise<QueuedJob> {
    let title = job.title;
    let body = job.body;

    if (job.template_name) {
      try {
        const rendered = await this.deps.templates.render(
          job.template_name,
          job.metadata,
        );
        title = rendered.title;
        body = rendered.body;
      } catch (error) {
        this.logger.error('Template rendering failed', {
          id: job.id,
          template: job.template_name,
          error: errorMessage(error),
        });
        return this.deps.queue.transition(
          job.id,
          'failed',
          `Template error: ${errorMessage(error)}`,
        );
      }
    }

    const bodyFormat = job.metadata.body_format;
    const notification = createNotification({
      title,
      body,
      type: job.notify_type,
      tags: job.tags,
      body_format: isBodyFormat(bodyFormat) ? bodyFormat : undefined,
    });

    const resolutions = job.services.map((url) => this.resolve(url));
    const targets = resolutions.flatMap((r) =>
      r.kind === 'target' ? [r.target] : [],
    );
    const delivered = await this.deps.dispatcher.dispatch(notification, targets, {
      timeoutMs: this.options.dispatchTimeoutMs,
    });

    // Merge back into service order
    let next = 0;
    const outcomes = resolutions.map((r) =>
      r.kind === 'failed' ? r.outcome : delivered[next++],
    );

    await this.recordOutcomes(job, outcomes);

    const decision = aggregateOutcomes(outcomes, job.retry_count, job.max_retries);
    const settled = await this.deps.queue.transition(
      job.id,
      decision.status,
      decision.message,
    );

    this.logger.info('Job processed', {
      id: job.id,
      status: settled.status,
      successful: outcomes.filter((o) => o.success).length,
      total: outcomes.length,
    });
    return settled;
  }

  /**
   * Purges finished queue rows and old metrics samples
   */
  async runMaintenance(): Promise<MaintenanceResult> {
    const now = this.clock().getTime();
    const queueRemoved = await this.deps.queue.purge(
      new Date(now - this.options.queueRetentionDays * DAY_MS),
    );
    const metricsRemoved = await this.deps.metrics.cleanup(
      new Date(now - this.options.metricsRetentionDays * DAY_MS),
    );
    return { queue_removed: queueRemoved, metrics_removed: metricsRemoved };
  }

  private resolve(serviceUrl: string): Resolution {
    try {
      return {
        kind: 'target',
        target: { serviceUrl, endpoint: this.deps.registry.resolve(serviceUrl) },
      };
    } catch (error) {
      this.logger.warn('Service URL could not be resolved', {
        service_url: redactUrl(serviceUrl),
        error: errorMessage(error),
      });
      return {
        kind: 'failed',
        outcome: {
          service_id: schemeOf(serviceUrl) ?? 'unknown',
          service_url: serviceUrl,
          success: false,
          error: error instanceof Error ? error : new Error(errorMessage(error)),
          duration_ms: 0,
        },
      };
    }
  }

  private async recordOutcomes(
    job: QueuedJob,
    outcomes: readonly DeliveryOutcome[],
  ): Promise<void> {
    for (const outcome of outcomes) {
      try {
        await this.deps.metrics.recordDelivery({
          job_id: job.id,
          scheduled_job_id: job.scheduled_id,
          service_id: outcome.service_id,
          service_url: redactUrl(outcome.service_url),
          notification_type: job.notify_type,
          status: outcome.success ? 'success' : 'failed',
          duration_ms: outcome.duration_ms,
          error_message: outcome.error?.message,
        });
      } catch (error) {
        this.logger.error('Failed to record delivery metrics', {
          id: job.id,
          service_id: outcome.service_id,
          error: errorMessage(error),
        });
      }
    }
  }

  private async refreshQueueGauge(): Promise<void> {
    try {
      const stats = await this.deps.queue.stats();
      this.deps.metrics.updateGauge('queue_size', stats.pending + stats.retrying);
    } catch (error) {
      this.logger.warn('Could not refresh queue size gauge', {
        error: errorMessage(error),
      });
    }
  }
}
