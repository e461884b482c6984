/**
 * MetricsRecorder - Prometheus metrics in memory plus durable delivery
 * samples for reports
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { Logger } from 'winston';
import { MetricsStore } from '../database/dao';
import {
  AggregatedReport,
  DeliveryStatus,
  ErrorBreakdown,
  HourlyBreakdown,
  LatencyPercentiles,
  MetricsSample,
  NotifyType,
  ServiceBreakdown,
} from '../database/models';
import { ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  DeliveryObserver,
  DeliveryOutcome,
  DeliveryTarget,
} from './DeliveryDispatcher';

export const GAUGE_NAMES = [
  'active_deliveries',
  'queue_size',
  'services_configured',
] as const;
export type GaugeName = (typeof GAUGE_NAMES)[number];

const TOP_ERRORS_LIMIT = 10;

const DURATION_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

export interface DeliveryRecord {
  job_id: number | null;
  scheduled_job_id: number | null;
  service_id: string;
  service_url: string;
  notification_type: NotifyType;
  status: DeliveryStatus;
  duration_ms: number;
  error_message?: string;
  metadata?: Record<string, string>;
}

export interface MetricsRecorderOptions {
  namespace?: string;
  /** When false, no durable samples are written. */
  persistSamples?: boolean;
  clock?: () => Date;
}

const rate = (part: number, total: number): number =>
  total === 0 ? 0 : (part / total) * 100;

const pad = (value: number): string => String(value).padStart(2, '0');

// Hour bucket label in the process-local zone, e.g. "2024-03-01 14:00"
const hourBucket = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:00`;

/**
 * Nearest-rank percentile over ascending `sorted` values
 */
export const percentile = (sorted: readonly number[], p: number): number => {
  if (sorted.length === 0) {
    return 0;
  }
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
};

/**
 * Aggregates samples into a report. Samples outside [start, end) are ignored.
 */
export const buildReport = (
  samples: readonly MetricsSample[],
  start: Date,
  end: Date,
): AggregatedReport => {
  const inRange = samples.filter(
    (sample) =>
      sample.timestamp.getTime() >= start.getTime() &&
      sample.timestamp.getTime() < end.getTime(),
  );

  const successful = inRange.filter((s) => s.status === 'success').length;
  const durations = inRange.map((s) => s.duration_ms).sort((a, b) => a - b);
  const totalDuration = durations.reduce((sum, d) => sum + d, 0);

  const latency: LatencyPercentiles = {
    p50: percentile(durations, 50),
    p90: percentile(durations, 90),
    p95: percentile(durations, 95),
    p99: percentile(durations, 99),
  };

  const services: Record<string, ServiceBreakdown> = {};
  const serviceDurations = new Map<string, number>();
  const notificationTypes: Partial<Record<NotifyType, number>> = {};
  const hourly = new Map<string, HourlyBreakdown>();
  const errors = new Map<string, ErrorBreakdown>();

  for (const sample of inRange) {
    const ok = sample.status === 'success';

    const service = services[sample.service_id] ?? {
      service_id: sample.service_id,
      total: 0,
      successful: 0,
      failed: 0,
      success_rate: 0,
      average_duration_ms: 0,
    };
    service.total++;
    if (ok) service.successful++;
    else service.failed++;
    services[sample.service_id] = service;
    serviceDurations.set(
      sample.service_id,
      (serviceDurations.get(sample.service_id) ?? 0) + sample.duration_ms,
    );

    notificationTypes[sample.notification_type] =
      (notificationTypes[sample.notification_type] ?? 0) + 1;

    const hour = hourBucket(sample.timestamp);
    const bucket = hourly.get(hour) ?? {
      hour,
      total: 0,
      successful: 0,
      failed: 0,
      success_rate: 0,
    };
    bucket.total++;
    if (ok) bucket.successful++;
    else bucket.failed++;
    hourly.set(hour, bucket);

    if (!ok && sample.error_message !== '') {
      const entry = errors.get(sample.error_message) ?? {
        error_message: sample.error_message,
        count: 0,
        last_occurred: sample.timestamp,
      };
      entry.count++;
      if (sample.timestamp.getTime() > entry.last_occurred.getTime()) {
        entry.last_occurred = sample.timestamp;
      }
      errors.set(sample.error_message, entry);
    }
  }

  for (const service of Object.values(services)) {
    service.success_rate = rate(service.successful, service.total);
    service.average_duration_ms =
      (serviceDurations.get(service.service_id) ?? 0) / service.total;
  }
  for (const bucket of hourly.values()) {
    bucket.success_rate = rate(bucket.successful, bucket.total);
  }

  return {
    period: { start, end },
    total: inRange.length,
    successful,
    failed: inRange.length - successful,
    success_rate: rate(successful, inRange.length),
    average_duration_ms: inRange.length === 0 ? 0 : totalDuration / inRange.length,
    latency,
    services,
    notification_types: notificationTypes,
    hourly: [...hourly.values()].sort((a, b) => a.hour.localeCompare(b.hour)),
    top_errors: [...errors.values()]
      .sort(
        (a, b) =>
          b.count - a.count ||
          b.last_occurred.getTime() - a.last_occurred.getTime(),
      )
      .slice(0, TOP_ERRORS_LIMIT),
  };
};

export class MetricsRecorder implements DeliveryObserver {
  readonly registry = new Registry();
  private logger: Logger;
  private readonly clock: () => Date;
  private readonly persistSamples: boolean;

  private readonly notifications: Counter<'service_id' | 'type' | 'status'>;
  private readonly notificationDuration: Histogram<'service_id' | 'type'>;
  private readonly httpRequests: Counter<'method' | 'endpoint' | 'status_code'>;
  private readonly httpDuration: Histogram<'method' | 'endpoint'>;
  private readonly gauges: Record<GaugeName, Gauge>;

  constructor(
    private readonly store: MetricsStore,
    options: MetricsRecorderOptions = {},
  ) {
    this.logger = createLogger('MetricsRecorder');
    this.clock = options.clock ?? (() => new Date());
    this.persistSamples = options.persistSamples ?? true;

    const ns = options.namespace ?? 'notifier';
    const registers = [this.registry];

    this.notifications = new Counter({
      name: `${ns}_notifications_total`,
      help: 'Notification deliveries by service, type and outcome',
      labelNames: ['service_id', 'type', 'status'] as const,
      registers,
    });
    this.notificationDuration = new Histogram({
      name: `${ns}_notification_duration_seconds`,
      help: 'Delivery latency per service and type',
      labelNames: ['service_id', 'type'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.httpRequests = new Counter({
      name: `${ns}_http_requests_total`,
      help: 'HTTP requests handled',
      labelNames: ['method', 'endpoint', 'status_code'] as const,
      registers,
    });
    this.httpDuration = new Histogram({
      name: `${ns}_http_request_duration_seconds`,
      help: 'HTTP request latency',
      labelNames: ['method', 'endpoint'] as const,
      buckets: DURATION_BUCKETS,
      registers,
    });
    this.gauges = {
      active_deliveries: new Gauge({
        name: `${ns}_active_deliveries`,
        help: 'Deliveries currently in flight',
        registers,
      }),
      queue_size: new Gauge({
        name: `${ns}_queue_size`,
        help: 'Jobs waiting in the queue',
        registers,
      }),
      services_configured: new Gauge({
        name: `${ns}_services_configured`,
        help: 'Registered endpoint schemes',
        registers,
      }),
    };
  }

  /**
   * Counts a finished delivery and appends its durable sample
   */
  async recordDelivery(record: DeliveryRecord): Promise<MetricsSample | null> {
    this.notifications.inc({
      service_id: record.service_id,
      type: record.notification_type,
      status: record.status,
    });
    this.notificationDuration.observe(
      { service_id: record.service_id, type: record.notification_type },
      record.duration_ms / 1000,
    );

    if (!this.persistSamples) {
      return null;
    }

    return this.store.insert({
      job_id: record.job_id,
      scheduled_job_id: record.scheduled_job_id,
      service_id: record.service_id,
      service_url: record.service_url,
      notification_type: record.notification_type,
      status: record.status,
      duration_ms: record.duration_ms,
      error_message: record.error_message ?? '',
      metadata: record.metadata ?? {},
      timestamp: this.clock(),
    });
  }

  recordHttpRequest(
    method: string,
    endpoint: string,
    statusCode: number,
    durationMs: number,
  ): void {
    this.httpRequests.inc({
      method,
      endpoint,
      status_code: String(statusCode),
    });
    this.httpDuration.observe({ method, endpoint }, durationMs / 1000);
  }

  updateGauge(name: GaugeName, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Invalid value for gauge ${name}: ${value}`);
    }
    this.gauges[name].set(value);
  }

  deliveryStarted(_target: DeliveryTarget): void {
    this.gauges.active_deliveries.inc();
  }

  deliveryFinished(_outcome: DeliveryOutcome): void {
    this.gauges.active_deliveries.dec();
  }

  /**
   * Report over [start, end) computed from durable samples
   */
  async report(start: Date, end: Date): Promise<AggregatedReport> {
    if (start.getTime() >= end.getTime()) {
      throw new ValidationError('Report start must be before end');
    }
    const samples = await this.store.findSamples(start, end);
    return buildReport(samples, start, end);
  }

  /**
   * Prometheus text exposition format
   */
  async exposition(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async cleanup(olderThan: Date): Promise<number> {
    const removed = await this.store.deleteBefore(olderThan);
    this.logger.info('Old metrics samples removed', { removed, olderThan });
    return removed;
  }
}
