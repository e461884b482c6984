/**
 * MetricsRecorder tests
 */

import { MetricsSample } from '../../src/database/models';
import { buildReport, MetricsRecorder, percentile } from '../../src/services/MetricsRecorder';
import { ValidationError } from '../../src/utils/errors';
import { FakeClock, ScriptedEndpoint } from '../support/fakes';
import { InMemoryMetricsStore } from '../support/stores';

let nextId = 1;
const sample = (overrides: Partial<MetricsSample>): MetricsSample => ({
  id: nextId++,
  job_id: 1,
  scheduled_job_id: null,
  service_id: 'discord',
  service_url: 'discord://1/***',
  notification_type: 'info',
  status: 'success',
  duration_ms: 100,
  error_message: '',
  metadata: {},
  timestamp: new Date(2024, 2, 1, 9, 0),
  ...overrides,
});

describe('percentile', () => {
  it('should use the nearest rank', () => {
    const values = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

    expect(percentile(values, 50)).toBe(5);
    expect(percentile(values, 90)).toBe(9);
    expect(percentile(values, 95)).toBe(10);
    expect(percentile(values, 0)).toBe(1);
  });

  it('should return 0 for no values', () => {
    expect(percentile([], 99)).toBe(0);
  });
});

describe('buildReport', () => {
  const start = new Date(2024, 2, 1, 9, 0);
  const end = new Date(2024, 2, 1, 11, 0);

  const samples = [
    sample({ duration_ms: 100, timestamp: new Date(2024, 2, 1, 9, 15) }),
    sample({
      status: 'failed',
      duration_ms: 300,
      error_message: 'HTTP 500',
      timestamp: new Date(2024, 2, 1, 9, 45),
    }),
    sample({
      service_id: 'webhook',
      notification_type: 'warning',
      duration_ms: 200,
      timestamp: new Date(2024, 2, 1, 10, 5),
    }),
    sample({
      service_id: 'webhook',
      notification_type: 'warning',
      status: 'failed',
      duration_ms: 400,
      error_message: 'HTTP 500',
      timestamp: new Date(2024, 2, 1, 10, 30),
    }),
    sample({
      service_id: 'webhook',
      notification_type: 'warning',
      status: 'failed',
      duration_ms: 500,
      error_message: 'timeout',
      timestamp: new Date(2024, 2, 1, 10, 40),
    }),
    // the end of the range is exclusive
    sample({ duration_ms: 9000, timestamp: end }),
  ];

  it('should summarise totals and latency', () => {
    const report = buildReport(samples, start, end);

    expect(report.period).toEqual({ start, end });
    expect(report.total).toBe(5);
    expect(report.successful).toBe(2);
    expect(report.failed).toBe(3);
    expect(report.success_rate).toBe(40);
    expect(report.average_duration_ms).toBe(300);
    expect(report.latency).toEqual({ p50: 300, p90: 500, p95: 500, p99: 500 });
    expect(report.notification_types).toEqual({ info: 2, warning: 3 });
  });

  it('should break results down per service', () => {
    const { services } = buildReport(samples, start, end);

    expect(services.discord).toEqual({
      service_id: 'discord',
      total: 2,
      successful: 1,
      failed: 1,
      success_rate: 50,
      average_duration_ms: 200,
    });
    expect(services.webhook.total).toBe(3);
    expect(services.webhook.success_rate).toBeCloseTo(33.333, 2);
    expect(services.webhook.average_duration_ms).toBeCloseTo(366.667, 2);
  });

  it('should bucket samples by hour', () => {
    const { hourly } = buildReport(samples, start, end);

    expect(hourly.map((h) => [h.hour, h.total, h.successful, h.failed])).toEqual([
      ['2024-03-01 09:00', 2, 1, 1],
      ['2024-03-01 10:00', 3, 1, 2],
    ]);
    expect(hourly[0].success_rate).toBe(50);
  });

  it('should rank the most frequent errors first', () => {
    const { top_errors } = buildReport(samples, start, end);

    expect(top_errors).toEqual([
      { error_message: 'HTTP 500', count: 2, last_occurred: new Date(2024, 2, 1, 10, 30) },
      { error_message: 'timeout', count: 1, last_occurred: new Date(2024, 2, 1, 10, 40) },
    ]);
  });

  it('should return zeros for an empty range', () => {
    const report = buildReport([], start, end);

    expect(report.total).toBe(0);
    expect(report.success_rate).toBe(0);
    expect(report.average_duration_ms).toBe(0);
    expect(report.hourly).toEqual([]);
  });
});

describe('MetricsRecorder', () => {
  let store: InMemoryMetricsStore;
  let clock: FakeClock;
  let recorder: MetricsRecorder;

  beforeEach(() => {
    store = new InMemoryMetricsStore();
    clock = new FakeClock(new Date(2024, 2, 1, 9, 30));
    recorder = new MetricsRecorder(store, { clock: clock.now });
  });

  const delivery = {
    job_id: 3,
    scheduled_job_id: 1,
    service_id: 'discord',
    service_url: 'discord://1/***',
    notification_type: 'info' as const,
    status: 'success' as const,
    duration_ms: 120,
  };

  it('should store a sample stamped with the clock', async () => {
    const stored = await recorder.recordDelivery(delivery);

    expect(stored).toMatchObject({
      job_id: 3,
      service_id: 'discord',
      status: 'success',
      error_message: '',
      metadata: {},
      timestamp: new Date(2024, 2, 1, 9, 30),
    });
    expect(store.samples).toHaveLength(1);
  });

  it('should only count deliveries when persistence is off', async () => {
    recorder = new MetricsRecorder(store, { clock: clock.now, persistSamples: false });

    await expect(recorder.recordDelivery(delivery)).resolves.toBeNull();

    expect(store.samples).toHaveLength(0);
    expect(await recorder.exposition()).toContain(
      'notifier_notifications_total{service_id="discord",type="info",status="success"} 1',
    );
  });

  it('should expose counters and gauges under the namespace', async () => {
    recorder = new MetricsRecorder(store, { namespace: 'ops', clock: clock.now });
    recorder.updateGauge('queue_size', 4);
    recorder.recordHttpRequest('GET', '/metrics', 200, 12);

    const text = await recorder.exposition();

    expect(text).toContain('ops_queue_size 4');
    expect(text).toContain('ops_http_requests_total{method="GET",endpoint="/metrics",status_code="200"} 1');
    expect(recorder.contentType).toContain('text/plain');
  });

  it('should track deliveries in flight', async () => {
    const target = { serviceUrl: 'a://x', endpoint: new ScriptedEndpoint('a') };
    recorder.deliveryStarted(target);
    recorder.deliveryStarted(target);
    recorder.deliveryFinished({
      service_id: 'a',
      service_url: 'a://x',
      success: true,
      duration_ms: 1,
    });

    expect(await recorder.exposition()).toContain('notifier_active_deliveries 1');
  });

  it('should reject negative gauge values', () => {
    expect(() => recorder.updateGauge('queue_size', -1)).toThrow(
      'Invalid value for gauge queue_size: -1',
    );
  });

  it('should build reports from stored samples', async () => {
    await recorder.recordDelivery(delivery);
    clock.advance(60_000);
    await recorder.recordDelivery({
      ...delivery,
      status: 'failed',
      error_message: 'discord: HTTP 500',
    });

    const report = await recorder.report(
      new Date(2024, 2, 1, 9, 0),
      new Date(2024, 2, 1, 10, 0),
    );

    expect(report.total).toBe(2);
    expect(report.success_rate).toBe(50);
    expect(report.top_errors[0].error_message).toBe('discord: HTTP 500');
  });

  it('should reject empty report ranges', async () => {
    const at = new Date(2024, 2, 1, 9, 0);

    await expect(recorder.report(at, at)).rejects.toThrow(ValidationError);
  });

  it('should delete samples older than the cutoff', async () => {
    await recorder.recordDelivery(delivery);
    clock.advance(60 * 60_000);
    await recorder.recordDelivery(delivery);

    await expect(recorder.cleanup(new Date(2024, 2, 1, 10, 0))).resolves.toBe(1);
    expect(store.samples).toHaveLength(1);
  });
});
