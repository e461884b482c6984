/**
 * Metrics models - durable delivery samples and aggregated reports
 */

import { NotifyType } from './Notification';

export type DeliveryStatus = 'success' | 'failed';

export interface MetricsSample {
  id: number;
  job_id: number | null;
  scheduled_job_id: number | null;
  service_id: string;
  service_url: string;
  notification_type: NotifyType;
  status: DeliveryStatus;
  duration_ms: number;
  error_message: string;
  metadata: Record<string, string>;
  timestamp: Date;
}

export type NewMetricsSample = Omit<MetricsSample, 'id'>;

export interface ServiceBreakdown {
  service_id: string;
  total: number;
  successful: number;
  failed: number;
  success_rate: number;
  average_duration_ms: number;
}

export interface HourlyBreakdown {
  hour: string;
  total: number;
  successful: number;
  failed: number;
  success_rate: number;
}

export interface ErrorBreakdown {
  error_message: string;
  count: number;
  last_occurred: Date;
}

export interface LatencyPercentiles {
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface AggregatedReport {
  period: { start: Date; end: Date };
  total: number;
  successful: number;
  failed: number;
  success_rate: number;
  average_duration_ms: number;
  latency: LatencyPercentiles;
  services: Record<string, ServiceBreakdown>;
  notification_types: Partial<Record<NotifyType, number>>;
  hourly: HourlyBreakdown[];
  top_errors: ErrorBreakdown[];
}
