/**
 * ScheduledJob model - a cron-triggered notification definition
 */

import { NotifyType } from './Notification';

export interface ScheduledJob {
  id: number;
  name: string;
  cron_expression: string;
  title: string;
  body: string;
  notify_type: NotifyType;
  services: string[];
  tags: string[];
  metadata: Record<string, string>;
  template_name: string | null;
  enabled: boolean;
  created_at: Date;
  updated_at: Date;
  next_run: Date | null;
  last_run: Date | null;
  last_status: string;
  run_count: number;
}

export interface CreateScheduledJobData {
  name: string;
  cron_expression: string;
  title: string;
  body: string;
  notify_type?: NotifyType;
  services: string[];
  tags?: string[];
  metadata?: Record<string, string>;
  template_name?: string | null;
  enabled?: boolean;
}

export type UpdateScheduledJobData = Partial<CreateScheduledJobData>;

/**
 * Columns only the scheduler writes after a tick
 */
export interface ScheduledJobRunUpdate {
  last_run: Date;
  next_run: Date | null;
  last_status: string;
}
