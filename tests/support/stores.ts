/**
 * In-memory implementations of the store interfaces for service tests
 */

import {
  MetricsStore,
  NewScheduledJob,
  NewTemplate,
  QueueStore,
  RecordRunOptions,
  ScheduledJobListFilter,
  ScheduledJobPatch,
  ScheduledJobStore,
  TemplatePatch,
  TemplateStore,
} from '../../src/database/dao';
import { compareLeaseOrder } from '../../src/database/dao/QueueDAO';
import {
  JobStatus,
  MetricsSample,
  NewMetricsSample,
  NewQueuedJob,
  NotificationTemplate,
  QueuedJob,
  QueuedJobPatch,
  QueueListFilter,
  ScheduledJob,
  ScheduledJobRunUpdate,
} from '../../src/database/models';
import { ConflictError } from '../../src/utils/errors';

const cloneQueued = (job: QueuedJob): QueuedJob => ({
  ...job,
  services: [...job.services],
  tags: [...job.tags],
  metadata: { ...job.metadata },
});

const cloneScheduled = (job: ScheduledJob): ScheduledJob => ({
  ...job,
  services: [...job.services],
  tags: [...job.tags],
  metadata: { ...job.metadata },
});

export class InMemoryQueueStore implements QueueStore {
  readonly rows = new Map<number, QueuedJob>();
  private nextId = 1;

  async insert(job: NewQueuedJob): Promise<QueuedJob> {
    const row: QueuedJob = {
      ...job,
      services: [...job.services],
      tags: [...job.tags],
      metadata: { ...job.metadata },
      id: this.nextId++,
      started_at: null,
      completed_at: null,
      next_retry_at: null,
    };
    this.rows.set(row.id, row);
    return cloneQueued(row);
  }

  async findById(id: number): Promise<QueuedJob | null> {
    const row = this.rows.get(id);
    return row ? cloneQueued(row) : null;
  }

  async claimDue(now: Date, limit: number): Promise<QueuedJob[]> {
    const due = [...this.rows.values()]
      .filter(
        (row) =>
          (row.status === 'pending' || row.status === 'retrying') &&
          (row.next_retry_at === null ||
            row.next_retry_at.getTime() <= now.getTime()),
      )
      .sort(compareLeaseOrder)
      .slice(0, limit);

    for (const row of due) {
      row.status = 'running';
      row.started_at = now;
    }
    return due.map(cloneQueued);
  }

  async compareAndSet(
    id: number,
    expected: readonly JobStatus[],
    patch: QueuedJobPatch,
  ): Promise<QueuedJob | null> {
    const row = this.rows.get(id);
    if (!row || !expected.includes(row.status)) {
      return null;
    }

    row.status = patch.status;
    if (patch.error_message !== undefined) row.error_message = patch.error_message;
    if (patch.retry_count !== undefined) row.retry_count = patch.retry_count;
    if (patch.started_at !== undefined) row.started_at = patch.started_at;
    if (patch.completed_at !== undefined) row.completed_at = patch.completed_at;
    if (patch.next_retry_at !== undefined) row.next_retry_at = patch.next_retry_at;
    return cloneQueued(row);
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  async countByStatus(): Promise<Partial<Record<JobStatus, number>>> {
    const counts: Partial<Record<JobStatus, number>> = {};
    for (const row of this.rows.values()) {
      counts[row.status] = (counts[row.status] ?? 0) + 1;
    }
    return counts;
  }

  async list(filter: QueueListFilter): Promise<QueuedJob[]> {
    return [...this.rows.values()]
      .filter((row) => filter.status === undefined || row.status === filter.status)
      .filter(
        (row) =>
          filter.scheduled_id === undefined ||
          row.scheduled_id === filter.scheduled_id,
      )
      .sort(
        (a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id,
      )
      .slice(0, filter.limit ?? 100)
      .map(cloneQueued);
  }

  async deleteFinishedBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (
        (row.status === 'completed' || row.status === 'failed') &&
        row.completed_at !== null &&
        row.completed_at.getTime() < cutoff.getTime()
      ) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

export class InMemoryScheduledJobStore implements ScheduledJobStore {
  readonly rows = new Map<number, ScheduledJob>();
  private nextId = 1;

  async insert(job: NewScheduledJob): Promise<ScheduledJob> {
    for (const row of this.rows.values()) {
      if (row.name === job.name) {
        throw new ConflictError('Create scheduled job: resource already exists');
      }
    }
    const row: ScheduledJob = {
      ...job,
      id: this.nextId++,
      last_run: null,
      last_status: '',
      run_count: 0,
    };
    this.rows.set(row.id, row);
    return cloneScheduled(row);
  }

  async findById(id: number): Promise<ScheduledJob | null> {
    const row = this.rows.get(id);
    return row ? cloneScheduled(row) : null;
  }

  async findByName(name: string): Promise<ScheduledJob | null> {
    for (const row of this.rows.values()) {
      if (row.name === name) return cloneScheduled(row);
    }
    return null;
  }

  async list(filter: ScheduledJobListFilter = {}): Promise<ScheduledJob[]> {
    return [...this.rows.values()]
      .filter((row) => filter.enabled === undefined || row.enabled === filter.enabled)
      .sort((a, b) => a.id - b.id)
      .map(cloneScheduled);
  }

  async update(id: number, patch: ScheduledJobPatch): Promise<ScheduledJob | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const updated: ScheduledJob = { ...row };
    for (const [key, value] of Object.entries(patch)) {
      if (value !== undefined) {
        Object.assign(updated, { [key]: value });
      }
    }
    this.rows.set(id, updated);
    return cloneScheduled(updated);
  }

  async recordRun(
    id: number,
    run: ScheduledJobRunUpdate,
    options: RecordRunOptions = {},
  ): Promise<ScheduledJob | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    row.last_run = run.last_run;
    row.next_run = run.next_run;
    row.last_status = run.last_status;
    if (options.counted !== false) {
      row.run_count += 1;
    }
    row.updated_at = run.last_run;
    return cloneScheduled(row);
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }
}

export class InMemoryTemplateStore implements TemplateStore {
  readonly rows = new Map<string, NotificationTemplate>();
  private nextId = 1;

  async insert(template: NewTemplate): Promise<NotificationTemplate> {
    if (this.rows.has(template.name)) {
      throw new ConflictError('Create template: resource already exists');
    }
    const row: NotificationTemplate = {
      ...template,
      variables: { ...template.variables },
      id: this.nextId++,
    };
    this.rows.set(row.name, row);
    return { ...row, variables: { ...row.variables } };
  }

  async findByName(name: string): Promise<NotificationTemplate | null> {
    const row = this.rows.get(name);
    return row ? { ...row, variables: { ...row.variables } } : null;
  }

  async list(): Promise<NotificationTemplate[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((row) => ({ ...row, variables: { ...row.variables } }));
  }

  async update(
    name: string,
    patch: TemplatePatch,
  ): Promise<NotificationTemplate | null> {
    const row = this.rows.get(name);
    if (!row) return null;
    const updated: NotificationTemplate = {
      ...row,
      title_template: patch.title_template ?? row.title_template,
      body_template: patch.body_template ?? row.body_template,
      variables: patch.variables ?? row.variables,
      description: patch.description ?? row.description,
      updated_at: patch.updated_at,
    };
    this.rows.set(name, updated);
    return { ...updated, variables: { ...updated.variables } };
  }

  async delete(name: string): Promise<boolean> {
    return this.rows.delete(name);
  }
}

export class InMemoryMetricsStore implements MetricsStore {
  readonly samples: MetricsSample[] = [];
  private nextId = 1;

  async insert(sample: NewMetricsSample): Promise<MetricsSample> {
    const stored: MetricsSample = { ...sample, id: this.nextId++ };
    this.samples.push(stored);
    return { ...stored };
  }

  async findSamples(start: Date, end: Date): Promise<MetricsSample[]> {
    return this.samples
      .filter(
        (s) =>
          s.timestamp.getTime() >= start.getTime() &&
          s.timestamp.getTime() < end.getTime(),
      )
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id);
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    const before = this.samples.length;
    const kept = this.samples.filter((s) => s.timestamp.getTime() >= cutoff.getTime());
    this.samples.splice(0, this.samples.length, ...kept);
    return before - kept.length;
  }
}
