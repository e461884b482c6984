/**
 * NotificationQueue tests
 */

import {
  DEFAULT_QUEUE_DEFAULTS,
  NotificationQueue,
  retryDelayFor,
} from '../../src/services/NotificationQueue';
import {
  NotFoundError,
  QueueBackendError,
  QueueStateError,
  ValidationError,
} from '../../src/utils/errors';
import { FakeClock } from '../support/fakes';
import { InMemoryQueueStore } from '../support/stores';

const MINUTE = 60_000;

describe('retryDelayFor', () => {
  it('should double the delay per retry', () => {
    expect([1, 2, 3, 4, 5].map((n) => retryDelayFor(MINUTE, n) / MINUTE)).toEqual([
      1, 2, 4, 8, 16,
    ]);
  });

  it('should cap the multiplier at 64', () => {
    expect(retryDelayFor(1000, 7)).toBe(64_000);
    expect(retryDelayFor(1000, 20)).toBe(64_000);
  });

  it('should treat a zero retry count as the first retry', () => {
    expect(retryDelayFor(1000, 0)).toBe(1000);
  });
});

describe('NotificationQueue', () => {
  let store: InMemoryQueueStore;
  let clock: FakeClock;
  let queue: NotificationQueue;

  beforeEach(() => {
    store = new InMemoryQueueStore();
    clock = new FakeClock('2024-03-01T10:00:00Z');
    queue = new NotificationQueue(store, { clock: clock.now });
  });

  const enqueueBasic = (priority?: number) =>
    queue.enqueue({
      title: 'Backup',
      body: 'Nightly backup done',
      services: ['json://hooks.example.com/backup'],
      priority,
    });

  describe('enqueue', () => {
    it('should store a pending job with defaults', async () => {
      const job = await enqueueBasic();

      expect(job).toMatchObject({
        status: 'pending',
        priority: DEFAULT_QUEUE_DEFAULTS.priority,
        max_retries: DEFAULT_QUEUE_DEFAULTS.maxRetries,
        retry_delay_ms: DEFAULT_QUEUE_DEFAULTS.retryDelayMs,
        retry_count: 0,
        notify_type: 'info',
        error_message: '',
        scheduled_id: null,
        template_name: null,
        next_retry_at: null,
      });
      expect(job.created_at).toEqual(new Date('2024-03-01T10:00:00Z'));
    });

    it('should use configured defaults', async () => {
      queue = new NotificationQueue(store, {
        clock: clock.now,
        defaults: { maxRetries: 5, retryDelayMs: MINUTE },
      });

      const job = await enqueueBasic();

      expect(job.max_retries).toBe(5);
      expect(job.retry_delay_ms).toBe(MINUTE);
      expect(job.priority).toBe(1);
    });

    it('should round-trip payload fields', async () => {
      const job = await queue.enqueue({
        title: 'Deploy',
        body: 'v2 live',
        notify_type: 'success',
        services: ['discord://1/test-token', 'json://hooks.example.com/ci'],
        tags: ['deploy'],
        metadata: { app: 'api', version: '2.0.0' },
        template_name: 'deployment-status',
      });

      const stored = await queue.get(job.id);

      expect(stored.services).toEqual(['discord://1/test-token', 'json://hooks.example.com/ci']);
      expect(stored.tags).toEqual(['deploy']);
      expect(stored.metadata).toEqual({ app: 'api', version: '2.0.0' });
      expect(stored.template_name).toBe('deployment-status');
    });

    it('should reject jobs without services', async () => {
      await expect(
        queue.enqueue({ title: 't', body: 'b', services: [] }),
      ).rejects.toThrow('Invalid job: services: At least one service URL is required');
      expect(store.rows.size).toBe(0);
    });

    it('should run the service check before storing', async () => {
      const validateServices = jest.fn(() => {
        throw new ValidationError('Unknown service scheme: smtp');
      });
      queue = new NotificationQueue(store, { clock: clock.now, validateServices });

      await expect(
        queue.enqueue({ title: 't', body: 'b', services: ['smtp://mail'] }),
      ).rejects.toThrow('Unknown service scheme: smtp');
      expect(validateServices).toHaveBeenCalledWith(['smtp://mail']);
      expect(store.rows.size).toBe(0);
    });
  });

  describe('enqueueBatch', () => {
    it('should report each item independently', async () => {
      const results = await queue.enqueueBatch([
        { title: 'a', body: 'a', services: ['json://x/a'] },
        { title: 'b', body: 'b', services: [] },
        { title: 'c', body: 'c', services: ['json://x/c'] },
      ]);

      expect(results.map((r) => r.success)).toEqual([true, false, true]);
      expect(results[1]).toEqual({
        index: 1,
        success: false,
        error: 'Invalid job: services: At least one service URL is required',
      });
      expect(store.rows.size).toBe(2);
    });

    it('should stop on storage failures', async () => {
      jest
        .spyOn(store, 'insert')
        .mockRejectedValueOnce(new QueueBackendError('Enqueue job failed: disk full'));

      await expect(
        queue.enqueueBatch([{ title: 'a', body: 'a', services: ['json://x/a'] }]),
      ).rejects.toThrow(QueueBackendError);
    });
  });

  describe('leaseDue', () => {
    it('should lease higher priority jobs first', async () => {
      const low = await enqueueBasic(1);
      clock.advance(1000);
      const high = await enqueueBasic(10);

      const leased = await queue.leaseDue(2);

      expect(leased.map((job) => job.id)).toEqual([high.id, low.id]);
      expect(leased.every((job) => job.status === 'running')).toBe(true);
    });

    it('should lease older jobs first within a priority', async () => {
      const first = await enqueueBasic(3);
      clock.advance(1000);
      const second = await enqueueBasic(3);

      const leased = await queue.leaseDue(1);

      expect(leased.map((job) => job.id)).toEqual([first.id]);
      expect((await queue.get(second.id)).status).toBe('pending');
    });

    it('should hand each job to exactly one of two concurrent callers', async () => {
      const ids = [];
      for (let i = 0; i < 3; i++) {
        ids.push((await enqueueBasic()).id);
      }

      const [a, b] = await Promise.all([queue.leaseDue(5), queue.leaseDue(5)]);
      const idsA = a.map((job) => job.id);
      const idsB = b.map((job) => job.id);

      expect([...idsA, ...idsB].sort()).toEqual(ids.sort());
      expect(idsA.filter((id) => idsB.includes(id))).toEqual([]);
    });

    it('should record the lease time', async () => {
      await enqueueBasic();
      clock.advance(5000);

      const [job] = await queue.leaseDue(1);

      expect(job.started_at).toEqual(new Date('2024-03-01T10:00:05Z'));
    });

    it('should reject a non-positive limit', async () => {
      await expect(queue.leaseDue(0)).rejects.toThrow(
        'Lease limit must be a positive integer',
      );
    });
  });

  describe('transition', () => {
    it('should back off exponentially and fail once retries run out', async () => {
      queue = new NotificationQueue(store, {
        clock: clock.now,
        defaults: { maxRetries: 5, retryDelayMs: MINUTE },
      });
      const job = await enqueueBasic();
      const delays: number[] = [];

      let [leased] = await queue.leaseDue(1);
      for (let attempt = 1; attempt <= 5; attempt++) {
        const retrying = await queue.transition(leased.id, 'retrying', 'HTTP 503');
        expect(retrying.retry_count).toBe(attempt);

        const dueAt = retrying.next_retry_at;
        if (!dueAt) {
          throw new Error('next_retry_at missing');
        }
        delays.push((dueAt.getTime() - clock.now().getTime()) / MINUTE);

        // Not due one second early
        clock.set(new Date(dueAt.getTime() - 1000));
        await expect(queue.leaseDue(1)).resolves.toEqual([]);

        clock.set(dueAt);
        [leased] = await queue.leaseDue(1);
        expect(leased.id).toBe(job.id);
      }

      await expect(queue.transition(job.id, 'retrying', 'HTTP 503')).rejects.toThrow(
        `Job ${job.id} has no retries left (5/5)`,
      );
      const failed = await queue.transition(job.id, 'failed', 'HTTP 503');

      expect(delays).toEqual([1, 2, 4, 8, 16]);
      expect(failed).toMatchObject({
        status: 'failed',
        retry_count: 5,
        error_message: 'HTTP 503',
        next_retry_at: null,
      });
    });

    it('should stamp completion and clear the retry time', async () => {
      const job = await enqueueBasic();
      await queue.leaseDue(1);
      clock.advance(2000);

      const completed = await queue.transition(job.id, 'completed');

      expect(completed.status).toBe('completed');
      expect(completed.completed_at).toEqual(new Date('2024-03-01T10:00:02Z'));
      expect(completed.error_message).toBe('');
    });

    it('should only complete running jobs', async () => {
      const job = await enqueueBasic();

      await expect(queue.transition(job.id, 'completed')).rejects.toThrow(
        `Cannot move job ${job.id} from pending to completed`,
      );
    });

    it('should allow failing a job that was never leased', async () => {
      const job = await enqueueBasic();

      await expect(queue.transition(job.id, 'failed', 'cancelled')).resolves.toMatchObject({
        status: 'failed',
      });
    });

    it('should never move a job back to pending', async () => {
      const job = await enqueueBasic();

      await expect(queue.transition(job.id, 'pending')).rejects.toThrow(QueueStateError);
    });

    it('should keep terminal jobs terminal', async () => {
      const job = await enqueueBasic();
      await queue.leaseDue(1);
      await queue.transition(job.id, 'completed');

      await expect(queue.transition(job.id, 'failed')).rejects.toThrow(
        `Cannot move job ${job.id} from completed to failed`,
      );
    });

    it('should report unknown jobs', async () => {
      await expect(queue.transition(99, 'completed')).rejects.toThrow(NotFoundError);
      await expect(queue.transition(99, 'retrying')).rejects.toThrow(
        'Queued job 99 not found',
      );
    });
  });

  describe('stats', () => {
    it('should count every status and the total', async () => {
      const a = await enqueueBasic();
      await enqueueBasic();
      await enqueueBasic();
      await queue.transition(a.id, 'failed', 'x');

      await expect(queue.stats()).resolves.toEqual({
        pending: 2,
        running: 0,
        retrying: 0,
        completed: 0,
        failed: 1,
        total: 3,
      });
    });
  });

  describe('list', () => {
    it('should filter by status', async () => {
      const a = await enqueueBasic();
      await enqueueBasic();
      await queue.transition(a.id, 'failed');

      const failed = await queue.list({ status: 'failed' });

      expect(failed.map((job) => job.id)).toEqual([a.id]);
    });
  });

  describe('delete', () => {
    it('should remove the job', async () => {
      const job = await enqueueBasic();

      await queue.delete(job.id);

      await expect(queue.get(job.id)).rejects.toThrow(NotFoundError);
      await expect(queue.delete(job.id)).rejects.toThrow(NotFoundError);
    });
  });

  describe('purge', () => {
    it('should remove only finished jobs older than the cutoff', async () => {
      const old = await enqueueBasic();
      await queue.transition(old.id, 'failed');
      clock.advance(10 * MINUTE);
      const recent = await enqueueBasic();
      await queue.transition(recent.id, 'failed');
      const pending = await enqueueBasic();

      const removed = await queue.purge(new Date('2024-03-01T10:05:00Z'));

      expect(removed).toBe(1);
      expect([...store.rows.keys()]).toEqual([recent.id, pending.id]);
    });
  });
});
