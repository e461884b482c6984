/**
 * DeliveryDispatcher tests
 */

import { createNotification } from '../../src/database/models';
import {
  aggregateOutcomes,
  DeliveryDispatcher,
  DeliveryObserver,
  DeliveryOutcome,
  DeliveryTarget,
} from '../../src/services/DeliveryDispatcher';
import { CancelledError, PermanentDeliveryError } from '../../src/utils/errors';
import { delay, ScriptedEndpoint } from '../support/fakes';

const notification = createNotification({ title: 'Heartbeat', body: 'all good' });

const target = (endpoint: ScriptedEndpoint): DeliveryTarget => ({
  serviceUrl: `${endpoint.serviceId}://example/${endpoint.serviceId}`,
  endpoint,
});

const waitForAbort = (_n: unknown, signal: AbortSignal): Promise<void> =>
  new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('DeliveryDispatcher', () => {
  it('should return no outcomes for no targets', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 4, defaultTimeoutMs: 1000 });

    await expect(dispatcher.dispatch(notification, [])).resolves.toEqual([]);
  });

  it('should report outcomes in target order regardless of completion order', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 4, defaultTimeoutMs: 1000 });
    const slow = new ScriptedEndpoint('slow', () => delay(30));
    const failing = new ScriptedEndpoint('failing', async () => {
      throw new PermanentDeliveryError('failing: HTTP 404', 404);
    });
    const fast = new ScriptedEndpoint('fast');

    const outcomes = await dispatcher.dispatch(notification, [
      target(slow),
      target(failing),
      target(fast),
    ]);

    expect(outcomes.map((o) => [o.service_id, o.success])).toEqual([
      ['slow', true],
      ['failing', false],
      ['fast', true],
    ]);
    expect(outcomes[1].error?.message).toBe('failing: HTTP 404');
    expect(outcomes[0].service_url).toBe('slow://example/slow');
  });

  it('should deliver the same notification to every endpoint', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 2, defaultTimeoutMs: 1000 });
    const a = new ScriptedEndpoint('a');
    const b = new ScriptedEndpoint('b');

    await dispatcher.dispatch(notification, [target(a), target(b)]);

    expect(a.sent).toEqual([notification]);
    expect(b.sent).toEqual([notification]);
  });

  it('should not exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const behaviour = async (): Promise<void> => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
    };
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 2, defaultTimeoutMs: 1000 });
    const targets = ['a', 'b', 'c', 'd', 'e'].map((id) =>
      target(new ScriptedEndpoint(id, behaviour)),
    );

    const outcomes = await dispatcher.dispatch(notification, targets);

    expect(outcomes.every((o) => o.success)).toBe(true);
    expect(peak).toBe(2);
  });

  it('should cancel deliveries still running at the deadline', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 4, defaultTimeoutMs: 1000 });
    const hanging = new ScriptedEndpoint('hanging', waitForAbort);
    const quick = new ScriptedEndpoint('quick');

    const outcomes = await dispatcher.dispatch(
      notification,
      [target(hanging), target(quick)],
      { timeoutMs: 20 },
    );

    expect(outcomes[0].success).toBe(false);
    expect(outcomes[0].error).toBeInstanceOf(CancelledError);
    expect(outcomes[0].error?.message).toBe('deadline of 20ms exceeded');
    expect(outcomes[1].success).toBe(true);
  });

  it('should stop waiting for endpoints that ignore cancellation', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 1, defaultTimeoutMs: 20 });
    const stubborn = new ScriptedEndpoint('stubborn', () => delay(200));

    const started = Date.now();
    const [outcome] = await dispatcher.dispatch(notification, [target(stubborn)]);

    expect(Date.now() - started).toBeLessThan(150);
    expect(outcome.error?.message).toBe('deadline of 20ms exceeded');
  });

  it('should skip queued deliveries once the deadline has passed', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 1, defaultTimeoutMs: 20 });
    const hanging = new ScriptedEndpoint('hanging', waitForAbort);
    const queued = new ScriptedEndpoint('queued');

    const outcomes = await dispatcher.dispatch(notification, [target(hanging), target(queued)]);

    expect(queued.sent).toHaveLength(0);
    expect(outcomes[1]).toMatchObject({ service_id: 'queued', success: false, duration_ms: 0 });
  });

  it('should honour an external cancellation signal', async () => {
    const dispatcher = new DeliveryDispatcher({ maxConcurrency: 2, defaultTimeoutMs: 1000 });
    const controller = new AbortController();
    controller.abort();
    const endpoint = new ScriptedEndpoint('a');

    const [outcome] = await dispatcher.dispatch(notification, [target(endpoint)], {
      signal: controller.signal,
    });

    expect(endpoint.sent).toHaveLength(0);
    expect(outcome.error?.message).toBe('dispatch cancelled');
  });

  it('should notify the observer around each delivery', async () => {
    const observer: DeliveryObserver = {
      deliveryStarted: jest.fn(),
      deliveryFinished: jest.fn(),
    };
    const dispatcher = new DeliveryDispatcher({
      maxConcurrency: 2,
      defaultTimeoutMs: 1000,
      observer,
    });

    await dispatcher.dispatch(notification, [
      target(new ScriptedEndpoint('a')),
      target(new ScriptedEndpoint('b')),
    ]);

    expect(observer.deliveryStarted).toHaveBeenCalledTimes(2);
    expect(observer.deliveryFinished).toHaveBeenCalledTimes(2);
  });

  it('should measure durations with the injected clock', async () => {
    let tick = 1000;
    const dispatcher = new DeliveryDispatcher({
      maxConcurrency: 1,
      defaultTimeoutMs: 1000,
      now: () => (tick += 25),
    });

    const [outcome] = await dispatcher.dispatch(notification, [
      target(new ScriptedEndpoint('a')),
    ]);

    expect(outcome.duration_ms).toBe(25);
  });
});

describe('aggregateOutcomes', () => {
  const ok = (service_id: string): DeliveryOutcome => ({
    service_id,
    service_url: `${service_id}://x`,
    success: true,
    duration_ms: 5,
  });
  const failed = (service_id: string, message: string): DeliveryOutcome => ({
    service_id,
    service_url: `${service_id}://x`,
    success: false,
    error: new Error(message),
    duration_ms: 5,
  });

  it('should complete when every endpoint succeeded', () => {
    expect(aggregateOutcomes([ok('a'), ok('b')], 0, 3)).toEqual({
      status: 'completed',
      message: '',
    });
  });

  it('should complete on partial success without retrying', () => {
    expect(aggregateOutcomes([ok('a'), failed('b', 'HTTP 500'), ok('c')], 0, 3)).toEqual({
      status: 'completed',
      message: 'Partial success: 1/3 services failed',
    });
  });

  it('should retry when every endpoint failed and retries remain', () => {
    expect(
      aggregateOutcomes([failed('a', 'timeout'), failed('b', 'HTTP 503')], 1, 3),
    ).toEqual({
      status: 'retrying',
      message: 'All services failed: [a: timeout; b: HTTP 503]',
    });
  });

  it('should fail when retries are exhausted', () => {
    expect(aggregateOutcomes([failed('a', 'timeout')], 3, 3)).toEqual({
      status: 'failed',
      message: 'All services failed: [a: timeout]',
    });
  });
});
