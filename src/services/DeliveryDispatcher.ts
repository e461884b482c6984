/**
 * DeliveryDispatcher - fans one notification out to many endpoints
 */

import pLimit from 'p-limit';
import { Logger } from 'winston';
import { Notification } from '../database/models';
import { DeliveryEndpoint } from '../endpoints';
import { CancelledError, errorMessage } from '../utils/errors';
import { createLogger, redactUrl } from '../utils/logger';

export interface DeliveryTarget {
  serviceUrl: string;
  endpoint: DeliveryEndpoint;
}

export interface DeliveryOutcome {
  service_id: string;
  service_url: string;
  success: boolean;
  error?: Error;
  duration_ms: number;
}

export interface DispatchOptions {
  /** Deadline for the whole fan-out, relative to the call. */
  timeoutMs?: number;
  /** External cancellation, e.g. process shutdown. */
  signal?: AbortSignal;
}

/**
 * Receives delivery start/finish events (the metrics gauge uses it)
 */
export interface DeliveryObserver {
  deliveryStarted(target: DeliveryTarget): void;
  deliveryFinished(outcome: DeliveryOutcome): void;
}

export interface DeliveryDispatcherOptions {
  maxConcurrency: number;
  defaultTimeoutMs: number;
  observer?: DeliveryObserver;
  now?: () => number;
}

const abortReason = (signal: AbortSignal): CancelledError =>
  signal.reason instanceof CancelledError
    ? signal.reason
    : new CancelledError('deadline exceeded');

/**
 * Settles with the send result or rejects as soon as the signal aborts,
 * whichever happens first
 */
const untilAborted = <T>(work: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });

export class DeliveryDispatcher {
  private logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: DeliveryDispatcherOptions) {
    this.logger = createLogger('DeliveryDispatcher');
    this.now = options.now ?? Date.now;
  }

  /**
   * Sends `notification` to every target concurrently under one deadline.
   * Outcomes come back in target order. Never throws for delivery failures.
   */
  async dispatch(
    notification: Notification,
    targets: readonly DeliveryTarget[],
    options: DispatchOptions = {},
  ): Promise<DeliveryOutcome[]> {
    if (targets.length === 0) {
      return [];
    }

    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new CancelledError(`deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);

    const onExternalAbort = (): void => {
      controller.abort(new CancelledError('dispatch cancelled'));
    };
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const limit = pLimit(
      Math.max(1, Math.min(targets.length, this.options.maxConcurrency)),
    );

    try {
      return await Promise.all(
        targets.map((target) =>
          limit(() => this.deliver(notification, target, controller.signal)),
        ),
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async deliver(
    notification: Notification,
    target: DeliveryTarget,
    signal: AbortSignal,
  ): Promise<DeliveryOutcome> {
    const { endpoint, serviceUrl } = target;

    // Tasks still waiting for a slot when the deadline fires skip themselves
    if (signal.aborted) {
      return {
        service_id: endpoint.serviceId,
        service_url: serviceUrl,
        success: false,
        error: abortReason(signal),
        duration_ms: 0,
      };
    }

    this.options.observer?.deliveryStarted(target);
    const started = this.now();
    let outcome: DeliveryOutcome;

    try {
      await untilAborted(endpoint.send(notification, signal), signal);
      outcome = {
        service_id: endpoint.serviceId,
        service_url: serviceUrl,
        success: true,
        duration_ms: this.now() - started,
      };
    } catch (error) {
      outcome = {
        service_id: endpoint.serviceId,
        service_url: serviceUrl,
        success: false,
        error: error instanceof Error ? error : new Error(errorMessage(error)),
        duration_ms: this.now() - started,
      };
      this.logger.warn('Delivery failed', {
        service_id: endpoint.serviceId,
        service_url: redactUrl(serviceUrl),
        error: errorMessage(error),
      });
    }

    this.options.observer?.deliveryFinished(outcome);
    return outcome;
  }
}

export interface AggregateDecision {
  status: 'completed' | 'retrying' | 'failed';
  message: string;
}

/**
 * Maps per-endpoint outcomes to the next job state. Any success completes
 * the job; only an all-failed outcome is retried.
 */
export const aggregateOutcomes = (
  outcomes: readonly DeliveryOutcome[],
  retryCount: number,
  maxRetries: number,
): AggregateDecision => {
  const failed = outcomes.filter((outcome) => !outcome.success);

  if (failed.length === 0) {
    return { status: 'completed', message: '' };
  }

  if (failed.length < outcomes.length) {
    return {
      status: 'completed',
      message: `Partial success: ${failed.length}/${outcomes.length} services failed`,
    };
  }

  const errors = failed.map(
    (outcome) =>
      `${outcome.service_id}: ${outcome.error ? outcome.error.message : 'unknown error'}`,
  );
  return {
    status: retryCount < maxRetries ? 'retrying' : 'failed',
    message: `All services failed: [${errors.join('; ')}]`,
  };
};
