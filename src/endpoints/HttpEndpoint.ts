/**
 * Base class for endpoints that deliver over HTTP through the shared pools
 */

import { Dispatcher, FormData, request } from 'undici';
import { Notification } from '../database/models';
import {
  CancelledError,
  DeliveryError,
  errorMessage,
  InvalidEndpointURLError,
  PermanentDeliveryError,
  TransientDeliveryError,
} from '../utils/errors';
import { HttpClientPools, HttpPoolCategory } from './HttpClientPools';
import { DeliveryEndpoint } from './types';

export const TRUNCATION_MARKER = '... [truncated]';

// Longest response excerpt kept in an error message
const ERROR_BODY_EXCERPT = 200;

export const USER_AGENT = 'notify-scheduler/1.0';

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

// Never leaves half of a surrogate pair at the cut
const sliceCodeUnits = (body: string, end: number): string =>
  body.slice(0, end > 0 && isHighSurrogate(body.charCodeAt(end - 1)) ? end - 1 : end);

/**
 * Cuts `body` to at most `maxLength` UTF-16 units, ending with
 * TRUNCATION_MARKER. A maxLength of 0 disables the limit.
 */
export const truncateBody = (body: string, maxLength: number): string => {
  if (maxLength <= 0 || body.length <= maxLength) {
    return body;
  }
  if (maxLength <= TRUNCATION_MARKER.length) {
    return sliceCodeUnits(body, maxLength);
  }
  return sliceCodeUnits(body, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
};

/**
 * Maps a non-2xx HTTP status to the delivery error family
 */
export const classifyHttpStatus = (
  statusCode: number,
  message: string,
): DeliveryError => {
  const transient =
    statusCode === 408 ||
    statusCode === 425 ||
    statusCode === 429 ||
    statusCode >= 500;

  return transient
    ? new TransientDeliveryError(message, statusCode)
    : new PermanentDeliveryError(message, statusCode);
};

/**
 * Parses a service URL with the WHATWG parser and checks its scheme
 */
export const parseServiceUrl = (
  serviceUrl: string,
  schemes: readonly string[],
): URL => {
  let parsed: URL;
  try {
    parsed = new URL(serviceUrl);
  } catch {
    throw new InvalidEndpointURLError('Malformed service URL', serviceUrl);
  }

  const scheme = parsed.protocol.replace(/:$/, '');
  if (!schemes.includes(scheme)) {
    throw new InvalidEndpointURLError(
      `Expected scheme ${schemes.join(', ')}, got ${scheme}`,
      serviceUrl,
    );
  }
  return parsed;
};

export const pathSegments = (url: URL): string[] =>
  url.pathname
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => decodeURIComponent(segment));

export type HttpRequestBody = string | FormData;

export interface HttpSendOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body: HttpRequestBody;
  signal: AbortSignal;
}

export abstract class HttpEndpoint implements DeliveryEndpoint {
  abstract readonly serviceId: string;
  protected abstract readonly poolCategory: HttpPoolCategory;

  constructor(protected readonly pools: HttpClientPools) {}

  abstract parse(serviceUrl: string): void;

  abstract send(notification: Notification, signal: AbortSignal): Promise<void>;

  validate(serviceUrl: string): void {
    this.parse(serviceUrl);
  }

  supportsAttachments(): boolean {
    return false;
  }

  maxBodyLength(): number {
    return 0;
  }

  defaultPort(): number {
    return 443;
  }

  protected truncate(body: string): string {
    return truncateBody(body, this.maxBodyLength());
  }

  /**
   * Issues one HTTP request through the category pool. Resolves on 2xx.
   */
  protected async sendHttp(
    targetUrl: string,
    options: HttpSendOptions,
  ): Promise<void> {
    const { signal } = options;
    if (signal.aborted) {
      throw new CancelledError(`${this.serviceId}: cancelled before send`);
    }

    const headers: Record<string, string> = {
      'user-agent': USER_AGENT,
      ...options.headers,
    };

    let response: Dispatcher.ResponseData;
    try {
      response = await request(targetUrl, {
        method: options.method ?? 'POST',
        headers,
        body: options.body,
        signal,
        dispatcher: this.pools.dispatcher(this.poolCategory),
      });
    } catch (error) {
      if (signal.aborted) {
        throw new CancelledError(`${this.serviceId}: cancelled`);
      }
      throw new TransientDeliveryError(
        `${this.serviceId}: request failed: ${errorMessage(error)}`,
      );
    }

    const { statusCode, body } = response;
    if (statusCode >= 200 && statusCode < 300) {
      await body.dump();
      return;
    }

    const text = await body.text().catch(() => '');
    const excerpt = text.slice(0, ERROR_BODY_EXCERPT);
    throw classifyHttpStatus(
      statusCode,
      `${this.serviceId}: HTTP ${statusCode}${excerpt ? `: ${excerpt}` : ''}`,
    );
  }
}
