/**
 * Generic JSON webhook.
 *
 *   webhook://host[:port]/path      plain HTTP
 *   webhooks://host[:port]/path     HTTPS
 *   json://host/path, jsons://...   HTTPS
 *
 * Query options: `method=PUT`, `header_<Name>=<value>`. Credentials in the
 * URL become an Authorization header: `user:pass@` is Basic auth, a bare
 * `token@` is a Bearer token.
 */

import { Dispatcher } from 'undici';
import { Notification } from '../database/models';
import { InvalidEndpointURLError } from '../utils/errors';
import { HttpPoolCategory } from './HttpClientPools';
import { HttpEndpoint, parseServiceUrl } from './HttpEndpoint';

export const WEBHOOK_SCHEMES = ['webhook', 'webhooks', 'json', 'jsons'] as const;

const ALLOWED_METHODS: readonly Dispatcher.HttpMethod[] = [
  'POST',
  'PUT',
  'PATCH',
];

export interface WebhookPayload {
  title?: string;
  message: string;
  type: string;
  timestamp: string;
  tags?: string[];
  metadata: Record<string, string>;
}

interface WebhookConfig {
  targetUrl: string;
  secure: boolean;
  method: Dispatcher.HttpMethod;
  headers: Record<string, string>;
}

export class WebhookEndpoint extends HttpEndpoint {
  readonly serviceId = 'webhook';
  protected readonly poolCategory: HttpPoolCategory = 'webhook';
  private config: WebhookConfig | null = null;

  parse(serviceUrl: string): void {
    const url = parseServiceUrl(serviceUrl, WEBHOOK_SCHEMES);
    if (!url.hostname) {
      throw new InvalidEndpointURLError('Webhook host is required', serviceUrl);
    }

    const secure = url.protocol !== 'webhook:';
    const port = url.port ? `:${url.port}` : '';
    const targetUrl = `${secure ? 'https' : 'http'}://${url.hostname}${port}${url.pathname || '/'}`;

    let method: Dispatcher.HttpMethod = 'POST';
    const headers: Record<string, string> = {};

    for (const [key, value] of url.searchParams) {
      if (key === 'method') {
        const upper = value.toUpperCase();
        const allowed = ALLOWED_METHODS.find((m) => m === upper);
        if (!allowed) {
          throw new InvalidEndpointURLError(
            `Unsupported webhook method: ${value}`,
            serviceUrl,
          );
        }
        method = allowed;
      } else if (key.startsWith('header_') && key.length > 'header_'.length) {
        headers[key.slice('header_'.length)] = value;
      }
    }

    if (url.username) {
      const user = decodeURIComponent(url.username);
      headers.Authorization = url.password
        ? `Basic ${Buffer.from(`${user}:${decodeURIComponent(url.password)}`).toString('base64')}`
        : `Bearer ${user}`;
    }

    this.config = { targetUrl, secure, method, headers };
  }

  defaultPort(): number {
    return this.config && !this.config.secure ? 80 : 443;
  }

  buildPayload(notification: Notification): WebhookPayload {
    const payload: WebhookPayload = {
      message: this.truncate(notification.body),
      type: notification.type,
      timestamp: new Date().toISOString(),
      metadata: {
        service: this.serviceId,
        format: notification.body_format ?? 'text',
      },
    };
    if (notification.title) {
      payload.title = notification.title;
    }
    if (notification.tags.size > 0) {
      payload.tags = [...notification.tags];
    }
    return payload;
  }

  async send(notification: Notification, signal: AbortSignal): Promise<void> {
    if (!this.config) {
      throw new InvalidEndpointURLError('Webhook endpoint is not configured');
    }

    await this.sendHttp(this.config.targetUrl, {
      method: this.config.method,
      headers: {
        'content-type': 'application/json',
        ...this.config.headers,
      },
      body: JSON.stringify(this.buildPayload(notification)),
      signal,
    });
  }
}
