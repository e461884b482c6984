/**
 * Shared HTTP connection pools, one undici Agent per service category
 */

import { Agent, Dispatcher } from 'undici';
import { createLogger } from '../utils/logger';

const logger = createLogger('HttpClientPools');

export type HttpPoolCategory = 'default' | 'cloud' | 'webhook';

export const HTTP_POOL_CATEGORIES: readonly HttpPoolCategory[] = [
  'default',
  'cloud',
  'webhook',
];

export interface HttpPoolSettings {
  /** Applies to both response headers and body. */
  timeoutMs: number;
  connectTimeoutMs: number;
  /** Max sockets per origin. */
  connections: number;
  keepAliveTimeoutMs: number;
}

export const DEFAULT_POOL_SETTINGS: Readonly<
  Record<HttpPoolCategory, HttpPoolSettings>
> = {
  default: {
    timeoutMs: 30_000,
    connectTimeoutMs: 10_000,
    connections: 30,
    keepAliveTimeoutMs: 90_000,
  },
  // Cloud APIs are slower and see more traffic
  cloud: {
    timeoutMs: 60_000,
    connectTimeoutMs: 15_000,
    connections: 50,
    keepAliveTimeoutMs: 120_000,
  },
  webhook: {
    timeoutMs: 15_000,
    connectTimeoutMs: 10_000,
    connections: 20,
    keepAliveTimeoutMs: 60_000,
  },
};

export interface HttpClientPoolsOptions {
  settings?: Partial<Record<HttpPoolCategory, Partial<HttpPoolSettings>>>;
  /** Routes every category through one dispatcher (e.g. a MockAgent). */
  dispatcher?: Dispatcher;
}

export class HttpClientPools {
  private readonly settings: Record<HttpPoolCategory, HttpPoolSettings>;
  private readonly agents = new Map<HttpPoolCategory, Dispatcher>();
  private readonly override?: Dispatcher;

  constructor(options: HttpClientPoolsOptions = {}) {
    this.override = options.dispatcher;
    this.settings = {
      default: { ...DEFAULT_POOL_SETTINGS.default, ...options.settings?.default },
      cloud: { ...DEFAULT_POOL_SETTINGS.cloud, ...options.settings?.cloud },
      webhook: { ...DEFAULT_POOL_SETTINGS.webhook, ...options.settings?.webhook },
    };
  }

  /**
   * Returns the dispatcher for a category, creating its agent on first use
   */
  dispatcher(category: HttpPoolCategory): Dispatcher {
    if (this.override) {
      return this.override;
    }

    const existing = this.agents.get(category);
    if (existing) {
      return existing;
    }

    const settings = this.settings[category];
    const agent = new Agent({
      connections: settings.connections,
      keepAliveTimeout: settings.keepAliveTimeoutMs,
      keepAliveMaxTimeout: settings.keepAliveTimeoutMs,
      headersTimeout: settings.timeoutMs,
      bodyTimeout: settings.timeoutMs,
      connect: { timeout: settings.connectTimeoutMs },
    });

    this.agents.set(category, agent);
    logger.debug('HTTP pool created', { category, ...settings });
    return agent;
  }

  settingsFor(category: HttpPoolCategory): Readonly<HttpPoolSettings> {
    return this.settings[category];
  }

  /**
   * Closes every agent this instance created. An injected dispatcher is left
   * to its owner.
   */
  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
    if (agents.length > 0) {
      logger.info('HTTP pools closed', { count: agents.length });
    }
  }
}
