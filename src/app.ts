/**
 * Wires stores, endpoints and services into one runnable application
 */

import { AppConfig } from './config';
import {
  MetricsDAO,
  MetricsStore,
  QueueDAO,
  QueueStore,
  ScheduledJobDAO,
  ScheduledJobStore,
  TemplateDAO,
  TemplateStore,
} from './database/dao';
import {
  EndpointRegistry,
  EndpointRegistryBuilder,
  HttpClientPools,
  registerBuiltinEndpoints,
} from './endpoints';
import {
  CronTicker,
  DeliveryDispatcher,
  MetricsRecorder,
  NotificationQueue,
  NotificationScheduler,
  QueueProcessor,
  TemplateEngine,
} from './services';
import { errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('App');

export interface AppStores {
  scheduledJobs: ScheduledJobStore;
  queue: QueueStore;
  templates: TemplateStore;
  metrics: MetricsStore;
}

export interface AppOverrides {
  stores?: Partial<AppStores>;
  pools?: HttpClientPools;
  ticker?: CronTicker;
  clock?: () => Date;
}

export interface Application {
  pools: HttpClientPools;
  registry: EndpointRegistry;
  templates: TemplateEngine;
  queue: NotificationQueue;
  scheduler: NotificationScheduler;
  metrics: MetricsRecorder;
  dispatcher: DeliveryDispatcher;
  processor: QueueProcessor;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createApplication = (
  config: Readonly<AppConfig>,
  overrides: AppOverrides = {},
): Application => {
  const stores: AppStores = {
    scheduledJobs: overrides.stores?.scheduledJobs ?? new ScheduledJobDAO(),
    queue: overrides.stores?.queue ?? new QueueDAO(),
    templates: overrides.stores?.templates ?? new TemplateDAO(),
    metrics: overrides.stores?.metrics ?? new MetricsDAO(),
  };
  const { clock, ticker } = overrides;

  const pools = overrides.pools ?? new HttpClientPools();
  const registry = registerBuiltinEndpoints(new EndpointRegistryBuilder()).build({
    pools,
  });
  const validateServices = (urls: readonly string[]): void =>
    registry.validateAll(urls);

  const metrics = new MetricsRecorder(stores.metrics, {
    namespace: config.metrics.namespace,
    persistSamples: config.metrics.enabled,
    clock,
  });
  const templates = new TemplateEngine(stores.templates, { clock });
  const queue = new NotificationQueue(stores.queue, {
    defaults: {
      priority: config.queue.defaultPriority,
      maxRetries: config.queue.defaultMaxRetries,
      retryDelayMs: config.queue.defaultRetryDelayMs,
    },
    clock,
    validateServices,
  });
  const scheduler = new NotificationScheduler(stores.scheduledJobs, queue, {
    ticker,
    clock,
    validateServices,
  });
  const dispatcher = new DeliveryDispatcher({
    maxConcurrency: config.dispatch.maxConcurrency,
    defaultTimeoutMs: config.dispatch.timeoutMs,
    observer: metrics,
  });
  const processor = new QueueProcessor(
    { queue, dispatcher, registry, templates, metrics },
    {
      pollIntervalMs: config.queue.pollIntervalMs,
      batchSize: config.queue.batchSize,
      dispatchTimeoutMs: config.dispatch.timeoutMs,
      queueRetentionDays: config.queue.retentionDays,
      metricsRetentionDays: config.metrics.retentionDays,
      cleanupCron: config.cleanupCron,
      ticker,
      clock,
    },
  );

  return {
    pools,
    registry,
    templates,
    queue,
    scheduler,
    metrics,
    dispatcher,
    processor,

    async start() {
      if (config.seedDefaultTemplates) {
        await templates.seedDefaults();
      }
      metrics.updateGauge('services_configured', registry.schemes().length);
      await scheduler.start();
      processor.start();
      logger.info('Notification scheduler is running', {
        schemes: registry.schemes(),
      });
    },

    async stop() {
      if (scheduler.getStatus().running) {
        await scheduler.stop();
      }
      await processor.stop();
      try {
        await pools.close();
      } catch (error) {
        logger.warn('Closing HTTP pools failed', { error: errorMessage(error) });
      }
    },
  };
};
