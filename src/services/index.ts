/**
 * Services exports
 */

export * from './DeliveryDispatcher';
export * from './TemplateEngine';
export * from './NotificationQueue';
export * from './NotificationScheduler';
export * from './MetricsRecorder';
export * from './QueueProcessor';
