/**
 * DAO (Data Access Object) exports
 */

export * from './types';
export * from './ScheduledJobDAO';
export * from './QueueDAO';
export * from './TemplateDAO';
export * from './MetricsDAO';
