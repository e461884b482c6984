/**
 * Database models index - exports all model types and interfaces
 */

export * from './Notification';
export * from './ScheduledJob';
export * from './QueuedJob';
export * from './Template';
export * from './Metrics';
