/**
 * Error hierarchy shared by the scheduler, queue, templates and endpoints
 */

import { ZodError } from 'zod';
import logger from './logger';

// Base error classes
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'INTERNAL_ERROR',
    public isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class QueueBackendError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, 'QUEUE_BACKEND_ERROR');
    this.name = 'QueueBackendError';
    if (originalError) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Raised when a queued job is not in a state that allows the requested
 * transition (e.g. completing a job that was never leased).
 */
export class QueueStateError extends AppError {
  constructor(message: string) {
    super(message, 'QUEUE_STATE_ERROR');
    this.name = 'QueueStateError';
  }
}

// Endpoint resolution
export class InvalidEndpointURLError extends AppError {
  constructor(
    message: string,
    public serviceUrl?: string,
  ) {
    super(message, 'INVALID_ENDPOINT_URL');
    this.name = 'InvalidEndpointURLError';
  }
}

export class UnknownSchemeError extends AppError {
  constructor(public scheme: string) {
    super(`Unknown service scheme: ${scheme}`, 'UNKNOWN_SCHEME');
    this.name = 'UnknownSchemeError';
  }
}

// Templates
export class TemplateNotFoundError extends AppError {
  constructor(public templateName: string) {
    super(`Template '${templateName}' not found`, 'TEMPLATE_NOT_FOUND');
    this.name = 'TemplateNotFoundError';
  }
}

export class TemplateSyntaxError extends AppError {
  constructor(
    public templateName: string,
    public part: 'title' | 'body',
    message: string,
  ) {
    super(
      `Invalid ${part} template '${templateName}': ${message}`,
      'TEMPLATE_SYNTAX_ERROR',
    );
    this.name = 'TemplateSyntaxError';
  }
}

// Delivery
export class DeliveryError extends AppError {
  constructor(
    message: string,
    code: string,
    public transient: boolean,
    public statusCode?: number,
  ) {
    super(message, code);
    this.name = 'DeliveryError';
  }
}

export class TransientDeliveryError extends DeliveryError {
  constructor(message: string, statusCode?: number) {
    super(message, 'TRANSIENT_DELIVERY_ERROR', true, statusCode);
    this.name = 'TransientDeliveryError';
  }
}

export class PermanentDeliveryError extends DeliveryError {
  constructor(message: string, statusCode?: number) {
    super(message, 'PERMANENT_DELIVERY_ERROR', false, statusCode);
    this.name = 'PermanentDeliveryError';
  }
}

export class CancelledError extends DeliveryError {
  constructor(message = 'cancelled') {
    super(message, 'CANCELLED', true);
    this.name = 'CancelledError';
  }
}

// Validation error handler
export const handleValidationError = (
  error: ZodError,
  context = 'Validation failed',
): ValidationError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });

  return new ValidationError(`${context}: ${messages.join(', ')}`, error.errors);
};

const hasPgCode = (error: Error): error is Error & { code: string } =>
  'code' in error && typeof error.code === 'string';

// Database error handler
export const handleDatabaseError = (
  error: unknown,
  operation: string,
): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new QueueBackendError(`${operation} failed: ${String(error)}`);
  }

  logger.error('Database error details', {
    operation,
    name: error.name,
    message: error.message,
  });

  // Handle specific PostgreSQL errors
  if (hasPgCode(error)) {
    switch (error.code) {
      case '23505': // unique_violation
        return new ConflictError(`${operation}: resource already exists`);
      case '23503': // foreign_key_violation
        return new ValidationError(
          `${operation}: referenced resource does not exist`,
        );
      case '23502': // not_null_violation
        return new ValidationError(`${operation}: required field is missing`);
      case '23514': // check_violation
        return new ValidationError(`${operation}: data violates constraint`);
      default:
        break;
    }
  }

  return new QueueBackendError(`${operation} failed: ${error.message}`, error);
};

/**
 * Flattens any thrown value into a message suitable for persistence.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
