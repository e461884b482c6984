/**
 * Validation schemas and utilities for jobs, queue entries and templates
 */

import cron from 'node-cron';
import { z } from 'zod';
import { NOTIFY_TYPES, JOB_STATUSES } from '../database/models';
import { isValidCron } from './cron';
import { handleValidationError, ValidationError } from './errors';

// Service URL validation (scheme://...)
export const serviceUrlSchema = z
  .string()
  .trim()
  .regex(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/\S+$/, {
    message: 'Service URL must look like scheme://[user[:pass]@]host[/path][?query]',
  });

export const cronExpressionSchema = z
  .string()
  .trim()
  // The ticker (node-cron) must accept it as well as our own parser
  .refine((expression) => isValidCron(expression) && cron.validate(expression), {
    message: 'Cron expression must be a valid 5-field expression',
  });

// Job names are used as identifiers in logs and APIs
const jobNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'Name is required' })
  .max(255, { message: 'Name must be at most 255 characters long' });

const templateNameSchema = z
  .string()
  .trim()
  .regex(/^[a-zA-Z0-9_.-]{1,100}$/, {
    message:
      'Template name must be 1-100 characters of letters, numbers, dots, dashes and underscores',
  });

export const notifyTypeSchema = z.enum(NOTIFY_TYPES);
export const jobStatusSchema = z.enum(JOB_STATUSES);

const tagsSchema = z.array(z.string().min(1).max(100));
const metadataSchema = z.record(z.string(), z.string());

export const createScheduledJobSchema = z.object({
  name: jobNameSchema,
  cron_expression: cronExpressionSchema,
  title: z.string(),
  body: z.string(),
  notify_type: notifyTypeSchema.default('info'),
  services: z
    .array(serviceUrlSchema)
    .min(1, { message: 'At least one service URL is required' }),
  tags: tagsSchema.default([]),
  metadata: metadataSchema.default({}),
  template_name: templateNameSchema.nullish().transform((v) => v ?? null),
  enabled: z.boolean().default(true),
});

export const updateScheduledJobSchema = z.object({
  name: jobNameSchema.optional(),
  cron_expression: cronExpressionSchema.optional(),
  title: z.string().optional(),
  body: z.string().optional(),
  notify_type: notifyTypeSchema.optional(),
  services: z
    .array(serviceUrlSchema)
    .min(1, { message: 'At least one service URL is required' })
    .optional(),
  tags: tagsSchema.optional(),
  metadata: metadataSchema.optional(),
  template_name: templateNameSchema.nullable().optional(),
  enabled: z.boolean().optional(),
});

export const enqueueJobSchema = z.object({
  scheduled_id: z.number().int().positive().nullish(),
  title: z.string(),
  body: z.string(),
  notify_type: notifyTypeSchema.optional(),
  services: z
    .array(serviceUrlSchema)
    .min(1, { message: 'At least one service URL is required' }),
  tags: tagsSchema.optional(),
  metadata: metadataSchema.optional(),
  template_name: templateNameSchema.nullish(),
  priority: z.number().int().min(1).optional(),
  max_retries: z.number().int().min(0).optional(),
  retry_delay_ms: z.number().int().positive().optional(),
});

export const createTemplateSchema = z.object({
  name: templateNameSchema,
  title_template: z.string(),
  body_template: z.string(),
  variables: metadataSchema.default({}),
  description: z.string().max(1000).default(''),
});

export const updateTemplateSchema = createTemplateSchema
  .omit({ name: true })
  .partial();

// Schemas for JSON payload columns read back from the database
export const servicesColumnSchema = z.array(z.string());
export const tagsColumnSchema = z.array(z.string());
export const metadataColumnSchema = metadataSchema;

// Validation utility functions
export class ValidationUtils {
  /**
   * Parses input with a schema and rethrows failures as ValidationError
   */
  static parse<S extends z.ZodTypeAny>(
    schema: S,
    input: unknown,
    context: string,
  ): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw handleValidationError(result.error, context);
    }
    return result.data;
  }

  /**
   * Parses a JSON text column. Empty and "null" columns yield the fallback.
   */
  static parseJsonColumn<S extends z.ZodTypeAny>(
    raw: unknown,
    schema: S,
    fallback: z.output<S>,
    column: string,
  ): z.output<S> {
    if (raw === null || raw === undefined || raw === '' || raw === 'null') {
      return fallback;
    }

    let decoded: unknown = raw;
    if (typeof raw === 'string') {
      try {
        decoded = JSON.parse(raw);
      } catch {
        throw new ValidationError(`Corrupt ${column} column: invalid JSON`);
      }
    }

    return ValidationUtils.parse(schema, decoded, `Corrupt ${column} column`);
  }

  /**
   * Reads an integer from string metadata, returning undefined when absent
   * or malformed
   */
  static metadataInt(
    metadata: Record<string, string>,
    key: string,
    min: number,
  ): number | undefined {
    const raw = metadata[key];
    if (raw === undefined || !/^-?\d+$/.test(raw.trim())) {
      return undefined;
    }
    const value = Number(raw.trim());
    return value >= min ? value : undefined;
  }
}
