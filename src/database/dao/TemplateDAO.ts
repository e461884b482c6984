/**
 * TemplateDAO - data access for notification templates
 */

import { z } from 'zod';
import { Logger } from 'winston';
import { db, Queryable } from '../connection';
import { NotificationTemplate } from '../models';
import { createLogger } from '../../utils/logger';
import { handleDatabaseError } from '../../utils/errors';
import { metadataColumnSchema, ValidationUtils } from '../../utils/validation';
import { NewTemplate, TemplatePatch, TemplateStore } from './types';

const templateRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  title: z.string(),
  body: z.string(),
  variables: z.unknown(),
  description: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export const mapTemplateRow = (raw: unknown): NotificationTemplate => {
  const row = ValidationUtils.parse(
    templateRowSchema,
    raw,
    'Corrupt notification_templates row',
  );

  return {
    id: row.id,
    name: row.name,
    title_template: row.title,
    body_template: row.body,
    variables: ValidationUtils.parseJsonColumn(
      row.variables,
      metadataColumnSchema,
      {},
      'variables',
    ),
    description: row.description ?? '',
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
};

export class TemplateDAO implements TemplateStore {
  private logger: Logger;

  constructor(private readonly client: Queryable = db) {
    this.logger = createLogger('TemplateDAO');
  }

  async insert(template: NewTemplate): Promise<NotificationTemplate> {
    try {
      const query = `
        INSERT INTO notification_templates (
          name, title, body, variables, description, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *
      `;

      const result = await this.client.query(query, [
        template.name,
        template.title_template,
        template.body_template,
        JSON.stringify(template.variables),
        template.description,
        template.created_at,
        template.updated_at,
      ]);

      this.logger.info('Template created', { name: template.name });
      return mapTemplateRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error creating template', { name: template.name });
      throw handleDatabaseError(error, 'Create template');
    }
  }

  async findByName(name: string): Promise<NotificationTemplate | null> {
    try {
      const result = await this.client.query(
        'SELECT * FROM notification_templates WHERE name = $1',
        [name],
      );
      return result.rows.length === 0 ? null : mapTemplateRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error getting template', { name });
      throw handleDatabaseError(error, 'Get template');
    }
  }

  async list(): Promise<NotificationTemplate[]> {
    try {
      const result = await this.client.query(
        'SELECT * FROM notification_templates ORDER BY name ASC',
      );
      return result.rows.map(mapTemplateRow);
    } catch (error) {
      this.logger.error('Error listing templates');
      throw handleDatabaseError(error, 'List templates');
    }
  }

  async update(
    name: string,
    patch: TemplatePatch,
  ): Promise<NotificationTemplate | null> {
    try {
      const updates: string[] = [];
      const values: unknown[] = [];
      let valueIndex = 1;

      const set = (column: string, value: unknown): void => {
        updates.push(`${column} = $${valueIndex++}`);
        values.push(value);
      };

      if (patch.title_template !== undefined) set('title', patch.title_template);
      if (patch.body_template !== undefined) set('body', patch.body_template);
      if (patch.variables !== undefined) {
        set('variables', JSON.stringify(patch.variables));
      }
      if (patch.description !== undefined) set('description', patch.description);
      set('updated_at', patch.updated_at);

      values.push(name);
      const query = `
        UPDATE notification_templates
        SET ${updates.join(', ')}
        WHERE name = $${valueIndex}
        RETURNING *
      `;

      const result = await this.client.query(query, values);
      return result.rows.length === 0 ? null : mapTemplateRow(result.rows[0]);
    } catch (error) {
      this.logger.error('Error updating template', { name });
      throw handleDatabaseError(error, 'Update template');
    }
  }

  async delete(name: string): Promise<boolean> {
    try {
      const result = await this.client.query(
        'DELETE FROM notification_templates WHERE name = $1',
        [name],
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      this.logger.error('Error deleting template', { name });
      throw handleDatabaseError(error, 'Delete template');
    }
  }
}
