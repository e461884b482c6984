/**
 * TemplateEngine - stores notification templates and renders them with
 * Handlebars
 */

import Handlebars from 'handlebars';
import { Logger } from 'winston';
import defaultTemplates from '../templates/default-templates.json';
import { TemplateStore } from '../database/dao';
import {
  CreateTemplateData,
  NotificationTemplate,
  RenderedTemplate,
  UpdateTemplateData,
} from '../database/models';
import {
  ConflictError,
  errorMessage,
  TemplateNotFoundError,
  TemplateSyntaxError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  createTemplateSchema,
  updateTemplateSchema,
  ValidationUtils,
} from '../utils/validation';

type TemplateSource = Pick<
  NotificationTemplate,
  'name' | 'title_template' | 'body_template'
>;

const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || value === '';

// Handlebars passes its options object as the last helper argument
const isHelperOptions = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && 'hash' in value;

const asText = (value: unknown): string =>
  isBlank(value) || isHelperOptions(value) ? '' : String(value);

/**
 * RFC 3339 timestamp in the process-local offset, without fractions
 */
export const formatRfc3339 = (date: Date): string => {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);
  const offset =
    offsetMinutes === 0
      ? 'Z'
      : `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    offset
  );
};

/**
 * Variables injected into every render. They take precedence over template
 * defaults and caller values.
 */
export const systemVariables = (now: Date): Record<string, string> => ({
  timestamp: formatRfc3339(now),
  date: `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`,
  time: `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`,
  unix_time: String(Math.floor(now.getTime() / 1000)),
  year: String(now.getFullYear()),
  month: pad(now.getMonth() + 1),
  day: pad(now.getDate()),
  hour: pad(now.getHours()),
  minute: pad(now.getMinutes()),
  weekday: WEEKDAYS[now.getDay()],
});

const createHandlebars = (): typeof Handlebars => {
  const hb = Handlebars.create();

  hb.registerHelper('default', (value: unknown, fallback: unknown) =>
    isBlank(value) ? asText(fallback) : String(value),
  );
  hb.registerHelper('upper', (value: unknown) => asText(value).toUpperCase());
  hb.registerHelper('lower', (value: unknown) => asText(value).toLowerCase());
  hb.registerHelper('titlecase', (value: unknown) =>
    asText(value)
      .toLowerCase()
      .replace(/(^|\s)(\S)/g, (_match, space: string, letter: string) =>
        space + letter.toUpperCase(),
      ),
  );

  return hb;
};

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

export interface TemplateEngineOptions {
  clock?: () => Date;
}

export class TemplateEngine {
  private logger: Logger;
  private readonly hb = createHandlebars();
  private readonly compiled = new Map<string, CompiledTemplate>();
  private readonly clock: () => Date;

  constructor(
    private readonly store: TemplateStore,
    options: TemplateEngineOptions = {},
  ) {
    this.logger = createLogger('TemplateEngine');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Parses title and body without executing them
   */
  validate(template: TemplateSource): void {
    const parts: Array<['title' | 'body', string]> = [
      ['title', template.title_template],
      ['body', template.body_template],
    ];

    for (const [part, source] of parts) {
      try {
        this.hb.parse(source);
      } catch (error) {
        throw new TemplateSyntaxError(template.name, part, errorMessage(error));
      }
    }
  }

  async create(data: CreateTemplateData): Promise<NotificationTemplate> {
    const input = ValidationUtils.parse(
      createTemplateSchema,
      data,
      'Invalid template',
    );
    this.validate(input);

    if (await this.store.findByName(input.name)) {
      throw new ConflictError(`Template '${input.name}' already exists`);
    }

    const now = this.clock();
    const created = await this.store.insert({
      ...input,
      created_at: now,
      updated_at: now,
    });

    this.logger.info('Template created', { name: created.name });
    return created;
  }

  async get(name: string): Promise<NotificationTemplate> {
    const template = await this.store.findByName(name);
    if (!template) {
      throw new TemplateNotFoundError(name);
    }
    return template;
  }

  async list(): Promise<NotificationTemplate[]> {
    return this.store.list();
  }

  async update(
    name: string,
    data: UpdateTemplateData,
  ): Promise<NotificationTemplate> {
    const patch = ValidationUtils.parse(
      updateTemplateSchema,
      data,
      'Invalid template update',
    );
    const current = await this.get(name);

    this.validate({
      name,
      title_template: patch.title_template ?? current.title_template,
      body_template: patch.body_template ?? current.body_template,
    });

    const updated = await this.store.update(name, {
      ...patch,
      updated_at: this.clock(),
    });
    if (!updated) {
      throw new TemplateNotFoundError(name);
    }

    this.logger.info('Template updated', { name, fields: Object.keys(patch) });
    return updated;
  }

  async delete(name: string): Promise<void> {
    if (!(await this.store.delete(name))) {
      throw new TemplateNotFoundError(name);
    }
    this.logger.info('Template deleted', { name });
  }

  /**
   * Loads a stored template and renders it
   */
  async render(
    name: string,
    variables: Record<string, string> = {},
  ): Promise<RenderedTemplate> {
    const template = await this.get(name);
    return this.renderTemplate(template, variables);
  }

  /**
   * Renders with template defaults overridden by `variables`
   */
  renderTemplate(
    template: Pick<
      NotificationTemplate,
      'name' | 'title_template' | 'body_template' | 'variables'
    >,
    variables: Record<string, string> = {},
  ): RenderedTemplate {
    const context: Record<string, string> = {
      ...template.variables,
      ...variables,
      ...systemVariables(this.clock()),
    };

    return {
      title: this.execute(template.name, 'title', template.title_template, context),
      body: this.execute(template.name, 'body', template.body_template, context),
    };
  }

  /**
   * Inserts the stock templates that are not stored yet. Returns how many
   * were created.
   */
  async seedDefaults(): Promise<number> {
    let created = 0;

    for (const template of defaultTemplates) {
      if (await this.store.findByName(template.name)) {
        continue;
      }
      await this.create(template);
      created++;
    }

    if (created > 0) {
      this.logger.info('Default templates created', { created });
    }
    return created;
  }

  private execute(
    name: string,
    part: 'title' | 'body',
    source: string,
    context: Record<string, string>,
  ): string {
    try {
      let compiled = this.compiled.get(source);
      if (!compiled) {
        compiled = this.hb.compile(source, { noEscape: true });
        this.compiled.set(source, compiled);
      }
      return compiled(context);
    } catch (error) {
      throw new TemplateSyntaxError(name, part, errorMessage(error));
    }
  }
}
