/**
 * Template model - reusable title/body pair rendered with variables
 */

export interface NotificationTemplate {
  id: number;
  name: string;
  title_template: string;
  body_template: string;
  variables: Record<string, string>;
  description: string;
  created_at: Date;
  updated_at: Date;
}

export interface CreateTemplateData {
  name: string;
  title_template: string;
  body_template: string;
  variables?: Record<string, string>;
  description?: string;
}

export type UpdateTemplateData = Partial<Omit<CreateTemplateData, 'name'>>;

export interface RenderedTemplate {
  title: string;
  body: string;
}
