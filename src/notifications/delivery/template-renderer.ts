import templates from '../templates/notification-templates.json';
import { NotificationChannel, TemplateKey, TemplateVariables } from './notification-sender';

export interface RenderedMessage {
  subject?: string;
  body: string;
}

interface ChannelTemplate {
  subject?: string;
  body: string;
}

type TemplateCatalog = Record<string, Partial<Record<NotificationChannel, ChannelTemplate>>>;

const catalog: TemplateCatalog = templates;

const fill = (text: string, variables: TemplateVariables): string =>
  text.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in variables ? String(variables[name]) : placeholder,
  );

export class TemplateNotFoundError extends Error {
  constructor(templateKey: string, channel: string) {
    super(`No ${channel} template for ${templateKey}`);
    this.name = 'TemplateNotFoundError';
  }
}

/** Unknown placeholders are left in place. */
export function renderTemplate(
  templateKey: TemplateKey,
  channel: NotificationChannel,
  variables: TemplateVariables,
): RenderedMessage {
  const template = catalog[templateKey]?.[channel];
  if (!template) {
    throw new TemplateNotFoundError(templateKey, channel);
  }
  return {
    body: fill(template.body, variables),
    ...(template.subject ? { subject: fill(template.subject, variables) } : {}),
  };
}
