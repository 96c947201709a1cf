/**
 * Email templates for pipeline outcome notifications.
 * Templates live in `templates/emails/<name>.json` and use the same
 * placeholder syntax as prompt templates; every value is HTML-escaped.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { getTemplatesPath } from '@/shared/path-utils.js';
import { PromptService } from './prompt.js';

const emailTemplateSchema = z.object({
  subject: z.string(),
  html: z.string(),
});

export type EmailTemplate = z.infer<typeof emailTemplateSchema>;

export type EmailTemplateName = 'story-ready' | 'story-failed';

export interface RenderedEmail {
  subject: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export class EmailTemplateService {
  private readonly basePath: string;
  private readonly cache = new Map<EmailTemplateName, EmailTemplate>();

  constructor(basePath: string = join(getTemplatesPath(), 'emails')) {
    this.basePath = basePath;
  }

  async load(name: EmailTemplateName): Promise<EmailTemplate> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const content = await readFile(join(this.basePath, `${name}.json`), 'utf-8');
    const template = emailTemplateSchema.parse(JSON.parse(content));
    this.cache.set(name, template);
    return template;
  }

  /**
   * Subjects are plain text and keep raw values; bodies get escaped values.
   * Boolean variables drive `{{#name}}` sections and are not escaped.
   */
  async render(
    name: EmailTemplateName,
    variables: Record<string, string | number | boolean>,
  ): Promise<RenderedEmail> {
    const template = await this.load(name);

    const escaped: Record<string, string> = {};
    const sections: Record<string, string> = {};
    for (const [key, value] of Object.entries(variables)) {
      if (typeof value === 'boolean') {
        sections[key] = value ? 'yes' : '';
      } else {
        escaped[key] = escapeHtml(String(value));
      }
    }

    return {
      subject: PromptService.processPrompt(template.subject, { ...variables, ...sections }),
      html: PromptService.processPrompt(template.html, { ...sections, ...escaped }),
    };
  }
}
