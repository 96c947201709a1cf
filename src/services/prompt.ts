/**
 * Prompt Service
 * Handles loading and processing of AI prompts from JSON files
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { getPromptsPath } from '../shared/path-utils.js';

const promptTemplateSchema = z.object({
  systemPrompt: z.string().optional(),
  userPrompt: z.string(),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

const imageStyleSchema = z.object({
  description: z.string(),
  style: z.string(),
});

export type ImageStyleTemplate = z.infer<typeof imageStyleSchema>;

const imageStylesSchema = z.record(imageStyleSchema);

export type ImageStylesCollection = z.infer<typeof imageStylesSchema>;

export const DEFAULT_IMAGE_STYLE: ImageStyleTemplate = {
  description: 'A high-quality illustration with attention to detail and composition.',
  style: 'high quality, detailed, well-composed',
};

export interface RenderedPrompt {
  systemPrompt?: string;
  userPrompt: string;
}

export class PromptService {
  private readonly basePath: string;
  private readonly cache = new Map<string, PromptTemplate>();
  private imageStyles: ImageStylesCollection | null = null;

  constructor(basePath: string = getPromptsPath()) {
    this.basePath = basePath;
  }

  /**
   * Load a prompt template from `<basePath>/<promptName>.json`
   */
  async loadPrompt(promptName: string): Promise<PromptTemplate> {
    const cached = this.cache.get(promptName);
    if (cached) return cached;

    const promptPath = join(this.basePath, `${promptName}.json`);
    try {
      const promptContent = await readFile(promptPath, 'utf-8');
      const template = promptTemplateSchema.parse(JSON.parse(promptContent));
      this.cache.set(promptName, template);

      logger.debug('Prompt template loaded successfully', { promptName, promptPath });
      return template;
    } catch (error) {
      logger.error('Failed to load prompt template', {
        error: error instanceof Error ? error.message : String(error),
        promptName,
      });
      throw new Error(`Failed to load prompt template: ${promptName}`);
    }
  }

  /**
   * Replace `{{variable}}` placeholders and resolve `{{#variable}}...{{/variable}}`
   * sections, which are kept only when the variable is non-empty.
   */
  static processPrompt(template: string, variables: Record<string, unknown>): string {
    let processed = template;

    for (const [key, value] of Object.entries(variables)) {
      const conditionalPattern = new RegExp(`\\{\\{#${key}\\}\\}([\\s\\S]*?)\\{\\{\\/${key}\\}\\}`, 'g');
      const present = value !== undefined && value !== null && String(value).trim() !== '';
      processed = processed.replace(conditionalPattern, (_match, body: string) => (present ? body : ''));
    }

    for (const [key, value] of Object.entries(variables)) {
      processed = processed.split(`{{${key}}}`).join(String(value ?? ''));
    }

    return processed;
  }

  async render(promptName: string, variables: Record<string, unknown>): Promise<RenderedPrompt> {
    const template = await this.loadPrompt(promptName);
    const userPrompt = PromptService.processPrompt(template.userPrompt, variables);
    if (template.systemPrompt) {
      return {
        systemPrompt: PromptService.processPrompt(template.systemPrompt, variables),
        userPrompt,
      };
    }
    return { userPrompt };
  }

  async loadImageStyles(): Promise<ImageStylesCollection> {
    if (this.imageStyles) return this.imageStyles;

    const stylesPath = join(this.basePath, 'imageStyles.json');
    try {
      const stylesContent = await readFile(stylesPath, 'utf-8');
      this.imageStyles = imageStylesSchema.parse(JSON.parse(stylesContent));

      logger.debug('Image styles loaded successfully', {
        stylesCount: Object.keys(this.imageStyles).length,
        stylesPath,
      });
      return this.imageStyles;
    } catch (error) {
      logger.error('Failed to load image styles', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new Error('Failed to load image styles configuration');
    }
  }

  /**
   * Unknown style names fall back to a neutral illustration style.
   */
  async getImageStyle(styleName: string): Promise<ImageStyleTemplate> {
    const imageStyles = await this.loadImageStyles();
    const style = imageStyles[styleName.toLowerCase()];
    if (!style) {
      logger.warn('Image style not found, using default', { styleName });
      return DEFAULT_IMAGE_STYLE;
    }
    return style;
  }
}
