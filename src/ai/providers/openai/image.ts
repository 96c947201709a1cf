/**
 * OpenAI Image Generation Service
 */

import OpenAI from 'openai';
import {
  IImageGenerationService,
  ImageGenerationOptions,
  ImageQuality,
  ImageSize,
} from '../../interfaces.js';
import { logger } from '@/config/logger.js';

export interface OpenAIImageConfig {
  apiKey: string;
  model?: string | undefined;
  baseURL?: string | undefined;
  size?: ImageSize | undefined;
  quality?: ImageQuality | undefined;
}

export class OpenAIImageService implements IImageGenerationService {
  private client: OpenAI;
  private model: string;
  private size: ImageSize;
  private quality: ImageQuality;

  constructor(config: OpenAIImageConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.model = config.model || 'dall-e-3';
    this.size = config.size || '1792x1024';
    this.quality = config.quality || 'standard';
  }

  async generate(prompt: string, options?: ImageGenerationOptions): Promise<string> {
    const model = options?.model || this.model;
    const size = options?.size || this.size;
    const quality = options?.quality || this.quality;

    try {
      logger.info('OpenAI: Generating image', {
        model,
        size,
        quality,
        promptLength: prompt.length,
      });

      const response = await this.client.images.generate({
        model,
        prompt,
        n: 1,
        size,
        quality,
        response_format: 'url',
      });

      const image = response.data?.[0];
      if (!image?.url) {
        throw new Error('No image URL returned from OpenAI');
      }

      if (image.revised_prompt) {
        logger.debug('OpenAI: Prompt revised by provider', {
          revisedPromptLength: image.revised_prompt.length,
        });
      }

      return image.url;
    } catch (error) {
      logger.error('OpenAI image generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
