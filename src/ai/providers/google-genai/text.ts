/**
 * Google GenAI Text Generation Service
 */

import { GoogleGenAI } from '@google/genai';
import { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { logger } from '@/config/logger.js';

export interface GoogleGenAITextConfig {
  apiKey: string;
  model?: string | undefined;
}

export class GoogleGenAITextService implements ITextGenerationService {
  private client: GoogleGenAI;
  private model: string;

  constructor(config: GoogleGenAITextConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = config.model || 'gemini-2.5-flash';

    logger.info('Google GenAI Text Service initialized', {
      model: this.model,
    });
  }

  async complete(prompt: string, options?: TextGenerationOptions): Promise<string> {
    const model = options?.model || this.model;

    try {
      const response = await this.client.models.generateContent({
        model,
        contents: prompt,
        config: {
          temperature: options?.temperature ?? 0.7,
          maxOutputTokens: options?.maxTokens ?? 8192,
          ...(options?.systemPrompt && { systemInstruction: options.systemPrompt }),
          ...(options?.jsonSchema && {
            responseMimeType: 'application/json',
            responseJsonSchema: options.jsonSchema,
          }),
        },
      });

      const result = response.text;
      if (!result) {
        const finishReason = response.candidates?.[0]?.finishReason;
        throw new Error(`No text generated from Google GenAI (finishReason: ${finishReason ?? 'unknown'})`);
      }

      logger.debug('Google GenAI text generation completed', {
        model,
        promptLength: prompt.length,
        responseLength: result.length,
      });

      return result;
    } catch (error) {
      logger.error('Google GenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
