/**
 * OpenAI Text Generation Service
 */

import OpenAI from 'openai';
import { ITextGenerationService, TextGenerationOptions } from '../../interfaces.js';
import { logger } from '@/config/logger.js';

export interface OpenAITextConfig {
  apiKey: string;
  model?: string | undefined;
  baseURL?: string | undefined;
}

export class OpenAITextService implements ITextGenerationService {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAITextConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.model = config.model || 'gpt-4o';

    logger.info('OpenAI Text Service initialized', {
      model: this.model,
    });
  }

  async complete(prompt: string, options?: TextGenerationOptions): Promise<string> {
    const model = options?.model || this.model;
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (options?.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      logger.debug('OpenAI chat completion request', {
        model,
        promptLength: prompt.length,
        hasJsonSchema: !!options?.jsonSchema,
      });

      const completion = await this.client.chat.completions.create({
        model,
        messages,
        temperature: options?.temperature ?? 0.7,
        max_tokens: options?.maxTokens ?? 4096,
        ...(options?.jsonSchema && {
          response_format: {
            type: 'json_schema' as const,
            json_schema: {
              name: options.schemaName || 'structured_output',
              schema: options.jsonSchema,
              strict: true,
            },
          },
        }),
      });

      const result = completion.choices[0]?.message.content;
      if (!result) {
        throw new Error('No text generated from OpenAI chat completions');
      }

      logger.debug('OpenAI text generation completed', {
        model,
        promptLength: prompt.length,
        responseLength: result.length,
        finishReason: completion.choices[0]?.finish_reason,
      });

      return result;
    } catch (error) {
      logger.error('OpenAI text generation failed', {
        error: error instanceof Error ? error.message : String(error),
        model,
        promptLength: prompt.length,
      });
      throw error;
    }
  }
}
