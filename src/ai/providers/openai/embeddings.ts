/**
 * OpenAI Embedding Service
 */

import OpenAI from 'openai';
import { IEmbeddingService } from '../../interfaces.js';
import { logger } from '@/config/logger.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string | undefined;
  dimensions?: number | undefined;
}

export class OpenAIEmbeddingService implements IEmbeddingService {
  private client: OpenAI;
  private model: string;
  private dimensions: number;

  constructor(config: OpenAIEmbeddingConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model || 'text-embedding-3-small';
    this.dimensions = config.dimensions || 1536;
  }

  async embed(inputs: string[]): Promise<number[][]> {
    if (inputs.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: inputs,
        dimensions: this.dimensions,
      });

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      logger.error('OpenAI embedding request failed', {
        error: error instanceof Error ? error.message : String(error),
        model: this.model,
        inputCount: inputs.length,
      });
      throw error;
    }
  }

  getDimensions(): number {
    return this.dimensions;
  }
}
