/**
 * AI Gateway Factory
 * Creates AI service instances based on environment configuration
 */

import {
  AIProviderConfig,
  IEmbeddingService,
  IImageGenerationService,
  ITextGenerationService,
  ITTSService,
} from './interfaces.js';
import { OpenAITextService } from './providers/openai/text.js';
import { OpenAIImageService } from './providers/openai/image.js';
import { OpenAITTSService } from './providers/openai/tts.js';
import { OpenAIEmbeddingService } from './providers/openai/embeddings.js';
import { GoogleGenAITextService } from './providers/google-genai/text.js';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';

export class AIGateway {
  private textService: ITextGenerationService;
  private repairTextService: ITextGenerationService;
  private imageService: IImageGenerationService;
  private ttsService: ITTSService;
  private embeddingService: IEmbeddingService;
  private config: AIProviderConfig;

  constructor(config: AIProviderConfig) {
    this.config = config;
    this.textService = this.createTextService();
    this.repairTextService = this.createRepairTextService();
    this.imageService = this.createImageService();
    this.ttsService = this.createTTSService();
    this.embeddingService = this.createEmbeddingService();

    logger.info('AI Gateway initialized', {
      textProvider: config.textProvider,
      imageProvider: 'openai',
      ttsProvider: 'openai',
    });
  }

  private requireOpenAIKey(purpose: string): string {
    if (!this.config.credentials.openaiApiKey) {
      throw new Error(`OpenAI API Key is required for OpenAI ${purpose} service`);
    }
    return this.config.credentials.openaiApiKey;
  }

  private createTextService(): ITextGenerationService {
    switch (this.config.textProvider) {
      case 'openai':
        return new OpenAITextService({
          apiKey: this.requireOpenAIKey('text'),
          model: this.config.credentials.openaiTextModel,
        });

      case 'google-genai':
        if (!this.config.credentials.googleGenAIApiKey) {
          throw new Error('Google GenAI API Key is required for Google GenAI text service');
        }
        return new GoogleGenAITextService({
          apiKey: this.config.credentials.googleGenAIApiKey,
          model: this.config.credentials.googleGenAIModel,
        });
    }
  }

  /**
   * Secondary model used for scene rewrites and short summaries.
   */
  private createRepairTextService(): ITextGenerationService {
    if (this.config.textProvider === 'google-genai') {
      return this.textService;
    }
    return new OpenAITextService({
      apiKey: this.requireOpenAIKey('repair text'),
      model: this.config.credentials.openaiRepairModel || 'gpt-4o-mini',
    });
  }

  private createImageService(): IImageGenerationService {
    return new OpenAIImageService({
      apiKey: this.requireOpenAIKey('image'),
      model: this.config.credentials.openaiImageModel,
      size: this.config.image.size,
      quality: this.config.image.quality,
    });
  }

  private createTTSService(): ITTSService {
    return new OpenAITTSService({
      apiKey: this.requireOpenAIKey('TTS'),
      model: this.config.tts.model,
      defaultVoice: this.config.tts.voice,
      defaultSpeed: this.config.tts.speed,
    });
  }

  private createEmbeddingService(): IEmbeddingService {
    return new OpenAIEmbeddingService({
      apiKey: this.requireOpenAIKey('embedding'),
      model: this.config.credentials.openaiEmbeddingModel,
      dimensions: this.config.embeddingDimensions,
    });
  }

  public getTextService(): ITextGenerationService {
    return this.textService;
  }

  public getRepairTextService(): ITextGenerationService {
    return this.repairTextService;
  }

  public getImageService(): IImageGenerationService {
    return this.imageService;
  }

  public getTTSService(): ITTSService {
    return this.ttsService;
  }

  public getEmbeddingService(): IEmbeddingService {
    return this.embeddingService;
  }

  /**
   * Create AI Gateway from environment variables
   */
  public static fromEnvironment(): AIGateway {
    const env = getEnvironment();
    const config: AIProviderConfig = {
      textProvider: env.TEXT_PROVIDER,
      credentials: {
        ...(env.OPENAI_API_KEY && { openaiApiKey: env.OPENAI_API_KEY }),
        openaiTextModel: env.OPENAI_TEXT_MODEL,
        openaiRepairModel: env.OPENAI_REPAIR_MODEL,
        openaiImageModel: env.OPENAI_IMAGE_MODEL,
        openaiEmbeddingModel: env.OPENAI_EMBEDDING_MODEL,
        ...(env.GOOGLE_GENAI_API_KEY && { googleGenAIApiKey: env.GOOGLE_GENAI_API_KEY }),
        googleGenAIModel: env.GOOGLE_GENAI_MODEL,
      },
      image: {
        size: env.OPENAI_IMAGE_SIZE,
        quality: env.OPENAI_IMAGE_QUALITY,
      },
      tts: {
        model: env.TTS_MODEL,
        voice: env.TTS_VOICE,
        speed: env.TTS_SPEED,
      },
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    };

    return new AIGateway(config);
  }
}
