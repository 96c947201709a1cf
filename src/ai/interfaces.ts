/**
 * AI Gateway Interfaces
 * Provider-agnostic interfaces for text, image, speech and embedding services
 */

export interface ITextGenerationService {
  /**
   * Complete a text generation request
   * @param prompt The input prompt
   * @param options Additional generation options
   */
  complete(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

export interface TextGenerationOptions {
  maxTokens?: number;
  temperature?: number;
  model?: string;
  systemPrompt?: string;
  jsonSchema?: Record<string, unknown>; // JSON schema for structured output
  schemaName?: string;
}

export type ImageSize = '1024x1024' | '1792x1024' | '1024x1792';
export type ImageQuality = 'standard' | 'hd';

export interface ImageGenerationOptions {
  size?: ImageSize;
  quality?: ImageQuality;
  model?: string;
}

export interface IImageGenerationService {
  /**
   * Generate an image from a text prompt.
   * Resolves to a short-lived URL the caller must download before it expires.
   */
  generate(prompt: string, options?: ImageGenerationOptions): Promise<string>;
}

export type TextProvider = 'openai' | 'google-genai';
export type TTSProvider = 'openai';

export interface AIProviderConfig {
  textProvider: TextProvider;
  credentials: {
    openaiApiKey?: string;
    openaiTextModel?: string;
    openaiRepairModel?: string;
    openaiImageModel?: string;
    openaiEmbeddingModel?: string;
    googleGenAIApiKey?: string;
    googleGenAIModel?: string;
  };
  image: {
    size?: ImageSize;
    quality?: ImageQuality;
  };
  tts: {
    model?: string;
    voice?: string;
    speed?: number;
  };
  embeddingDimensions?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// TTS (Text-to-Speech) Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export interface TTSOptions {
  /** Voice identifier (provider-specific) */
  voice?: string;
  /** Speech speed multiplier (0.25 to 4.0) */
  speed?: number;
  model?: string;
  /** Delivery instructions sent alongside the text */
  systemPrompt?: string;
}

export interface TTSResult {
  buffer: Buffer;
  format: 'mp3' | 'wav' | 'pcm';
  voice: string;
  model: string;
  provider: TTSProvider;
}

export interface ITTSService {
  synthesize(text: string, options?: TTSOptions): Promise<TTSResult>;

  /**
   * Get the maximum text length supported by this provider
   */
  getMaxTextLength(): number;

  getProvider(): TTSProvider;
}

// ─────────────────────────────────────────────────────────────────────────────
// Embeddings
// ─────────────────────────────────────────────────────────────────────────────

export interface IEmbeddingService {
  /**
   * Embed each input; the result is index-aligned with `inputs`.
   */
  embed(inputs: string[]): Promise<number[][]>;

  getDimensions(): number;
}
