/**
 * OpenAI TTS (Text-to-Speech) Provider
 * Implements ITTSService for OpenAI's audio.speech API
 */

import OpenAI from 'openai';
import { ITTSService, TTSOptions, TTSResult, TTSProvider } from '../../interfaces.js';
import { logger } from '@/config/logger.js';

export interface OpenAITTSConfig {
  apiKey: string;
  model?: string | undefined;
  defaultVoice?: string | undefined;
  defaultSpeed?: number | undefined;
}

/**
 * OpenAI TTS voices available for use
 */
export const OPENAI_TTS_VOICES = [
  'alloy',
  'ash',
  'coral',
  'echo',
  'fable',
  'nova',
  'onyx',
  'sage',
  'shimmer',
] as const;

export type OpenAITTSVoice = (typeof OPENAI_TTS_VOICES)[number];

export function resolveOpenAIVoice(voice: string | undefined): OpenAITTSVoice {
  return OPENAI_TTS_VOICES.find((candidate) => candidate === voice) ?? 'fable';
}

export class OpenAITTSService implements ITTSService {
  private client: OpenAI;
  private model: string;
  private defaultVoice: OpenAITTSVoice;
  private defaultSpeed: number;

  constructor(config: OpenAITTSConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
    });
    this.model = config.model || 'gpt-4o-mini-tts';
    this.defaultVoice = resolveOpenAIVoice(config.defaultVoice);
    this.defaultSpeed = config.defaultSpeed || 1.0;
  }

  async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
    const voice = options?.voice ? resolveOpenAIVoice(options.voice) : this.defaultVoice;
    const speed = options?.speed || this.defaultSpeed;
    const model = options?.model || this.model;
    const systemPrompt = options?.systemPrompt;

    try {
      logger.info('Generating TTS with OpenAI', {
        model,
        voice,
        speed,
        textLength: text.length,
        hasSystemPrompt: !!systemPrompt,
      });

      // gpt-4o-mini-tts accepts delivery instructions prepended to the text
      let inputText = text;
      if (systemPrompt) {
        inputText = `${systemPrompt}\n\n---\n\nRead the following text:\n\n${text}`;
      }

      const response = await this.client.audio.speech.create({
        model,
        voice,
        input: inputText,
        speed,
        response_format: 'mp3',
      });

      const buffer = Buffer.from(await response.arrayBuffer());

      logger.debug('OpenAI TTS synthesis successful', {
        model,
        voice,
        bufferSize: buffer.length,
      });

      return {
        buffer,
        format: 'mp3',
        voice,
        model,
        provider: 'openai',
      };
    } catch (error) {
      logger.error('OpenAI TTS synthesis failed', {
        error: error instanceof Error ? error.message : String(error),
        model,
        voice,
      });
      throw error;
    }
  }

  /**
   * OpenAI TTS has a limit of 4096 characters per request
   */
  getMaxTextLength(): number {
    return 4096;
  }

  getProvider(): TTSProvider {
    return 'openai';
  }
}
