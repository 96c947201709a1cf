/**
 * Narration Synthesizer
 * Generates one narrated audio file per story page. All pages are dispatched
 * concurrently and collected in page order; any failure fails the batch.
 */

import { ITTSService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { IObjectStorage } from '@/shared/interfaces.js';
import { countWords } from '@/shared/utils.js';
import { Story } from '@/types/story.js';
import { PromptService } from './prompt.js';
import { splitTextIntoChunks } from './text-chunking.js';

export interface NarrationDependencies {
  ttsService: ITTSService;
  storage: IObjectStorage;
  prompts: PromptService;
  now?: () => number;
}

export interface NarrationResult {
  audioFiles: string[];
  /** False when the story already had narration and nothing was synthesized */
  synthesized: boolean;
}

export function getAudioFilename(folder: string, pageNumber: number, timestamp: number): string {
  const paddedNumber = pageNumber.toString().padStart(2, '0');
  return `${folder}/audio/page-${paddedNumber}-${timestamp}.mp3`;
}

/**
 * Estimate audio duration in seconds (~140 spoken words per minute)
 */
export function estimateDuration(text: string): number {
  return Math.ceil((countWords(text) / 140) * 60);
}

export class NarrationSynthesizer {
  private readonly ttsService: ITTSService;
  private readonly storage: IObjectStorage;
  private readonly prompts: PromptService;
  private readonly now: () => number;

  constructor(deps: NarrationDependencies) {
    this.ttsService = deps.ttsService;
    this.storage = deps.storage;
    this.prompts = deps.prompts;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Narrate a story's pages unless it already has narration.
   */
  async narrateStory(story: Pick<Story, 'id' | 'storyPages' | 'audioFiles'>): Promise<NarrationResult> {
    if (story.audioFiles.length > 0) {
      logger.info('Story already narrated, skipping synthesis', {
        storyId: story.id,
        audioCount: story.audioFiles.length,
      });
      return { audioFiles: story.audioFiles, synthesized: false };
    }

    const audioFiles = await this.synthesize(story.storyPages, { storyId: story.id });
    return { audioFiles, synthesized: true };
  }

  async synthesize(pages: string[], options: { storyId?: string } = {}): Promise<string[]> {
    const folder = options.storyId ?? `batch-${this.now()}`;
    const { systemPrompt } = await this.prompts.render('narration', { page: '' });

    logger.info('Synthesizing narration', {
      storyId: options.storyId,
      pageCount: pages.length,
      estimatedSeconds: pages.reduce((sum, page) => sum + estimateDuration(page), 0),
      provider: this.ttsService.getProvider(),
    });

    const audioFiles = await Promise.all(
      pages.map((page, index) => this.synthesizePage(page, index, folder, systemPrompt)),
    );

    logger.info('Narration synthesized', { storyId: options.storyId, audioCount: audioFiles.length });
    return audioFiles;
  }

  private async synthesizePage(
    page: string,
    index: number,
    folder: string,
    systemPrompt: string | undefined,
  ): Promise<string> {
    const chunks = splitTextIntoChunks(page, this.ttsService.getMaxTextLength());
    const buffers: Buffer[] = [];

    // MP3 frames concatenate cleanly, so long pages are narrated chunk by chunk
    for (const chunk of chunks) {
      const result = await this.ttsService.synthesize(chunk, {
        ...(systemPrompt && { systemPrompt }),
      });
      buffers.push(result.buffer);
    }

    const path = getAudioFilename(folder, index + 1, this.now());
    await this.storage.upload(Buffer.concat(buffers), path, 'audio/mpeg');
    return this.storage.makePublic(path);
  }
}
