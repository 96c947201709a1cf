/**
 * Image Renderer
 * Renders one public image per scene. A failing scene is retried in place with a
 * rewritten description; if any scene exhausts its attempts the whole batch fails.
 */

import { IImageGenerationService, ITextGenerationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { MaxRetriesExceededError } from '@/shared/errors.js';
import { isSafetyBlockError } from '@/shared/retry-utils.js';
import { IObjectStorage } from '@/shared/interfaces.js';
import { delay, mapWithConcurrency, randomIntBetween } from '@/shared/utils.js';
import { PromptService } from './prompt.js';
import { buildSafeFallbackPrompt, refineImagePrompt } from './image-prompt-utils.js';

export const DEFAULT_IMAGE_ATTEMPTS = 3;
export const DEFAULT_SCENE_CONCURRENCY = 3;

export interface DownloadedAsset {
  bytes: Buffer;
  contentType: string;
}

export type AssetDownloader = (url: string) => Promise<DownloadedAsset>;

/**
 * Fetch a provider-hosted temporary asset.
 */
export const downloadAsset: AssetDownloader = async (url) => {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to download generated asset: ${response.status} ${response.statusText}`);
  }
  const bytes = Buffer.from(await response.arrayBuffer());
  return { bytes, contentType: response.headers.get('content-type') ?? 'image/png' };
};

export interface ImageRendererDependencies {
  imageService: IImageGenerationService;
  /** Secondary text model used to rewrite rejected scene descriptions */
  rewriteService: ITextGenerationService;
  storage: IObjectStorage;
  prompts: PromptService;
  downloader?: AssetDownloader;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  maxAttempts?: number;
  /** Inclusive bounds of the randomized pause between attempts */
  backoffMs?: { min: number; max: number };
  concurrency?: number;
}

export interface RenderOptions {
  /** Folder the images are stored under; defaults to a timestamped batch name */
  storyId?: string;
}

function extensionFor(contentType: string): string {
  if (contentType.includes('jpeg') || contentType.includes('jpg')) return 'jpg';
  if (contentType.includes('webp')) return 'webp';
  return 'png';
}

export class ImageRenderer {
  private readonly imageService: IImageGenerationService;
  private readonly rewriteService: ITextGenerationService;
  private readonly storage: IObjectStorage;
  private readonly prompts: PromptService;
  private readonly downloader: AssetDownloader;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly maxAttempts: number;
  private readonly backoffMs: { min: number; max: number };
  private readonly concurrency: number;

  constructor(deps: ImageRendererDependencies) {
    this.imageService = deps.imageService;
    this.rewriteService = deps.rewriteService;
    this.storage = deps.storage;
    this.prompts = deps.prompts;
    this.downloader = deps.downloader ?? downloadAsset;
    this.sleep = deps.sleep ?? delay;
    this.now = deps.now ?? Date.now;
    this.maxAttempts = deps.maxAttempts ?? DEFAULT_IMAGE_ATTEMPTS;
    this.backoffMs = deps.backoffMs ?? { min: 1000, max: 3000 };
    this.concurrency = deps.concurrency ?? DEFAULT_SCENE_CONCURRENCY;
  }

  async render(
    scenes: string[],
    style: string,
    accessibilityHint?: string,
    options: RenderOptions = {},
  ): Promise<string[]> {
    const folder = options.storyId ?? `batch-${this.now()}`;
    const styleTemplate = await this.prompts.getImageStyle(style);

    logger.info('Rendering scene images', {
      storyId: options.storyId,
      sceneCount: scenes.length,
      style,
      concurrency: this.concurrency,
    });

    const urls = await mapWithConcurrency(scenes, this.concurrency, (scene, index) =>
      this.renderScene(scene, index, {
        folder,
        storyId: options.storyId,
        style,
        styleDescription: styleTemplate.description,
        styleKeywords: styleTemplate.style,
        accessibilityHint: accessibilityHint ?? '',
      }),
    );

    logger.info('Scene images rendered', { storyId: options.storyId, imageCount: urls.length });
    return urls;
  }

  private async renderScene(
    scene: string,
    index: number,
    context: {
      folder: string;
      storyId: string | undefined;
      style: string;
      styleDescription: string;
      styleKeywords: string;
      accessibilityHint: string;
    },
  ): Promise<string> {
    let description = scene;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const { userPrompt } = await this.prompts.render('image-scene', {
          scene: refineImagePrompt(description),
          styleDescription: context.styleDescription,
          style: context.styleKeywords,
          accessibilityHint: context.accessibilityHint,
        });

        const temporaryUrl = await this.imageService.generate(userPrompt);
        const asset = await this.downloader(temporaryUrl);

        const sceneNumber = String(index + 1).padStart(2, '0');
        const path = `${context.folder}/images/scene-${sceneNumber}-${this.now()}.${extensionFor(asset.contentType)}`;
        await this.storage.upload(asset.bytes, path, asset.contentType);
        const publicUrl = await this.storage.makePublic(path);

        logger.debug('Scene image stored', {
          storyId: context.storyId,
          scene: index + 1,
          attempt,
          path,
        });
        return publicUrl;
      } catch (error) {
        lastError = error;
        logger.warn('Scene image attempt failed', {
          storyId: context.storyId,
          scene: index + 1,
          attempt,
          maxAttempts: this.maxAttempts,
          safetyBlock: isSafetyBlockError(error),
          error: error instanceof Error ? error.message : String(error),
        });

        if (attempt >= this.maxAttempts) break;

        description = await this.rewriteScene(description, error, context.storyId, index);
        await this.sleep(randomIntBetween(this.backoffMs.min, this.backoffMs.max));
      }
    }

    throw new MaxRetriesExceededError(index, this.maxAttempts, lastError);
  }

  /**
   * Ask the secondary model for a policy-safer version of the description.
   * Falls back to a local sanitizer when the rewrite call itself fails.
   */
  async rewriteScene(
    description: string,
    failure: unknown,
    storyId?: string,
    index?: number,
  ): Promise<string> {
    try {
      const rendered = await this.prompts.render('scene-rewrite', {
        scene: description,
        failureReason: failure instanceof Error ? failure.message : String(failure),
      });
      const rewritten = await this.rewriteService.complete(rendered.userPrompt, {
        ...(rendered.systemPrompt && { systemPrompt: rendered.systemPrompt }),
        temperature: 0.5,
        maxTokens: 400,
      });
      const cleaned = rewritten.trim();
      if (cleaned.length > 0) {
        logger.info('Scene description rewritten', {
          storyId,
          scene: index === undefined ? undefined : index + 1,
          originalLength: description.length,
          rewrittenLength: cleaned.length,
        });
        return cleaned;
      }
    } catch (error) {
      logger.error('Scene rewrite failed, using sanitized fallback', {
        storyId,
        scene: index === undefined ? undefined : index + 1,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return buildSafeFallbackPrompt(description);
  }
}
