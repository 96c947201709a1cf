/**
 * Story Orchestrator
 *
 * Drives a story through
 *   created → generating → rendering_images → synthesizing_audio → indexing → notifying → complete
 * with `failed` as the side exit from `generating` and `rendering_images`.
 *
 * The placeholder record is persisted before any model call. While the
 * pipeline runs, `description` carries `[stage] prompt` progress text; it is
 * restored on completion and gets an error breadcrumb on terminal failure.
 * Narration, indexing and notification are best-effort.
 */

import { logger } from '@/config/logger.js';
import {
  CardinalityMismatchError,
  LibraryError,
  PipelineFailure,
  PipelineStage,
  accessDenied,
  notFound,
  toPipelineFailure,
} from '@/shared/errors.js';
import { INotificationService, PersistenceGateway } from '@/shared/interfaces.js';
import { Result, err, ok } from '@/shared/result.js';
import { addUnique, removeValue, withTimeout } from '@/shared/utils.js';
import { GenerateStoryRequest, NewStory, Story, StoryStatus } from '@/types/story.js';
import { User } from '@/types/user.js';
import { serializeError } from '@/utils/errorHandling.js';
import { StructuredContentGenerator } from './content-generator.js';
import { EmailTemplateService } from './email-templates.js';
import { ImageRenderer } from './image-renderer.js';
import { NarrationSynthesizer } from './narration.js';
import { ContextualRetrievalAugmenter, PersonalStoryIndex } from './retrieval.js';

export interface StageTimeouts {
  generatingMs: number;
  renderingImagesMs: number;
  synthesizingAudioMs: number;
  indexingMs: number;
}

export interface OrchestratorDependencies {
  persistence: PersistenceGateway;
  generator: Pick<StructuredContentGenerator, 'generate'>;
  renderer: Pick<ImageRenderer, 'render'>;
  narrator: Pick<NarrationSynthesizer, 'narrateStory'>;
  notifier: INotificationService;
  emails: EmailTemplateService;
  sceneCount: number;
  timeouts: StageTimeouts;
  /** Present only when reference retrieval is enabled */
  augmenter?: Pick<ContextualRetrievalAugmenter, 'augment'>;
  personalIndex?: Pick<PersonalStoryIndex, 'indexStory'>;
  storyUrl?: (storyId: string) => string;
  now?: () => Date;
}

/** Fields written by the pipeline; everything else belongs to readers and the author. */
type PipelineFields = Partial<
  Pick<Story, 'title' | 'storyPages' | 'storyImages' | 'audioFiles' | 'status' | 'description'>
>;

export type NarrationRequestError = LibraryError | PipelineFailure;

export function isPipelineFailure(error: NarrationRequestError): error is PipelineFailure {
  return 'category' in error;
}

export interface BackgroundSubmission {
  story: Story;
  /** Settles when the pipeline finishes; never rejects */
  completion: Promise<Result<Story, PipelineFailure>>;
}

export interface SyncOutcome {
  storyId: string;
  result: Result<Story, PipelineFailure>;
}

export function progressDescription(stage: StoryStatus, prompt: string): string {
  return `[${stage}] ${prompt}`;
}

export function failureBreadcrumb(prompt: string, failure: PipelineFailure): string {
  return `${prompt}\n\n[error] ${failure.stage} (${failure.category}): ${failure.message}`;
}

export class StoryOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly now: () => Date;
  private readonly storyUrl: (storyId: string) => string;

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.storyUrl = deps.storyUrl ?? ((storyId) => `/stories/${storyId}`);
  }

  /**
   * Persist the placeholder record and return it with its server-issued key.
   */
  async createPlaceholder(request: GenerateStoryRequest, author: User): Promise<Story> {
    const placeholder: NewStory = {
      title: '',
      description: request.prompt,
      author: author.username,
      authorId: author.id,
      style: request.style,
      storyPages: [],
      storyImages: [],
      audioFiles: [],
      private: request.private,
      likes: [],
      saves: [],
      createdAt: this.now().toISOString(),
      status: 'created',
      disability: request.disability ?? null,
    };

    const id = await this.deps.persistence.stories.create(placeholder);
    logger.info('Story placeholder created', { storyId: id, authorId: author.id, private: request.private });
    return { id, ...placeholder };
  }

  /**
   * Submit-and-detach mode: returns the placeholder immediately.
   */
  async createStoryBackground(request: GenerateStoryRequest, author: User): Promise<BackgroundSubmission> {
    const story = await this.createPlaceholder(request, author);
    const completion = this.execute(story, author).catch((error: unknown) => {
      logger.error('Background story pipeline crashed', { storyId: story.id, error: serializeError(error) });
      return err(toPipelineFailure('created', error));
    });
    return { story, completion };
  }

  /**
   * Synchronous mode: waits for the pipeline and reports the terminal failure if any.
   */
  async generateStorySync(request: GenerateStoryRequest, author: User): Promise<SyncOutcome> {
    const story = await this.createPlaceholder(request, author);
    return { storyId: story.id, result: await this.execute(story, author) };
  }

  /**
   * Re-read the stored record and overwrite only the fields the pipeline owns,
   * so likes, saves and visibility changed meanwhile survive.
   */
  private async patch(storyId: string, fields: PipelineFields): Promise<Story> {
    return this.deps.persistence.transaction(async ({ stories }) => {
      const stored = await stories.getByKey(storyId);
      if (!stored) {
        throw new Error(`Story not found: ${storyId}`);
      }
      const next: Story = { ...stored, ...fields };
      await stories.update(next);
      return next;
    });
  }

  private async transition(
    storyId: string,
    status: StoryStatus,
    prompt: string,
    fields: PipelineFields = {},
  ): Promise<Story> {
    const next = await this.patch(storyId, { ...fields, status, description: progressDescription(status, prompt) });
    logger.info('Story stage started', { storyId, stage: status });
    return next;
  }

  /**
   * Run the pipeline for a persisted placeholder.
   */
  async execute(placeholder: Story, author: User): Promise<Result<Story, PipelineFailure>> {
    const prompt = placeholder.description;
    const { timeouts, sceneCount } = this.deps;
    let current = placeholder;
    let stage: PipelineStage = 'generating';

    try {
      // generating
      current = await this.transition(current.id, 'generating', prompt);
      const context = await this.gatherContext(prompt, author.id, current.id);
      const content = await withTimeout(
        this.deps.generator.generate(prompt, current.disability ?? undefined, {
          storyId: current.id,
          ...(context && { context }),
        }),
        timeouts.generatingMs,
        'generating',
      );
      if (content.scenes.length !== sceneCount) {
        throw new CardinalityMismatchError('scenes', sceneCount, content.scenes.length);
      }
      if (content.summaries.length !== sceneCount) {
        throw new CardinalityMismatchError('summaries', sceneCount, content.summaries.length);
      }

      // rendering_images
      stage = 'rendering_images';
      current = await this.transition(current.id, 'rendering_images', prompt, {
        title: content.title,
        storyPages: content.summaries,
      });
      const images = await withTimeout(
        this.deps.renderer.render(content.scenes, current.style, current.disability ?? undefined, {
          storyId: current.id,
        }),
        timeouts.renderingImagesMs,
        'rendering_images',
      );
      if (images.length !== current.storyPages.length) {
        throw new CardinalityMismatchError('images', current.storyPages.length, images.length);
      }
      current = { ...current, storyImages: images };
    } catch (error) {
      return err(await this.fail(current, prompt, stage, error, author));
    }

    // synthesizing_audio
    current = await this.bestEffortTransition(current, 'synthesizing_audio', prompt, {
      storyImages: current.storyImages,
    });
    const audioFiles = await this.narrate(current);

    // Record the finished story and file it under the author's books
    try {
      current = await this.publish(current.id, {
        title: current.title,
        storyPages: current.storyPages,
        storyImages: current.storyImages,
        audioFiles,
        description: prompt,
        status: 'indexing',
      });
    } catch (error) {
      return err(await this.fail(current, prompt, 'synthesizing_audio', error, author));
    }

    // indexing
    if (this.deps.personalIndex) {
      try {
        const chunkCount = await withTimeout(
          this.deps.personalIndex.indexStory(current),
          timeouts.indexingMs,
          'indexing',
        );
        logger.info('Story indexed for author', { storyId: current.id, chunkCount });
      } catch (error) {
        logger.warn('Story indexing failed', { storyId: current.id, error: serializeError(error) });
      }
    }

    // notifying
    current = await this.bestEffortStatus(current, 'notifying');
    await this.notifyReady(current, author);

    current = await this.bestEffortStatus(current, 'complete');
    logger.info('Story pipeline complete', {
      storyId: current.id,
      pageCount: current.storyPages.length,
      imageCount: current.storyImages.length,
      audioCount: current.audioFiles.length,
    });
    return ok(current);
  }

  private async gatherContext(prompt: string, ownerScope: string, storyId: string): Promise<string> {
    if (!this.deps.augmenter) return '';
    try {
      return await withTimeout(this.deps.augmenter.augment(prompt, ownerScope), this.deps.timeouts.indexingMs, 'retrieval');
    } catch (error) {
      logger.warn('Retrieval context unavailable', { storyId, error: serializeError(error) });
      return '';
    }
  }

  private async narrate(story: Story): Promise<string[]> {
    try {
      const result = await withTimeout(
        this.deps.narrator.narrateStory(story),
        this.deps.timeouts.synthesizingAudioMs,
        'synthesizing_audio',
      );
      if (result.audioFiles.length !== story.storyPages.length) {
        throw new CardinalityMismatchError('audio files', story.storyPages.length, result.audioFiles.length);
      }
      return result.audioFiles;
    } catch (error) {
      logger.warn('Narration failed, story continues without audio', {
        storyId: story.id,
        error: serializeError(error),
      });
      return [];
    }
  }

  /**
   * Visibility is read from the stored record: the author may have toggled it
   * while the story was generating.
   */
  private async publish(storyId: string, fields: PipelineFields): Promise<Story> {
    const published = await this.deps.persistence.transaction(async ({ stories, users }) => {
      const stored = await stories.getByKey(storyId);
      if (!stored) {
        throw new Error(`Story not found: ${storyId}`);
      }
      const story: Story = { ...stored, ...fields };
      await stories.update(story);

      const author = await users.getByKey(story.authorId);
      if (!author) {
        throw new Error(`Author not found: ${story.authorId}`);
      }
      await users.update({
        ...author,
        publicBooks: story.private ? removeValue(author.publicBooks, story.id) : addUnique(author.publicBooks, story.id),
        privateBooks: story.private ? addUnique(author.privateBooks, story.id) : removeValue(author.privateBooks, story.id),
      });
      return story;
    });
    logger.info('Story published to author library', { storyId, private: published.private });
    return published;
  }

  private async bestEffortTransition(
    story: Story,
    status: StoryStatus,
    prompt: string,
    fields: PipelineFields,
  ): Promise<Story> {
    try {
      return await this.transition(story.id, status, prompt, fields);
    } catch (error) {
      logger.warn('Failed to record story progress', { storyId: story.id, status, error: serializeError(error) });
      return { ...story, ...fields, status };
    }
  }

  private async bestEffortStatus(story: Story, status: StoryStatus): Promise<Story> {
    try {
      return await this.patch(story.id, { status });
    } catch (error) {
      logger.warn('Failed to record story status', { storyId: story.id, status, error: serializeError(error) });
      return { ...story, status };
    }
  }

  private async fail(
    story: Story,
    prompt: string,
    stage: PipelineStage,
    error: unknown,
    author: User,
  ): Promise<PipelineFailure> {
    const failure = toPipelineFailure(stage, error);
    logger.error('Story pipeline failed', {
      storyId: story.id,
      stage,
      category: failure.category,
      error: serializeError(error),
    });

    let failed: Story = { ...story, status: 'failed', description: failureBreadcrumb(prompt, failure) };
    try {
      failed = await this.patch(story.id, { status: failed.status, description: failed.description });
    } catch (persistError) {
      logger.error('Failed to record story failure', { storyId: story.id, error: serializeError(persistError) });
    }

    await this.notifyFailed(failed, prompt, failure, author);
    return failure;
  }

  private async notifyReady(story: Story, author: User): Promise<void> {
    if (!author.email) {
      logger.info('Author has no email address; skipping notification', { storyId: story.id });
      return;
    }
    try {
      const email = await this.deps.emails.render('story-ready', {
        author: author.username,
        title: story.title,
        pageCount: story.storyPages.length,
        hasAudio: story.audioFiles.length > 0,
        storyUrl: this.storyUrl(story.id),
      });
      await this.deps.notifier.send(author.email, email.subject, email.html);
    } catch (error) {
      logger.warn('Story-ready notification failed', { storyId: story.id, error: serializeError(error) });
    }
  }

  private async notifyFailed(story: Story, prompt: string, failure: PipelineFailure, author: User): Promise<void> {
    if (!author.email) return;
    try {
      const email = await this.deps.emails.render('story-failed', {
        author: author.username,
        prompt,
        stage: failure.stage.replace(/_/g, ' '),
        reason: failure.message,
      });
      await this.deps.notifier.send(author.email, email.subject, email.html);
    } catch (error) {
      logger.warn('Story-failed notification failed', { storyId: story.id, error: serializeError(error) });
    }
  }

  /**
   * Narrate an already generated story on request. Only the author may ask;
   * a story that already has narration is returned unchanged.
   */
  async narrateExisting(storyId: string, requester: User): Promise<Result<Story, NarrationRequestError>> {
    const story = await this.deps.persistence.stories.getByKey(storyId);
    if (!story) return err(notFound(`Story not found: ${storyId}`));
    if (story.authorId !== requester.id) return err(accessDenied('Only the author can narrate this story'));

    let audioFiles: string[];
    try {
      const result = await withTimeout(
        this.deps.narrator.narrateStory(story),
        this.deps.timeouts.synthesizingAudioMs,
        'synthesizing_audio',
      );
      if (!result.synthesized) return ok(story);
      audioFiles = result.audioFiles;
    } catch (error) {
      logger.error('Narration of existing story failed', { storyId, error: serializeError(error) });
      return err(toPipelineFailure('synthesizing_audio', error));
    }

    const updated = await this.patch(storyId, { audioFiles });
    logger.info('Existing story narrated', { storyId, audioCount: updated.audioFiles.length });
    return ok(updated);
  }
}
