/**
 * Structured Content Generator
 * Turns a free-text prompt into a validated title, scene descriptions and page
 * summaries. Malformed model output is fed back to the model together with the
 * validation error until it validates or the attempt ceiling is reached.
 */

import { ZodError } from 'zod';
import { ITextGenerationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { ContentValidationError } from '@/shared/errors.js';
import { Result, ok, err } from '@/shared/result.js';
import { parseAIResponse, preview } from '@/shared/utils.js';
import { StoryContent, storyContentJsonSchema, storyContentSchema } from '@/types/story.js';
import { PromptService } from './prompt.js';

export const DEFAULT_CONTENT_ATTEMPTS = 3;

export interface ContentGeneratorDependencies {
  textService: ITextGenerationService;
  prompts: PromptService;
  sceneCount: number;
  maxAttempts?: number;
}

export interface GenerateContentOptions {
  /** Background material folded into the instruction prompt */
  context?: string;
  storyId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'response'}: ${issue.message}`)
    .join('; ');
}

export interface ContentValidation {
  content: StoryContent;
  promptRepaired: boolean;
}

/**
 * Validate raw model output against the content contract.
 * Keys are matched case-insensitively. A `prompt` field that does not echo the
 * original input is overwritten rather than treated as a failure.
 */
export function validateStoryContent(
  raw: string,
  originalPrompt: string,
  sceneCount: number,
): Result<ContentValidation, string> {
  let parsed: unknown;
  try {
    parsed = parseAIResponse(raw);
  } catch (error) {
    return err(`response is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  if (!isRecord(parsed)) {
    return err('response must be a JSON object');
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    normalized[key.toLowerCase()] = value;
  }

  const promptRepaired = normalized.prompt !== originalPrompt;
  normalized.prompt = originalPrompt;

  const validation = storyContentSchema(sceneCount).safeParse(normalized);
  if (!validation.success) {
    return err(formatZodError(validation.error));
  }

  return ok({ content: validation.data, promptRepaired });
}

export class StructuredContentGenerator {
  private readonly textService: ITextGenerationService;
  private readonly prompts: PromptService;
  private readonly sceneCount: number;
  private readonly maxAttempts: number;

  constructor(deps: ContentGeneratorDependencies) {
    this.textService = deps.textService;
    this.prompts = deps.prompts;
    this.sceneCount = deps.sceneCount;
    this.maxAttempts = deps.maxAttempts ?? DEFAULT_CONTENT_ATTEMPTS;
  }

  async generate(
    prompt: string,
    accessibilityHint?: string,
    options: GenerateContentOptions = {},
  ): Promise<StoryContent> {
    const jsonSchema = storyContentJsonSchema(this.sceneCount);
    let request = await this.prompts.render('story-content', {
      prompt,
      sceneCount: this.sceneCount,
      accessibilityHint: accessibilityHint ?? '',
      context: options.context ?? '',
    });
    let lastValidationError = '';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      logger.info('Generating story content', {
        storyId: options.storyId,
        attempt,
        maxAttempts: this.maxAttempts,
        sceneCount: this.sceneCount,
      });

      const raw = await this.textService.complete(request.userPrompt, {
        ...(request.systemPrompt && { systemPrompt: request.systemPrompt }),
        jsonSchema,
        schemaName: 'story_content',
        temperature: attempt === 1 ? 0.8 : 0.4,
      });

      const validation = validateStoryContent(raw, prompt, this.sceneCount);
      if (validation.ok) {
        if (validation.value.promptRepaired) {
          logger.debug('Story content prompt field repaired locally', { storyId: options.storyId });
        }
        logger.info('Story content validated', {
          storyId: options.storyId,
          attempt,
          title: validation.value.content.title,
        });
        return validation.value.content;
      }

      lastValidationError = validation.error;
      logger.warn('Story content failed validation', {
        storyId: options.storyId,
        attempt,
        maxAttempts: this.maxAttempts,
        validationError: lastValidationError,
        responsePreview: preview(raw),
      });

      if (attempt < this.maxAttempts) {
        request = await this.prompts.render('content-repair', {
          prompt,
          sceneCount: this.sceneCount,
          validationError: lastValidationError,
          previousOutput: raw,
        });
      }
    }

    throw new ContentValidationError(this.maxAttempts, lastValidationError);
  }
}
