/**
 * Story record and generated content contracts.
 * Records are parsed with these schemas whenever they cross the persistence boundary.
 */

import { z } from 'zod';
import { dedupe } from '../shared/utils.js';

export const STORY_STATUSES = [
  'created',
  'generating',
  'rendering_images',
  'synthesizing_audio',
  'indexing',
  'notifying',
  'complete',
  'failed',
] as const;

export type StoryStatus = (typeof STORY_STATUSES)[number];

/** Column widths of `stories.title` and `stories.style`. */
export const STORY_TITLE_MAX_LENGTH = 255;
export const STORY_STYLE_MAX_LENGTH = 64;

const keySet = z.array(z.string().min(1)).transform(dedupe);

export const storySchema = z.object({
  id: z.string().min(1),
  title: z.string().max(STORY_TITLE_MAX_LENGTH),
  description: z.string(),
  author: z.string(),
  authorId: z.string().min(1),
  style: z.string().max(STORY_STYLE_MAX_LENGTH),
  storyPages: z.array(z.string()),
  storyImages: z.array(z.string()),
  audioFiles: z.array(z.string()),
  private: z.boolean(),
  likes: keySet,
  saves: keySet,
  createdAt: z.string().datetime(),
  status: z.enum(STORY_STATUSES),
  disability: z.string().nullable(),
});

export type Story = z.infer<typeof storySchema>;

/**
 * Everything but the server-issued key.
 */
export type NewStory = Omit<Story, 'id'>;

export const newStorySchema = storySchema.omit({ id: true });

// -----------------------------------------------------------------------------
// Generated content
// -----------------------------------------------------------------------------

export interface StoryContent {
  prompt: string;
  title: string;
  scenes: string[];
  summaries: string[];
}

/**
 * Shape contract for model output. Keys are matched case-insensitively
 * by the generator before this schema runs.
 */
export function storyContentSchema(sceneCount: number) {
  return z.object({
    prompt: z.string(),
    title: z
      .string()
      .trim()
      .min(1, 'title must not be empty')
      .max(STORY_TITLE_MAX_LENGTH, `title must be at most ${STORY_TITLE_MAX_LENGTH} characters`),
    scenes: z
      .array(z.string().trim().min(1, 'scene descriptions must not be empty'))
      .length(sceneCount, `scenes must contain exactly ${sceneCount} entries`),
    summaries: z
      .array(z.string().trim().min(1, 'summaries must not be empty'))
      .length(sceneCount, `summaries must contain exactly ${sceneCount} entries`),
  });
}

/**
 * JSON schema handed to providers that support structured output.
 * Array lengths are stated in descriptions; strict structured-output modes reject minItems/maxItems.
 */
export function storyContentJsonSchema(sceneCount: number): Record<string, unknown> {
  return {
    type: 'object',
    additionalProperties: false,
    required: ['prompt', 'title', 'scenes', 'summaries'],
    properties: {
      prompt: { type: 'string', description: 'The original prompt, verbatim' },
      title: { type: 'string', description: 'The story title' },
      scenes: {
        type: 'array',
        description: `Visual description of each scene, exactly ${sceneCount} entries`,
        items: { type: 'string' },
      },
      summaries: {
        type: 'array',
        description: `Story text for each scene, 3 to 4 sentences each, exactly ${sceneCount} entries`,
        items: { type: 'string' },
      },
    },
  };
}

// -----------------------------------------------------------------------------
// Requests
// -----------------------------------------------------------------------------

export const generateStoryRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt is required').max(2000),
  style: z
    .string()
    .trim()
    .min(1)
    .max(STORY_STYLE_MAX_LENGTH, `style must be at most ${STORY_STYLE_MAX_LENGTH} characters`)
    .default('storybook'),
  private: z.boolean().default(false),
  disability: z.string().trim().min(1).optional(),
});

export type GenerateStoryRequest = z.infer<typeof generateStoryRequestSchema>;
