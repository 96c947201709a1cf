import express from 'express';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { UserLookup, asyncRoute, withOptionalUser, withUser } from '@/middleware/requester.js';
import { StoryLibrary } from '@/services/story-library.js';
import { StoryOrchestrator, isPipelineFailure } from '@/services/story-orchestrator.js';
import { RecommendationService } from '@/services/retrieval.js';
import { LibraryError } from '@/shared/errors.js';
import { Result } from '@/shared/result.js';
import { Story, generateStoryRequestSchema } from '@/types/story.js';
import { User } from '@/types/user.js';
import { sendLibraryError, sendPipelineFailure, sendValidationError } from './responses.js';

export interface StoryRouterDependencies {
  orchestrator: StoryOrchestrator;
  library: StoryLibrary;
  recommendations: RecommendationService;
  lookupUser: UserLookup;
}

const paginationSchema = z.object({
  page: z.coerce.number().int().default(1),
  pageSize: z.coerce.number().int().default(10),
});

export function createStoriesRouter(deps: StoryRouterDependencies): express.Router {
  const router = express.Router();
  const { orchestrator, library, recommendations, lookupUser } = deps;

  /**
   * POST /stories/generate
   * Submit a story for background generation; responds with the placeholder.
   */
  router.post(
    '/generate',
    withUser(lookupUser, async (req, res, user) => {
      const parsed = generateStoryRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      const submission = await orchestrator.createStoryBackground(parsed.data, user);
      logger.info('Stories API: generation submitted', { storyId: submission.story.id, userId: user.id });
      res.status(202).json({ success: true, story: submission.story });
    }),
  );

  /**
   * POST /stories/generate/sync
   * Generate a story and wait for the result.
   */
  router.post(
    '/generate/sync',
    withUser(lookupUser, async (req, res, user) => {
      const parsed = generateStoryRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      const outcome = await orchestrator.generateStorySync(parsed.data, user);
      if (!outcome.result.ok) {
        sendPipelineFailure(res, outcome.storyId, outcome.result.error);
        return;
      }
      res.status(201).json({ success: true, story: outcome.result.value });
    }),
  );

  /**
   * GET /stories/recent?page=1&pageSize=10
   */
  router.get(
    '/recent',
    asyncRoute(async (req, res) => {
      const parsed = paginationSchema.safeParse(req.query);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      const result = await library.listRecentPublic(parsed.data.page, parsed.data.pageSize);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, ...result.value });
    }),
  );

  router.get(
    '/recommendations',
    withUser(lookupUser, async (_req, res, user) => {
      const suggestions = await recommendations.getRecommendations(user);
      res.json({ success: true, recommendations: suggestions });
    }),
  );

  router.get(
    '/:id',
    withOptionalUser(lookupUser, async (req, res, user) => {
      const result = await library.getStory(req.params.id, user);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, story: result.value });
    }),
  );

  /**
   * POST /stories/:id/audio
   * Narrate an existing story; a no-op when it already has narration.
   */
  router.post(
    '/:id/audio',
    withUser(lookupUser, async (req, res, user) => {
      const result = await orchestrator.narrateExisting(req.params.id, user);
      if (!result.ok) {
        if (isPipelineFailure(result.error)) {
          sendPipelineFailure(res, req.params.id, result.error);
        } else {
          sendLibraryError(res, result.error);
        }
        return;
      }
      res.json({ success: true, story: result.value });
    }),
  );

  const mutations: Record<string, (id: string, user: User) => Promise<Result<Story, LibraryError>>> = {
    like: (id, user) => library.like(id, user),
    unlike: (id, user) => library.unlike(id, user),
    save: (id, user) => library.save(id, user),
    unsave: (id, user) => library.unsave(id, user),
    privacy: (id, user) => library.togglePrivacy(id, user),
  };

  for (const [action, operation] of Object.entries(mutations)) {
    router.post(
      `/:id/${action}`,
      withUser(lookupUser, async (req, res, user) => {
        const result = await operation(req.params.id, user);
        if (!result.ok) {
          sendLibraryError(res, result.error);
          return;
        }
        res.json({ success: true, story: result.value });
      }),
    );
  }

  return router;
}
