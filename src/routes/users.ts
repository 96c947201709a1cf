import express from 'express';
import { UserLookup, asyncRoute, withOptionalUser, withUser } from '@/middleware/requester.js';
import { STORY_COLLECTIONS, StoryCollection, StoryLibrary } from '@/services/story-library.js';
import { UserService } from '@/services/user-service.js';
import { userUpdateSchema } from '@/types/user.js';
import { sendLibraryError, sendValidationError } from './responses.js';

export interface UserRouterDependencies {
  users: UserService;
  library: StoryLibrary;
  lookupUser: UserLookup;
}

function isStoryCollection(value: string): value is StoryCollection {
  return STORY_COLLECTIONS.some((collection) => collection === value);
}

export function createUsersRouter(deps: UserRouterDependencies): express.Router {
  const router = express.Router();
  const { users, library, lookupUser } = deps;

  router.get(
    '/me',
    withUser(lookupUser, async (_req, res, user) => {
      res.json({ success: true, user });
    }),
  );

  /**
   * PUT /users/me
   * Update username, bio or profile picture. Renames are checked for uniqueness.
   */
  router.put(
    '/me',
    withUser(lookupUser, async (req, res, user) => {
      const parsed = userUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      const result = await users.updateProfile(user.id, parsed.data);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, user: result.value });
    }),
  );

  router.get(
    '/me/followers',
    withUser(lookupUser, async (_req, res, user) => {
      res.json({ success: true, users: await users.getFollowers(user) });
    }),
  );

  router.get(
    '/me/following',
    withUser(lookupUser, async (_req, res, user) => {
      res.json({ success: true, users: await users.getFollowing(user) });
    }),
  );

  /**
   * GET /users/me/stories/:collection
   * One of public, private, liked or saved.
   */
  router.get(
    '/me/stories/:collection',
    withUser(lookupUser, async (req, res, user) => {
      const { collection } = req.params;
      if (!isStoryCollection(collection)) {
        res.status(400).json({
          success: false,
          error: `collection must be one of ${STORY_COLLECTIONS.join(', ')}`,
          kind: 'invalid',
        });
        return;
      }
      res.json({ success: true, stories: await library.listCollection(user, collection) });
    }),
  );

  router.post(
    '/follow/:username',
    withUser(lookupUser, async (req, res, user) => {
      const result = await users.follow(user, req.params.username);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, message: `Now following ${req.params.username}` });
    }),
  );

  router.post(
    '/unfollow/:username',
    withUser(lookupUser, async (req, res, user) => {
      const result = await users.unfollow(user, req.params.username);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, message: `Unfollowed ${req.params.username}` });
    }),
  );

  router.get(
    '/:username/following-status',
    withUser(lookupUser, async (req, res, user) => {
      const result = await users.isFollowing(user, req.params.username);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, isFollowing: result.value });
    }),
  );

  router.get(
    '/:username/stories',
    withOptionalUser(lookupUser, async (req, res, user) => {
      const result = await users.getUserStories(req.params.username, user);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, stories: result.value });
    }),
  );

  router.get(
    '/:username',
    asyncRoute(async (req, res) => {
      const result = await users.getPublicProfile(req.params.username);
      if (!result.ok) {
        sendLibraryError(res, result.error);
        return;
      }
      res.json({ success: true, profile: result.value });
    }),
  );

  return router;
}
