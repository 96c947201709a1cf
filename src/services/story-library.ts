/**
 * Story Library
 * Reader-facing story operations: access-checked reads, likes and saves,
 * privacy toggling and public listings. Every mutation that touches both a
 * story and a user runs inside one persistence transaction.
 */

import { logger } from '@/config/logger.js';
import { LibraryError, accessDenied, invalid, notFound } from '@/shared/errors.js';
import { PersistenceGateway, Repositories } from '@/shared/interfaces.js';
import { Result, err, ok } from '@/shared/result.js';
import { addUnique, removeValue } from '@/shared/utils.js';
import { Story } from '@/types/story.js';
import { User } from '@/types/user.js';

export const MAX_PAGE_SIZE = 50;

export type StoryCollection = 'public' | 'private' | 'liked' | 'saved';

export const STORY_COLLECTIONS: readonly StoryCollection[] = ['public', 'private', 'liked', 'saved'];

export interface StoryPage {
  items: Story[];
  page: number;
  pageSize: number;
}

type Reaction = 'like' | 'save';

export function canView(story: Story, requester: Pick<User, 'id'> | null): boolean {
  return !story.private || story.authorId === requester?.id;
}

export class StoryLibrary {
  constructor(private readonly persistence: PersistenceGateway) {}

  async getStory(storyId: string, requester: User | null): Promise<Result<Story, LibraryError>> {
    const story = await this.persistence.stories.getByKey(storyId);
    if (!story) return err(notFound(`Story not found: ${storyId}`));
    if (!canView(story, requester)) return err(accessDenied('Story is private'));
    return ok(story);
  }

  private async loadForUpdate(
    repositories: Repositories,
    storyId: string,
    userId: string,
  ): Promise<Result<{ story: Story; user: User }, LibraryError>> {
    const story = await repositories.stories.getByKey(storyId);
    if (!story) return err(notFound(`Story not found: ${storyId}`));
    const user = await repositories.users.getByKey(userId);
    if (!user) return err(notFound(`User not found: ${userId}`));
    if (!canView(story, user)) return err(accessDenied('Story is private'));
    return ok({ story, user });
  }

  /**
   * Add or remove a like/save on both the story and the user. Repeating an
   * operation leaves both records unchanged.
   */
  private async react(
    reaction: Reaction,
    add: boolean,
    storyId: string,
    requester: User,
  ): Promise<Result<Story, LibraryError>> {
    const result = await this.persistence.transaction<Result<Story, LibraryError>>(async (repositories) => {
      const loaded = await this.loadForUpdate(repositories, storyId, requester.id);
      if (!loaded.ok) return loaded;
      const { story, user } = loaded.value;

      const apply = add ? addUnique : removeValue;
      const nextStory: Story =
        reaction === 'like'
          ? { ...story, likes: apply(story.likes, user.id) }
          : { ...story, saves: apply(story.saves, user.id) };
      const nextUser: User =
        reaction === 'like'
          ? { ...user, likedBooks: apply(user.likedBooks, story.id) }
          : { ...user, savedBooks: apply(user.savedBooks, story.id) };

      await repositories.stories.update(nextStory);
      await repositories.users.update(nextUser);
      return ok(nextStory);
    });

    if (result.ok) {
      logger.info('Story reaction updated', { storyId, userId: requester.id, reaction, add });
    }
    return result;
  }

  like(storyId: string, requester: User): Promise<Result<Story, LibraryError>> {
    return this.react('like', true, storyId, requester);
  }

  unlike(storyId: string, requester: User): Promise<Result<Story, LibraryError>> {
    return this.react('like', false, storyId, requester);
  }

  save(storyId: string, requester: User): Promise<Result<Story, LibraryError>> {
    return this.react('save', true, storyId, requester);
  }

  unsave(storyId: string, requester: User): Promise<Result<Story, LibraryError>> {
    return this.react('save', false, storyId, requester);
  }

  /**
   * Flip a story's visibility and move its key between the author's public
   * and private books. Only the author may toggle.
   */
  async togglePrivacy(storyId: string, requester: User): Promise<Result<Story, LibraryError>> {
    const result = await this.persistence.transaction<Result<Story, LibraryError>>(async ({ stories, users }) => {
      const story = await stories.getByKey(storyId);
      if (!story) return err(notFound(`Story not found: ${storyId}`));
      if (story.authorId !== requester.id) return err(accessDenied('Only the author can change visibility'));

      const author = await users.getByKey(story.authorId);
      if (!author) return err(notFound(`User not found: ${story.authorId}`));

      const makePrivate = !story.private;
      const nextStory: Story = { ...story, private: makePrivate };
      await stories.update(nextStory);
      await users.update({
        ...author,
        publicBooks: makePrivate ? removeValue(author.publicBooks, story.id) : addUnique(author.publicBooks, story.id),
        privateBooks: makePrivate ? addUnique(author.privateBooks, story.id) : removeValue(author.privateBooks, story.id),
      });
      return ok(nextStory);
    });

    if (result.ok) {
      logger.info('Story visibility toggled', { storyId, private: result.value.private });
    }
    return result;
  }

  /**
   * Completed public stories, newest first. Pages are 1-based.
   */
  async listRecentPublic(page: number, pageSize: number): Promise<Result<StoryPage, LibraryError>> {
    if (!Number.isInteger(page) || page < 1) {
      return err(invalid('page must be a positive integer'));
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      return err(invalid(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`));
    }

    const items = await this.persistence.stories.listFiltered(
      { private: false, status: 'complete' },
      { field: 'createdAt', direction: 'desc' },
      (page - 1) * pageSize,
      pageSize,
    );
    return ok({ items, page, pageSize });
  }

  /**
   * One of the requester's own collections. Liked and saved stories that have
   * since been made private by their author are left out.
   */
  async listCollection(requester: User, collection: StoryCollection): Promise<Story[]> {
    const ids = {
      public: requester.publicBooks,
      private: requester.privateBooks,
      liked: requester.likedBooks,
      saved: requester.savedBooks,
    }[collection];

    const stories = await this.persistence.stories.listFiltered(
      { ids },
      { field: 'createdAt', direction: 'desc' },
      0,
      Math.max(ids.length, 1),
    );
    return stories.filter((story) => canView(story, requester));
  }
}
