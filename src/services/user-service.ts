/**
 * User Service
 * Profile updates and the follow graph. Follow and unfollow write both users
 * in one transaction so `followers`/`following` stay symmetric.
 */

import { logger } from '@/config/logger.js';
import { LibraryError, conflict, invalid, notFound } from '@/shared/errors.js';
import { PersistenceGateway } from '@/shared/interfaces.js';
import { Result, err, ok } from '@/shared/result.js';
import { addUnique, removeValue } from '@/shared/utils.js';
import { Story } from '@/types/story.js';
import { PublicUserProfile, User, UserUpdate } from '@/types/user.js';

export function toPublicProfile(user: User): PublicUserProfile {
  return {
    username: user.username,
    profilePicture: user.profilePicture,
    bio: user.bio,
    publicBooks: user.publicBooks,
  };
}

export class UserService {
  constructor(private readonly persistence: PersistenceGateway) {}

  async getUser(userId: string): Promise<User | null> {
    return this.persistence.users.getByKey(userId);
  }

  /**
   * Apply a profile update. A new username must not belong to anyone else.
   */
  async updateProfile(userId: string, update: UserUpdate): Promise<Result<User, LibraryError>> {
    const user = await this.persistence.users.getByKey(userId);
    if (!user) return err(notFound(`User not found: ${userId}`));

    if (update.username !== undefined && update.username !== user.username) {
      if (await this.persistence.users.usernameExists(update.username, user.id)) {
        return err(conflict('Username already exists'));
      }
    }

    const updated: User = {
      ...user,
      ...(update.username !== undefined && { username: update.username }),
      ...(update.bio !== undefined && { bio: update.bio }),
      ...(update.profilePicture !== undefined && { profilePicture: update.profilePicture }),
    };
    await this.persistence.users.update(updated);

    logger.info('User profile updated', { userId, fields: Object.keys(update) });
    return ok(updated);
  }

  async follow(requester: User, username: string): Promise<Result<void, LibraryError>> {
    const result = await this.persistence.transaction<Result<void, LibraryError>>(async ({ users }) => {
      const current = await users.getByKey(requester.id);
      if (!current) return err(notFound(`User not found: ${requester.id}`));
      const target = await users.getByUsername(username);
      if (!target) return err(notFound(`User not found: ${username}`));
      if (target.id === current.id) return err(invalid('You cannot follow yourself'));

      if (!current.following.includes(target.id)) {
        await users.update({ ...current, following: addUnique(current.following, target.id) });
        await users.update({ ...target, followers: addUnique(target.followers, current.id) });
      }
      return ok(undefined);
    });

    if (result.ok) logger.info('User followed', { userId: requester.id, username });
    return result;
  }

  async unfollow(requester: User, username: string): Promise<Result<void, LibraryError>> {
    const result = await this.persistence.transaction<Result<void, LibraryError>>(async ({ users }) => {
      const current = await users.getByKey(requester.id);
      if (!current) return err(notFound(`User not found: ${requester.id}`));
      const target = await users.getByUsername(username);
      if (!target) return err(notFound('User to unfollow not found'));
      if (!current.following.includes(target.id)) {
        return err(invalid('You are not following this user'));
      }

      await users.update({ ...current, following: removeValue(current.following, target.id) });
      await users.update({ ...target, followers: removeValue(target.followers, current.id) });
      return ok(undefined);
    });

    if (result.ok) logger.info('User unfollowed', { userId: requester.id, username });
    return result;
  }

  async isFollowing(requester: User, username: string): Promise<Result<boolean, LibraryError>> {
    const target = await this.persistence.users.getByUsername(username);
    if (!target) return err(notFound(`User not found: ${username}`));
    return ok(requester.following.includes(target.id));
  }

  private async resolveProfiles(ids: string[]): Promise<PublicUserProfile[]> {
    const users = await Promise.all(ids.map((id) => this.persistence.users.getByKey(id)));
    return users.flatMap((user) => (user ? [toPublicProfile(user)] : []));
  }

  getFollowers(user: User): Promise<PublicUserProfile[]> {
    return this.resolveProfiles(user.followers);
  }

  getFollowing(user: User): Promise<PublicUserProfile[]> {
    return this.resolveProfiles(user.following);
  }

  async getPublicProfile(username: string): Promise<Result<PublicUserProfile, LibraryError>> {
    const user = await this.persistence.users.getByUsername(username);
    if (!user) return err(notFound(`User not found: ${username}`));
    return ok(toPublicProfile(user));
  }

  /**
   * Stories a user has published. Private ones are included only for the
   * user themself.
   */
  async getUserStories(username: string, requester: User | null): Promise<Result<Story[], LibraryError>> {
    const user = await this.persistence.users.getByUsername(username);
    if (!user) return err(notFound(`User not found: ${username}`));

    const isOwner = requester?.id === user.id;
    const ids = isOwner ? [...user.publicBooks, ...user.privateBooks] : user.publicBooks;
    const stories = await this.persistence.stories.listFiltered(
      { ids, authorId: user.id, ...(!isOwner && { private: false }) },
      { field: 'createdAt', direction: 'desc' },
      0,
      Math.max(ids.length, 1),
    );
    return ok(stories);
  }
}
