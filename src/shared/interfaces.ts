// -----------------------------------------------------------------------------
// Shared Interfaces - Abstract interfaces for adapters
// These can be swapped with in-memory fakes for testing
// -----------------------------------------------------------------------------

import { NewStory, Story, StoryStatus } from '@/types/story.js';
import { User } from '@/types/user.js';

// -----------------------------------------------------------------------------
// Persistence
// -----------------------------------------------------------------------------

export interface StoryFilter {
  private?: boolean;
  authorId?: string;
  status?: StoryStatus;
  ids?: string[];
}

export interface StoryOrder {
  field: 'createdAt' | 'title';
  direction: 'asc' | 'desc';
}

export interface IStoryRepository {
  /** Persist a new record and return its server-issued key. */
  create(story: NewStory): Promise<string>;
  getByKey(id: string): Promise<Story | null>;
  /** Replace the stored record with the same key. Throws if the key is unknown. */
  update(story: Story): Promise<void>;
  listFiltered(filter: StoryFilter, order: StoryOrder, offset: number, limit: number): Promise<Story[]>;
}

export interface IUserRepository {
  create(user: User): Promise<void>;
  getByKey(id: string): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  /** True if another user (not `excludeId`) already holds the username. */
  usernameExists(username: string, excludeId?: string): Promise<boolean>;
  update(user: User): Promise<void>;
}

export interface Repositories {
  stories: IStoryRepository;
  users: IUserRepository;
}

export interface PersistenceGateway extends Repositories {
  /**
   * Run `work` against repositories bound to a single transaction.
   * Either every write inside it lands or none does.
   */
  transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T>;
}

// -----------------------------------------------------------------------------
// Object storage
// -----------------------------------------------------------------------------

export interface IObjectStorage {
  upload(bytes: Buffer, path: string, contentType: string): Promise<void>;
  /** Make the object publicly readable and return its public URL. */
  makePublic(path: string): Promise<string>;
}

// -----------------------------------------------------------------------------
// Notification
// -----------------------------------------------------------------------------

export interface INotificationService {
  /** Best-effort delivery; resolves false instead of throwing. */
  send(to: string, subject: string, html: string): Promise<boolean>;
}

// -----------------------------------------------------------------------------
// Retrieval
// -----------------------------------------------------------------------------

export interface RetrievalDocument {
  title: string;
  content: string;
  source?: string;
}

export interface RetrievalQueryOptions {
  topK?: number;
  instruction?: string;
}

export interface IRetrievalIndex {
  setupIndex(scope: string): Promise<void>;
  /** Returns the number of chunks stored. */
  addDocuments(scope: string, documents: RetrievalDocument[]): Promise<number>;
  /** Answer `text` from the scope's contents; empty string when nothing relevant is stored. */
  query(scope: string, text: string, options?: RetrievalQueryOptions): Promise<string>;
  /** Returns the number of chunks removed. */
  deleteAll(scope: string): Promise<number>;
}

export interface ReferenceArticle {
  title: string;
  snippet: string;
  url: string;
}

export interface IReferenceSearch {
  search(query: string, limit: number): Promise<ReferenceArticle[]>;
  /** Plain-text article body, or null when the article has no extract. */
  fetchArticle(title: string): Promise<string | null>;
}
