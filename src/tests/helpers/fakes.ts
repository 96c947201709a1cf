/**
 * In-process stand-ins for the persistence gateway and external capabilities.
 */

import { randomUUID } from 'crypto';
import {
  IEmbeddingService,
  IImageGenerationService,
  ITextGenerationService,
  ITTSService,
  TextGenerationOptions,
  TTSOptions,
  TTSResult,
} from '@/ai/interfaces.js';
import {
  INotificationService,
  IObjectStorage,
  IRetrievalIndex,
  IStoryRepository,
  IUserRepository,
  PersistenceGateway,
  Repositories,
  RetrievalDocument,
  StoryFilter,
  StoryOrder,
} from '@/shared/interfaces.js';
import { NewStory, Story, StoryContent } from '@/types/story.js';
import { User } from '@/types/user.js';

// -----------------------------------------------------------------------------
// Persistence
// -----------------------------------------------------------------------------

export class InMemoryStoryRepository implements IStoryRepository {
  records = new Map<string, Story>();

  async create(story: NewStory): Promise<string> {
    const id = randomUUID();
    this.records.set(id, structuredClone({ id, ...story }));
    return id;
  }

  async getByKey(id: string): Promise<Story | null> {
    const story = this.records.get(id);
    return story ? structuredClone(story) : null;
  }

  async update(story: Story): Promise<void> {
    if (!this.records.has(story.id)) {
      throw new Error(`Story not found: ${story.id}`);
    }
    this.records.set(story.id, structuredClone(story));
  }

  async listFiltered(filter: StoryFilter, order: StoryOrder, offset: number, limit: number): Promise<Story[]> {
    const sign = order.direction === 'asc' ? 1 : -1;
    return [...this.records.values()]
      .filter((story) => filter.private === undefined || story.private === filter.private)
      .filter((story) => filter.authorId === undefined || story.authorId === filter.authorId)
      .filter((story) => filter.status === undefined || story.status === filter.status)
      .filter((story) => filter.ids === undefined || filter.ids.includes(story.id))
      .sort((a, b) => {
        const primary = a[order.field].localeCompare(b[order.field]);
        return sign * (primary !== 0 ? primary : a.id.localeCompare(b.id));
      })
      .slice(offset, offset + limit)
      .map((story) => structuredClone(story));
  }
}

export class InMemoryUserRepository implements IUserRepository {
  records = new Map<string, User>();

  async create(user: User): Promise<void> {
    this.records.set(user.id, structuredClone(user));
  }

  async getByKey(id: string): Promise<User | null> {
    const user = this.records.get(id);
    return user ? structuredClone(user) : null;
  }

  async getByUsername(username: string): Promise<User | null> {
    const wanted = username.toLowerCase();
    const user = [...this.records.values()].find((u) => u.username.toLowerCase() === wanted);
    return user ? structuredClone(user) : null;
  }

  async usernameExists(username: string, excludeId?: string): Promise<boolean> {
    const user = await this.getByUsername(username);
    return user !== null && user.id !== excludeId;
  }

  async update(user: User): Promise<void> {
    if (!this.records.has(user.id)) {
      throw new Error(`User not found: ${user.id}`);
    }
    this.records.set(user.id, structuredClone(user));
  }
}

/**
 * Transactions snapshot both stores and restore them if the work throws.
 */
export class InMemoryPersistenceGateway implements PersistenceGateway {
  readonly stories = new InMemoryStoryRepository();
  readonly users = new InMemoryUserRepository();
  transactionCount = 0;

  async transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    this.transactionCount++;
    const stories = structuredClone(this.stories.records);
    const users = structuredClone(this.users.records);
    try {
      return await work({ stories: this.stories, users: this.users });
    } catch (error) {
      this.stories.records = stories;
      this.users.records = users;
      throw error;
    }
  }
}

export function makeUser(overrides: Partial<User> & Pick<User, 'id' | 'username'>): User {
  return {
    email: `${overrides.username}@example.com`,
    profilePicture: '',
    bio: '',
    followers: [],
    following: [],
    likedBooks: [],
    savedBooks: [],
    publicBooks: [],
    privateBooks: [],
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeStory(overrides: Partial<NewStory> & Pick<NewStory, 'authorId'>): NewStory {
  return {
    title: 'A Test Story',
    description: 'a prompt',
    author: 'author',
    style: 'storybook',
    storyPages: ['page one'],
    storyImages: ['https://storage.test/image-1.png'],
    audioFiles: [],
    private: false,
    likes: [],
    saves: [],
    createdAt: '2024-01-01T00:00:00.000Z',
    status: 'complete',
    disability: null,
    ...overrides,
  };
}

// -----------------------------------------------------------------------------
// Models
// -----------------------------------------------------------------------------

export interface TextCall {
  prompt: string;
  options: TextGenerationOptions | undefined;
}

/**
 * Replays scripted responses in order; an Error entry is thrown instead.
 */
export class ScriptedTextService implements ITextGenerationService {
  calls: TextCall[] = [];

  constructor(private readonly responses: Array<string | Error>, private readonly fallback?: string) {}

  async complete(prompt: string, options?: TextGenerationOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const next = this.responses[this.calls.length - 1] ?? this.fallback;
    if (next === undefined) {
      throw new Error(`No scripted response for call ${this.calls.length}`);
    }
    if (next instanceof Error) throw next;
    return next;
  }
}

export function storyContentJson(prompt: string, sceneCount: number, title = 'The Brave Little Boat'): string {
  const content: StoryContent = {
    prompt,
    title,
    scenes: Array.from({ length: sceneCount }, (_, i) => `Scene ${i + 1}: a small boat on a bright sea`),
    summaries: Array.from({ length: sceneCount }, (_, i) => `Page ${i + 1}. The little boat sails on.`),
  };
  return JSON.stringify(content);
}

export class FakeImageService implements IImageGenerationService {
  prompts: string[] = [];

  constructor(private readonly fail: (prompt: string, callIndex: number) => Error | null = () => null) {}

  async generate(prompt: string): Promise<string> {
    const callIndex = this.prompts.length;
    this.prompts.push(prompt);
    const failure = this.fail(prompt, callIndex);
    if (failure) throw failure;
    return `https://images.test/tmp/${callIndex}.png`;
  }
}

export class FakeTTSService implements ITTSService {
  calls: Array<{ text: string; options: TTSOptions | undefined }> = [];

  constructor(
    private readonly maxTextLength = 4096,
    private readonly fail: (text: string) => Error | null = () => null,
  ) {}

  async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
    this.calls.push({ text, options });
    const failure = this.fail(text);
    if (failure) throw failure;
    return { buffer: Buffer.from(text), format: 'mp3', voice: 'fable', model: 'test-tts', provider: 'openai' };
  }

  getMaxTextLength(): number {
    return this.maxTextLength;
  }

  getProvider(): 'openai' {
    return 'openai';
  }
}

export class FakeEmbeddingService implements IEmbeddingService {
  async embed(inputs: string[]): Promise<number[][]> {
    return inputs.map((input) => [input.length, 1]);
  }

  getDimensions(): number {
    return 2;
  }
}

// -----------------------------------------------------------------------------
// Storage, notification, retrieval
// -----------------------------------------------------------------------------

export class FakeObjectStorage implements IObjectStorage {
  uploads = new Map<string, { bytes: Buffer; contentType: string }>();
  publicPaths: string[] = [];

  async upload(bytes: Buffer, path: string, contentType: string): Promise<void> {
    this.uploads.set(path, { bytes, contentType });
  }

  async makePublic(path: string): Promise<string> {
    if (!this.uploads.has(path)) {
      throw new Error(`No such object: ${path}`);
    }
    this.publicPaths.push(path);
    return `https://storage.test/${path}`;
  }
}

export class RecordingNotifier implements INotificationService {
  sent: Array<{ to: string; subject: string; html: string }> = [];

  async send(to: string, subject: string, html: string): Promise<boolean> {
    this.sent.push({ to, subject, html });
    return true;
  }
}

export class InMemoryRetrievalIndex implements IRetrievalIndex {
  scopes = new Map<string, RetrievalDocument[]>();
  setupCalls: string[] = [];
  deleteCalls: string[] = [];

  async setupIndex(scope: string): Promise<void> {
    this.setupCalls.push(scope);
    if (!this.scopes.has(scope)) this.scopes.set(scope, []);
  }

  async addDocuments(scope: string, documents: RetrievalDocument[]): Promise<number> {
    const existing = this.scopes.get(scope);
    if (!existing) throw new Error(`Index not set up: ${scope}`);
    existing.push(...documents);
    return documents.length;
  }

  async query(scope: string, text: string): Promise<string> {
    const documents = this.scopes.get(scope) ?? [];
    const relevant = documents.filter((document) =>
      text
        .toLowerCase()
        .split(/\s+/)
        .some((word) => word.length > 3 && document.content.toLowerCase().includes(word)),
    );
    return relevant.map((document) => `${document.title}: ${document.content}`).join('\n');
  }

  async deleteAll(scope: string): Promise<number> {
    this.deleteCalls.push(scope);
    const removed = this.scopes.get(scope)?.length ?? 0;
    this.scopes.delete(scope);
    return removed;
  }
}

export const noSleep = async (): Promise<void> => {};

export const fakeDownloader = async (url: string) => ({
  bytes: Buffer.from(url),
  contentType: 'image/png',
});
