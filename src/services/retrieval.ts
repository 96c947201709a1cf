/**
 * Retrieval services: request-scoped context augmentation from reference
 * articles, the per-user story index and prompt recommendations built on it.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ITextGenerationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import {
  IReferenceSearch,
  IRetrievalIndex,
  IStoryRepository,
  ReferenceArticle,
  RetrievalDocument,
} from '@/shared/interfaces.js';
import { parseAIResponse } from '@/shared/utils.js';
import { Story } from '@/types/story.js';
import { User } from '@/types/user.js';
import { serializeError } from '@/utils/errorHandling.js';
import { PromptService } from './prompt.js';

export const DEFAULT_MAX_ARTICLES = 3;

export function personalScope(authorId: string): string {
  return `user-${authorId}`;
}

// -----------------------------------------------------------------------------
// Contextual Retrieval Augmenter
// -----------------------------------------------------------------------------

export interface AugmenterDependencies {
  referenceSearch: IReferenceSearch;
  index: IRetrievalIndex;
  maxArticles?: number;
  newScopeId?: () => string;
}

/**
 * Never throws: any failing stage is logged and the context comes back empty.
 * The transient scope is cleared whatever happens.
 */
export class ContextualRetrievalAugmenter {
  private readonly referenceSearch: IReferenceSearch;
  private readonly index: IRetrievalIndex;
  private readonly maxArticles: number;
  private readonly newScopeId: () => string;

  constructor(deps: AugmenterDependencies) {
    this.referenceSearch = deps.referenceSearch;
    this.index = deps.index;
    this.maxArticles = deps.maxArticles ?? DEFAULT_MAX_ARTICLES;
    this.newScopeId = deps.newScopeId ?? randomUUID;
  }

  private async stage<T>(name: string, scope: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.warn('Retrieval stage failed, continuing without it', {
        stage: name,
        scope,
        error: serializeError(error),
      });
      return fallback;
    }
  }

  async augment(prompt: string, ownerScope: string): Promise<string> {
    const scope = `context-${ownerScope}-${this.newScopeId()}`;

    try {
      const articles = await this.stage<ReferenceArticle[]>('search', scope, [], () =>
        this.referenceSearch.search(prompt, this.maxArticles),
      );
      if (articles.length === 0) return '';

      const documents: RetrievalDocument[] = [];
      for (const article of articles.slice(0, this.maxArticles)) {
        const body = await this.stage<string | null>('fetch', scope, null, () =>
          this.referenceSearch.fetchArticle(article.title),
        );
        const content = body ?? article.snippet;
        if (content.trim()) {
          documents.push({ title: article.title, content, source: article.url });
        }
      }
      if (documents.length === 0) return '';

      const ready = await this.stage('setup', scope, false, async () => {
        await this.index.setupIndex(scope);
        return true;
      });
      if (!ready) return '';

      const stored = await this.stage('index', scope, 0, () => this.index.addDocuments(scope, documents));
      if (stored === 0) return '';

      const context = await this.stage('query', scope, '', () => this.index.query(scope, prompt));
      logger.info('Retrieval context prepared', {
        scope,
        articleCount: documents.length,
        chunkCount: stored,
        contextLength: context.length,
      });
      return context;
    } finally {
      await this.stage('cleanup', scope, 0, () => this.index.deleteAll(scope));
    }
  }
}

// -----------------------------------------------------------------------------
// Per-user story index
// -----------------------------------------------------------------------------

export function storyToDocument(story: Story): RetrievalDocument {
  return {
    title: story.title,
    content: [story.description, ...story.storyPages].filter((part) => part.trim()).join('\n\n'),
    source: `story:${story.id}`,
  };
}

export class PersonalStoryIndex {
  constructor(private readonly index: IRetrievalIndex) {}

  async indexStory(story: Story): Promise<number> {
    const scope = personalScope(story.authorId);
    await this.index.setupIndex(scope);
    return this.index.addDocuments(scope, [storyToDocument(story)]);
  }
}

// -----------------------------------------------------------------------------
// Recommendations
// -----------------------------------------------------------------------------

const recommendationsSchema = z.object({
  recommendations: z.array(z.string().trim().min(1)).min(1),
});

export interface RecommendationDependencies {
  index: IRetrievalIndex;
  stories: IStoryRepository;
  textService: ITextGenerationService;
  prompts: PromptService;
  count?: number;
}

export class RecommendationService {
  private readonly index: IRetrievalIndex;
  private readonly stories: IStoryRepository;
  private readonly textService: ITextGenerationService;
  private readonly prompts: PromptService;
  private readonly count: number;

  constructor(deps: RecommendationDependencies) {
    this.index = deps.index;
    this.stories = deps.stories;
    this.textService = deps.textService;
    this.prompts = deps.prompts;
    this.count = deps.count ?? 5;
  }

  /**
   * Reader history comes from the personal index, or from recent story titles
   * when the index has nothing to say.
   */
  private async describeHistory(user: User): Promise<string> {
    try {
      const summary = await this.index.query(
        personalScope(user.id),
        'What themes, characters and settings does this author write about?',
        { topK: 8, instruction: 'Describe the recurring themes, characters and settings in these stories.' },
      );
      if (summary) return summary;
    } catch (error) {
      logger.warn('Personal index query failed, falling back to story titles', {
        userId: user.id,
        error: serializeError(error),
      });
    }

    const recent = await this.stories.listFiltered(
      { authorId: user.id, status: 'complete' },
      { field: 'createdAt', direction: 'desc' },
      0,
      10,
    );
    if (recent.length === 0) return 'No stories yet.';
    return recent.map((story) => `- ${story.title}: ${story.description}`).join('\n');
  }

  async getRecommendations(user: User): Promise<string[]> {
    const history = await this.describeHistory(user);
    const request = await this.prompts.render('recommendations', { history, count: this.count });

    const raw = await this.textService.complete(request.userPrompt, {
      ...(request.systemPrompt && { systemPrompt: request.systemPrompt }),
      temperature: 0.9,
    });

    const parsed = recommendationsSchema.safeParse(parseAIResponse(raw));
    if (!parsed.success) {
      throw new Error(`Recommendation output was malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    logger.info('Recommendations generated', { userId: user.id, count: parsed.data.recommendations.length });
    return parsed.data.recommendations.slice(0, this.count);
  }
}
