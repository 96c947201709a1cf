import { describe, it, expect, beforeEach } from '@jest/globals';
import { PromptService } from '@/services/prompt.js';
import {
  ContextualRetrievalAugmenter,
  PersonalStoryIndex,
  RecommendationService,
  personalScope,
  storyToDocument,
} from '@/services/retrieval.js';
import { IReferenceSearch, ReferenceArticle } from '@/shared/interfaces.js';
import {
  InMemoryPersistenceGateway,
  InMemoryRetrievalIndex,
  ScriptedTextService,
  makeStory,
  makeUser,
} from './helpers/fakes.js';

class FakeReferenceSearch implements IReferenceSearch {
  fetched: string[] = [];

  constructor(
    private readonly articles: ReferenceArticle[] | Error,
    private readonly bodies: Record<string, string | Error> = {},
  ) {}

  async search(_query: string, limit: number): Promise<ReferenceArticle[]> {
    if (this.articles instanceof Error) throw this.articles;
    return this.articles.slice(0, limit);
  }

  async fetchArticle(title: string): Promise<string | null> {
    this.fetched.push(title);
    const body = this.bodies[title];
    if (body instanceof Error) throw body;
    return body ?? null;
  }
}

class FailingQueryIndex extends InMemoryRetrievalIndex {
  async query(): Promise<string> {
    throw new Error('vector store unavailable');
  }
}

class FixedAnswerIndex extends InMemoryRetrievalIndex {
  constructor(private readonly answer: string) {
    super();
  }

  async query(): Promise<string> {
    return this.answer;
  }
}

const LIGHTHOUSE: ReferenceArticle = {
  title: 'Lighthouse',
  snippet: 'A lighthouse is a tower',
  url: 'https://en.wikipedia.org/wiki/Lighthouse',
};

const PROMPT = 'A lighthouse keeper and her cat';
const SCOPE = 'context-user-1-fixed';

describe('ContextualRetrievalAugmenter', () => {
  let index: InMemoryRetrievalIndex;

  beforeEach(() => {
    index = new InMemoryRetrievalIndex();
  });

  function createAugmenter(search: IReferenceSearch, target: InMemoryRetrievalIndex = index) {
    return new ContextualRetrievalAugmenter({ referenceSearch: search, index: target, newScopeId: () => 'fixed' });
  }

  it('answers from fetched articles and clears the transient scope', async () => {
    const search = new FakeReferenceSearch([LIGHTHOUSE], { Lighthouse: 'A lighthouse is a tower with a lamp.' });

    const context = await createAugmenter(search).augment(PROMPT, 'user-1');

    expect(context).toBe('Lighthouse: A lighthouse is a tower with a lamp.');
    expect(index.setupCalls).toEqual([SCOPE]);
    expect(index.deleteCalls).toEqual([SCOPE]);
    expect(index.scopes.has(SCOPE)).toBe(false);
  });

  it('uses the search snippet when the article body cannot be fetched', async () => {
    const search = new FakeReferenceSearch([LIGHTHOUSE], { Lighthouse: new Error('502 Bad Gateway') });

    const context = await createAugmenter(search).augment(PROMPT, 'user-1');

    expect(context).toBe('Lighthouse: A lighthouse is a tower');
  });

  it('returns an empty context when the search fails', async () => {
    const search = new FakeReferenceSearch(new Error('network down'));

    await expect(createAugmenter(search).augment(PROMPT, 'user-1')).resolves.toBe('');
    expect(index.deleteCalls).toEqual([SCOPE]);
  });

  it('returns an empty context when nothing is found', async () => {
    const search = new FakeReferenceSearch([]);

    await expect(createAugmenter(search).augment(PROMPT, 'user-1')).resolves.toBe('');
    expect(index.setupCalls).toEqual([]);
    expect(index.deleteCalls).toEqual([SCOPE]);
  });

  it('still clears the scope when the query stage fails', async () => {
    const failing = new FailingQueryIndex();
    const search = new FakeReferenceSearch([LIGHTHOUSE], { Lighthouse: 'A lighthouse is a tower.' });

    await expect(createAugmenter(search, failing).augment(PROMPT, 'user-1')).resolves.toBe('');
    expect(failing.deleteCalls).toEqual([SCOPE]);
    expect(failing.scopes.size).toBe(0);
  });

  it('fetches no more than the configured number of articles', async () => {
    const articles = ['One', 'Two', 'Three', 'Four'].map((title) => ({ ...LIGHTHOUSE, title }));
    const search = new FakeReferenceSearch(articles);
    const augmenter = new ContextualRetrievalAugmenter({
      referenceSearch: search,
      index,
      maxArticles: 2,
      newScopeId: () => 'fixed',
    });

    await augmenter.augment(PROMPT, 'user-1');

    expect(search.fetched).toEqual(['One', 'Two']);
  });
});

describe('PersonalStoryIndex', () => {
  it('adds the story to its author scope', async () => {
    const index = new InMemoryRetrievalIndex();
    const story = { id: 'story-1', ...makeStory({ authorId: 'author-1', storyPages: ['Page one.', 'Page two.'] }) };

    const stored = await new PersonalStoryIndex(index).indexStory(story);

    expect(stored).toBe(1);
    expect(index.scopes.get(personalScope('author-1'))).toEqual([storyToDocument(story)]);
    expect(storyToDocument(story)).toEqual({
      title: 'A Test Story',
      content: 'a prompt\n\nPage one.\n\nPage two.',
      source: 'story:story-1',
    });
  });
});

describe('RecommendationService', () => {
  const reader = makeUser({ id: 'reader-1', username: 'reader' });
  const answer = JSON.stringify({ recommendations: ['A fox learns to swim', 'A moon that cannot sleep', 'A shy robot'] });

  function createService(index: InMemoryRetrievalIndex, persistence: InMemoryPersistenceGateway, textService: ScriptedTextService, count?: number) {
    return new RecommendationService({
      index,
      stories: persistence.stories,
      textService,
      prompts: new PromptService(),
      ...(count !== undefined && { count }),
    });
  }

  it('builds suggestions from the personal index summary', async () => {
    const textService = new ScriptedTextService([answer]);
    const service = createService(new FixedAnswerIndex('Stories about animals at sea.'), new InMemoryPersistenceGateway(), textService);

    const suggestions = await service.getRecommendations(reader);

    expect(suggestions).toEqual(['A fox learns to swim', 'A moon that cannot sleep', 'A shy robot']);
    expect(textService.calls[0]?.prompt).toContain('Here is what this reader has created so far:\nStories about animals at sea.');
    expect(textService.calls[0]?.prompt).toContain('Suggest 5 new story prompts');
  });

  it('falls back to recent story titles when the index fails', async () => {
    const persistence = new InMemoryPersistenceGateway();
    await persistence.stories.create(makeStory({ authorId: 'reader-1', title: 'Sea Otters', description: 'otters at play' }));
    await persistence.stories.create(makeStory({ authorId: 'someone-else', title: 'Not Mine' }));
    const textService = new ScriptedTextService([answer]);

    await createService(new FailingQueryIndex(), persistence, textService).getRecommendations(reader);

    expect(textService.calls[0]?.prompt).toContain('created so far:\n- Sea Otters: otters at play\n');
    expect(textService.calls[0]?.prompt).not.toContain('Not Mine');
  });

  it('describes a reader with no history', async () => {
    const textService = new ScriptedTextService([answer]);

    await createService(new FixedAnswerIndex(''), new InMemoryPersistenceGateway(), textService).getRecommendations(reader);

    expect(textService.calls[0]?.prompt).toContain('created so far:\nNo stories yet.\n');
  });

  it('returns at most the configured count', async () => {
    const textService = new ScriptedTextService([answer]);

    const suggestions = await createService(new FixedAnswerIndex('x'), new InMemoryPersistenceGateway(), textService, 2).getRecommendations(reader);

    expect(suggestions).toEqual(['A fox learns to swim', 'A moon that cannot sleep']);
  });

  it('rejects malformed model output', async () => {
    const textService = new ScriptedTextService([JSON.stringify({ recommendations: [] })]);

    await expect(
      createService(new FixedAnswerIndex('x'), new InMemoryPersistenceGateway(), textService).getRecommendations(reader),
    ).rejects.toThrow('Recommendation output was malformed');
  });
});
