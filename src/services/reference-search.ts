/**
 * Reference search against the public Wikipedia API.
 */

import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { IReferenceSearch, ReferenceArticle } from '@/shared/interfaces.js';
import { FetchLike } from './notification-client.js';

const WIKIPEDIA_API_URL = 'https://en.wikipedia.org/w/api.php';
const MAX_SEARCH_LIMIT = 10;

const searchResponseSchema = z.object({
  query: z.object({
    search: z.array(
      z.object({
        title: z.string(),
        snippet: z.string().optional().default(''),
      }),
    ),
  }),
});

const extractResponseSchema = z.object({
  query: z.object({
    pages: z.array(
      z.object({
        title: z.string(),
        extract: z.string().optional(),
        missing: z.boolean().optional(),
      }),
    ),
  }),
});

export function articleUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${title.replace(/ /g, '_')}`;
}

/**
 * Search snippets come back with highlight markup.
 */
export function stripMarkup(snippet: string): string {
  return snippet
    .replace(/<[^>]+>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&#039;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

export class WikipediaReferenceSearch implements IReferenceSearch {
  private readonly fetchImpl: FetchLike;
  private readonly apiUrl: string;

  constructor(fetchImpl: FetchLike = fetch, apiUrl: string = WIKIPEDIA_API_URL) {
    this.fetchImpl = fetchImpl;
    this.apiUrl = apiUrl;
  }

  private async request(params: Record<string, string>): Promise<unknown> {
    const url = `${this.apiUrl}?${new URLSearchParams({ format: 'json', formatversion: '2', ...params })}`;
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json', 'User-Agent': 'picture-story-service/1.0' },
    });
    if (!response.ok) {
      throw new Error(`Wikipedia request failed: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }

  async search(query: string, limit: number): Promise<ReferenceArticle[]> {
    const boundedLimit = Math.max(1, Math.min(limit, MAX_SEARCH_LIMIT));
    const data = searchResponseSchema.parse(
      await this.request({
        action: 'query',
        list: 'search',
        srsearch: query,
        srlimit: String(boundedLimit),
        srprop: 'snippet',
      }),
    );

    const results = data.query.search.slice(0, boundedLimit).map((item) => ({
      title: item.title,
      snippet: stripMarkup(item.snippet),
      url: articleUrl(item.title),
    }));

    logger.debug('Reference search completed', { query, resultCount: results.length });
    return results;
  }

  async fetchArticle(title: string): Promise<string | null> {
    const data = extractResponseSchema.parse(
      await this.request({
        action: 'query',
        prop: 'extracts',
        explaintext: '1',
        redirects: '1',
        titles: title,
      }),
    );

    const page = data.query.pages[0];
    if (!page || page.missing || !page.extract?.trim()) {
      return null;
    }
    return page.extract.trim();
  }
}
