/**
 * Retrieval index on Postgres + pgvector.
 * Every scope shares the `retrieval_documents` table; a scope is a per-user
 * durable index or a transient per-request one.
 */

import { asc, cosineDistance, eq, sql } from 'drizzle-orm';
import { IEmbeddingService, ITextGenerationService } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import { DatabaseExecutor } from '@/db/connection.js';
import { EMBEDDING_COLUMN_DIMENSIONS, retrievalDocuments } from '@/db/schema/index.js';
import { IRetrievalIndex, RetrievalDocument, RetrievalQueryOptions } from '@/shared/interfaces.js';
import { RetryOptions, withRetry } from '@/shared/retry-utils.js';
import { PromptService } from './prompt.js';
import { splitTextIntoChunks } from './text-chunking.js';

const DEFAULT_CHUNK_SIZE = 1500;
const EMBEDDING_BATCH_SIZE = 64;
const DEFAULT_TOP_K = 4;

const DEFAULT_INSTRUCTION =
  'Summarise the facts from these passages that would help write an accurate story about the question.';

export interface PgVectorIndexDependencies {
  db: DatabaseExecutor;
  embeddings: IEmbeddingService;
  summarizer: ITextGenerationService;
  prompts: PromptService;
  chunkSize?: number;
  /** Overrides for the retry policy on setup and insertion */
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;
}

export class PgVectorRetrievalIndex implements IRetrievalIndex {
  private readonly db: DatabaseExecutor;
  private readonly embeddings: IEmbeddingService;
  private readonly summarizer: ITextGenerationService;
  private readonly prompts: PromptService;
  private readonly chunkSize: number;
  private readonly retry: RetryOptions;

  constructor(deps: PgVectorIndexDependencies) {
    this.db = deps.db;
    this.embeddings = deps.embeddings;
    this.summarizer = deps.summarizer;
    this.prompts = deps.prompts;
    this.chunkSize = deps.chunkSize ?? DEFAULT_CHUNK_SIZE;
    // Exponential backoff between 4 and 10 seconds, transient errors only
    this.retry = { maxAttempts: 3, baseDelayMs: 4000, maxDelayMs: 10000, ...deps.retry };
  }

  async setupIndex(scope: string): Promise<void> {
    if (this.embeddings.getDimensions() !== EMBEDDING_COLUMN_DIMENSIONS) {
      throw new Error(
        `Embedding model produces ${this.embeddings.getDimensions()} dimensions; index expects ${EMBEDDING_COLUMN_DIMENSIONS}`,
      );
    }

    await withRetry(
      async () => {
        await this.db.execute(sql`select 1 from ${retrievalDocuments} limit 1`);
      },
      { ...this.retry, operation: 'retrieval.setupIndex' },
    );
    logger.debug('Retrieval index ready', { scope });
  }

  async addDocuments(scope: string, documents: RetrievalDocument[]): Promise<number> {
    const chunks = documents.flatMap((document) =>
      splitTextIntoChunks(document.content, this.chunkSize).map((content) => ({
        title: document.title,
        source: document.source ?? null,
        content,
      })),
    );
    if (chunks.length === 0) return 0;

    const vectors: number[][] = [];
    for (let i = 0; i < chunks.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(i, i + EMBEDDING_BATCH_SIZE).map((chunk) => `${chunk.title}\n\n${chunk.content}`);
      vectors.push(...(await this.embeddings.embed(batch)));
    }

    const rows = chunks.flatMap((chunk, i) => {
      const embedding = vectors[i];
      return embedding ? [{ ...chunk, scope, embedding }] : [];
    });
    if (rows.length !== chunks.length) {
      throw new Error(`Embedding service returned ${vectors.length} vectors for ${chunks.length} chunks`);
    }

    await withRetry(
      async () => {
        await this.db.insert(retrievalDocuments).values(rows);
      },
      { ...this.retry, operation: 'retrieval.addDocuments' },
    );

    logger.info('Documents added to retrieval index', {
      scope,
      documentCount: documents.length,
      chunkCount: rows.length,
    });
    return rows.length;
  }

  async query(scope: string, text: string, options: RetrievalQueryOptions = {}): Promise<string> {
    const [queryVector] = await this.embeddings.embed([text]);
    if (!queryVector) {
      throw new Error('Embedding service returned no vector for query');
    }

    const matches = await this.db
      .select({ title: retrievalDocuments.title, content: retrievalDocuments.content })
      .from(retrievalDocuments)
      .where(eq(retrievalDocuments.scope, scope))
      .orderBy(asc(cosineDistance(retrievalDocuments.embedding, queryVector)))
      .limit(options.topK ?? DEFAULT_TOP_K);

    if (matches.length === 0) {
      logger.debug('Retrieval query found no passages', { scope });
      return '';
    }

    const passages = matches.map((match, i) => `[${i + 1}] ${match.title}\n${match.content}`).join('\n\n');
    const request = await this.prompts.render('retrieval-summary', {
      instruction: options.instruction ?? DEFAULT_INSTRUCTION,
      question: text,
      passages,
    });

    const answer = await this.summarizer.complete(request.userPrompt, {
      ...(request.systemPrompt && { systemPrompt: request.systemPrompt }),
      temperature: 0.2,
      maxTokens: 400,
    });
    return answer.trim();
  }

  async deleteAll(scope: string): Promise<number> {
    const deleted = await this.db
      .delete(retrievalDocuments)
      .where(eq(retrievalDocuments.scope, scope))
      .returning({ id: retrievalDocuments.id });

    logger.debug('Retrieval scope cleared', { scope, deletedCount: deleted.length });
    return deleted.length;
  }
}
