import { pgTable, uuid, varchar, text, timestamp, vector, index } from 'drizzle-orm/pg-core';

// -----------------------------------------------------------------------------
// Retrieval index (pgvector)
// -----------------------------------------------------------------------------

// Must match EMBEDDING_DIMENSIONS.
export const EMBEDDING_COLUMN_DIMENSIONS = 1536;

// One row per embedded chunk. `scope` is either a per-user durable scope or a
// transient per-request scope that is emptied after use.
export const retrievalDocuments = pgTable(
  'retrieval_documents',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    scope: varchar('scope', { length: 128 }).notNull(),
    title: text('title').default('').notNull(),
    source: text('source'),
    content: text('content').notNull(),
    embedding: vector('embedding', { dimensions: EMBEDDING_COLUMN_DIMENSIONS }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    scopeIdx: index('retrieval_documents_scope_idx').on(table.scope),
    embeddingIdx: index('retrieval_documents_embedding_idx').using(
      'hnsw',
      table.embedding.op('vector_cosine_ops'),
    ),
  }),
);
