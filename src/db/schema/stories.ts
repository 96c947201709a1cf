import { pgTable, uuid, varchar, text, timestamp, jsonb, boolean, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { storyStatusEnum } from './enums.js';
import { STORY_STYLE_MAX_LENGTH, STORY_TITLE_MAX_LENGTH } from '../../types/story.js';

// -----------------------------------------------------------------------------
// Stories domain
// -----------------------------------------------------------------------------

export const stories = pgTable(
  'stories',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    title: varchar('title', { length: STORY_TITLE_MAX_LENGTH }).default('').notNull(),
    description: text('description').default('').notNull(), // original prompt, or progress text while generating
    author: varchar('author', { length: 64 }).notNull(),
    authorId: text('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    style: varchar('style', { length: STORY_STYLE_MAX_LENGTH }).default('storybook').notNull(),
    storyPages: jsonb('story_pages').$type<string[]>().default([]).notNull(),
    storyImages: jsonb('story_images').$type<string[]>().default([]).notNull(),
    audioFiles: jsonb('audio_files').$type<string[]>().default([]).notNull(),
    private: boolean('private').default(false).notNull(),
    likes: jsonb('likes').$type<string[]>().default([]).notNull(),
    saves: jsonb('saves').$type<string[]>().default([]).notNull(),
    status: storyStatusEnum('status').default('created').notNull(),
    disability: text('disability'), // accessibility hint, steers generation only
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    privateCreatedAtIdx: index('stories_private_created_at_idx').on(table.private, table.createdAt),
    authorIdCreatedAtIdx: index('stories_author_id_created_at_idx').on(table.authorId, table.createdAt),
    statusIdx: index('stories_status_idx').on(table.status),
  }),
);
