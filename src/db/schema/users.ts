import { pgTable, text, varchar, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

// -----------------------------------------------------------------------------
// Users domain
// -----------------------------------------------------------------------------

// Users are provisioned by the identity layer; the id is its subject key.
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey(),
    username: varchar('username', { length: 64 }).notNull().unique(),
    email: varchar('email', { length: 255 }),
    profilePicture: text('profile_picture').default('').notNull(),
    bio: text('bio').default('').notNull(),
    followers: jsonb('followers').$type<string[]>().default([]).notNull(),
    following: jsonb('following').$type<string[]>().default([]).notNull(),
    likedBooks: jsonb('liked_books').$type<string[]>().default([]).notNull(),
    savedBooks: jsonb('saved_books').$type<string[]>().default([]).notNull(),
    publicBooks: jsonb('public_books').$type<string[]>().default([]).notNull(),
    privateBooks: jsonb('private_books').$type<string[]>().default([]).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    createdAtIdx: index('users_created_at_idx').on(table.createdAt),
  }),
);
