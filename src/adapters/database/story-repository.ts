// -----------------------------------------------------------------------------
// Database Adapters - Drizzle implementations of the repository interfaces
// -----------------------------------------------------------------------------

import { and, asc, desc, eq, inArray, SQL } from 'drizzle-orm';
import { IStoryRepository, StoryFilter, StoryOrder } from '@/shared/interfaces.js';
import { NewStory, Story, newStorySchema, storySchema } from '@/types/story.js';
import { DatabaseExecutor } from '@/db/connection.js';
import { stories } from '@/db/schema/index.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type StoryRow = typeof stories.$inferSelect;

function toStory(row: StoryRow): Story {
  return storySchema.parse({ ...row, createdAt: row.createdAt.toISOString() });
}

export class DatabaseStoryRepository implements IStoryRepository {
  constructor(private readonly db: DatabaseExecutor) {}

  async create(story: NewStory): Promise<string> {
    const record = newStorySchema.parse(story);
    const [row] = await this.db
      .insert(stories)
      .values({ ...record, createdAt: new Date(record.createdAt) })
      .returning({ id: stories.id });

    if (!row) {
      throw new Error('Story insert returned no key');
    }
    return row.id;
  }

  async getByKey(id: string): Promise<Story | null> {
    // Keys are UUIDs; anything else cannot exist and would make pg reject the query
    if (!UUID_PATTERN.test(id)) return null;

    const [row] = await this.db.select().from(stories).where(eq(stories.id, id)).limit(1);
    return row ? toStory(row) : null;
  }

  async update(story: Story): Promise<void> {
    const { id, createdAt: _createdAt, ...fields } = storySchema.parse(story);
    const updated = await this.db
      .update(stories)
      .set(fields)
      .where(eq(stories.id, id))
      .returning({ id: stories.id });

    if (updated.length === 0) {
      throw new Error(`Story not found: ${id}`);
    }
  }

  async listFiltered(
    filter: StoryFilter,
    order: StoryOrder,
    offset: number,
    limit: number,
  ): Promise<Story[]> {
    if (filter.ids && filter.ids.length === 0) return [];

    const conditions: SQL[] = [];
    if (filter.private !== undefined) conditions.push(eq(stories.private, filter.private));
    if (filter.authorId !== undefined) conditions.push(eq(stories.authorId, filter.authorId));
    if (filter.status !== undefined) conditions.push(eq(stories.status, filter.status));
    if (filter.ids) conditions.push(inArray(stories.id, filter.ids.filter((id) => UUID_PATTERN.test(id))));

    const column = order.field === 'title' ? stories.title : stories.createdAt;
    const direction = order.direction === 'asc' ? asc : desc;

    const rows = await this.db
      .select()
      .from(stories)
      .where(and(...conditions))
      .orderBy(direction(column), direction(stories.id))
      .offset(offset)
      .limit(limit);

    return rows.map(toStory);
  }
}
