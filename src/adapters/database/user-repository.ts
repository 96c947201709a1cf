import { and, eq, ne, sql } from 'drizzle-orm';
import { IUserRepository } from '@/shared/interfaces.js';
import { User, userSchema } from '@/types/user.js';
import { DatabaseExecutor } from '@/db/connection.js';
import { users } from '@/db/schema/index.js';

type UserRow = typeof users.$inferSelect;

function toUser(row: UserRow): User {
  return userSchema.parse({ ...row, createdAt: row.createdAt.toISOString() });
}

// Usernames are compared case-insensitively
const usernameMatches = (username: string) =>
  sql`lower(${users.username}) = ${username.toLowerCase()}`;

export class DatabaseUserRepository implements IUserRepository {
  constructor(private readonly db: DatabaseExecutor) {}

  async create(user: User): Promise<void> {
    const record = userSchema.parse(user);
    await this.db.insert(users).values({ ...record, createdAt: new Date(record.createdAt) });
  }

  async getByKey(id: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? toUser(row) : null;
  }

  async getByUsername(username: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(usernameMatches(username)).limit(1);
    return row ? toUser(row) : null;
  }

  async usernameExists(username: string, excludeId?: string): Promise<boolean> {
    const condition = excludeId
      ? and(usernameMatches(username), ne(users.id, excludeId))
      : usernameMatches(username);
    const rows = await this.db.select({ id: users.id }).from(users).where(condition).limit(1);
    return rows.length > 0;
  }

  async update(user: User): Promise<void> {
    const { id, createdAt: _createdAt, ...fields } = userSchema.parse(user);
    const updated = await this.db
      .update(users)
      .set(fields)
      .where(eq(users.id, id))
      .returning({ id: users.id });

    if (updated.length === 0) {
      throw new Error(`User not found: ${id}`);
    }
  }
}
