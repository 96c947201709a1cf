import { PersistenceGateway, Repositories } from '@/shared/interfaces.js';
import { Database } from '@/db/connection.js';
import { DatabaseStoryRepository } from './story-repository.js';
import { DatabaseUserRepository } from './user-repository.js';

/**
 * Postgres-backed gateway. Multi-record mutations run inside `db.transaction`.
 */
export class DatabasePersistenceGateway implements PersistenceGateway {
  public readonly stories: DatabaseStoryRepository;
  public readonly users: DatabaseUserRepository;

  constructor(private readonly db: Database) {
    this.stories = new DatabaseStoryRepository(db);
    this.users = new DatabaseUserRepository(db);
  }

  transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) =>
      work({
        stories: new DatabaseStoryRepository(tx),
        users: new DatabaseUserRepository(tx),
      }),
    );
  }
}
