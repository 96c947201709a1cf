import { describe, it, expect } from '@jest/globals';
import { HealthService } from '@/shared/health.js';

describe('HealthService', () => {
  it('reports healthy when the database answers', async () => {
    const health = await new HealthService(async () => [{ '?column?': 1 }]).checkHealth('test');

    expect(health.status).toBe('healthy');
    expect(health.service).toBe('picture-story-service');
    expect(health.environment).toBe('test');
    expect(health.version).toBe('0.1.0');
    expect(health.checks.database.status).toBe('healthy');
    expect(health.checks.database.message).toBe('Database connection successful');
  });

  it('reports unhealthy with the database error', async () => {
    const health = await new HealthService(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }).checkHealth('test');

    expect(health.status).toBe('unhealthy');
    expect(health.checks.database.message).toBe('Database connection failed: connect ECONNREFUSED 127.0.0.1:5432');
  });
});
