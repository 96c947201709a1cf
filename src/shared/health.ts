import { logger } from '@/config/logger.js';

export interface ComponentHealth {
  status: 'healthy' | 'unhealthy';
  message: string;
  responseTime?: number;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  service: string;
  timestamp: string;
  environment: string;
  version: string;
  checks: {
    database: ComponentHealth;
  };
}

export type HealthProbe = () => Promise<unknown>;

export class HealthService {
  private readonly serviceName = 'picture-story-service';
  private readonly version = '0.1.0';

  constructor(private readonly databaseProbe: HealthProbe) {}

  async checkHealth(environment: string): Promise<HealthStatus> {
    const database = await this.checkDatabaseHealth();

    return {
      status: database.status,
      service: this.serviceName,
      timestamp: new Date().toISOString(),
      environment,
      version: this.version,
      checks: { database },
    };
  }

  private async checkDatabaseHealth(): Promise<ComponentHealth> {
    const startTime = Date.now();

    try {
      await this.databaseProbe();
      const responseTime = Date.now() - startTime;
      logger.debug(`Database health check successful (${responseTime}ms)`);
      return { status: 'healthy', message: 'Database connection successful', responseTime };
    } catch (error) {
      const responseTime = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown database error';
      logger.error(`Database health check failed (${responseTime}ms)`, { error: errorMessage });
      return {
        status: 'unhealthy',
        message: `Database connection failed: ${errorMessage}`,
        responseTime,
      };
    }
  }
}
