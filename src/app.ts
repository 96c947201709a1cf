import express from 'express';
import helmet from 'helmet';
import { logger } from '@/config/logger.js';
import { AppDependencies } from '@/dependencies.js';
import { apiKeyAuth } from '@/middleware/apiKeyAuth.js';
import { createStoriesRouter } from '@/routes/stories.js';
import { createUsersRouter } from '@/routes/users.js';
import { serializeError } from '@/utils/errorHandling.js';

export type AppServices = Omit<AppDependencies, 'persistence'>;

export function createApp(deps: AppServices): express.Express {
  const app = express();
  const lookupUser = (userId: string) => deps.users.getUser(userId);

  // Security middleware
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', async (_req, res) => {
    const healthStatus = await deps.health.checkHealth(deps.environment);
    res.status(healthStatus.status === 'healthy' ? 200 : 503).json(healthStatus);
  });

  // Basic route
  app.get('/', (_req, res) => {
    res.json({
      message: 'Picture Story Service',
      version: '0.1.0',
      environment: deps.environment,
    });
  });

  const requireApiKey = apiKeyAuth(deps.serviceApiKey);
  app.use(
    '/stories',
    requireApiKey,
    createStoriesRouter({
      orchestrator: deps.orchestrator,
      library: deps.library,
      recommendations: deps.recommendations,
      lookupUser,
    }),
  );
  app.use('/users', requireApiKey, createUsersRouter({ users: deps.users, library: deps.library, lookupUser }));

  // Error handling middleware
  app.use((error: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { error: serializeError(error) });
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      message: deps.environment === 'development' ? error.message : 'Something went wrong',
    });
  });

  // 404 handler
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      success: false,
      error: 'Not found',
      path: req.path,
    });
  });

  return app;
}
