import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Service-to-service authentication via the x-api-key header. With no key
 * configured every request is rejected.
 */
export function apiKeyAuth(expectedKey: string | undefined): RequestHandler {
  const expectedTrimmed = (expectedKey || '').trim();

  return (req: Request, res: Response, next: NextFunction): void => {
    const headerTrimmed = (req.header('x-api-key') || '').trim();
    if (!expectedTrimmed || !headerTrimmed || headerTrimmed !== expectedTrimmed) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    next();
  };
}

export default apiKeyAuth;
