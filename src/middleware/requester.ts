import { NextFunction, Request, RequestHandler, Response } from 'express';
import { User } from '@/types/user.js';

export const USER_HEADER = 'x-user-id';

export type UserLookup = (userId: string) => Promise<User | null>;

/**
 * Resolve the calling user from the x-user-id header. Identity is asserted by
 * the upstream gateway that holds the service API key.
 */
export async function resolveRequester(lookup: UserLookup, req: Request): Promise<User | null> {
  const userId = (req.header(USER_HEADER) || '').trim();
  if (!userId) return null;
  return lookup(userId);
}

/**
 * Wrap an async handler so rejections reach the error middleware.
 */
export function asyncRoute(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Handler that needs a known requester; responds 401 otherwise.
 */
export function withUser(
  lookup: UserLookup,
  handler: (req: Request, res: Response, user: User) => Promise<void>,
): RequestHandler {
  return asyncRoute(async (req, res) => {
    const user = await resolveRequester(lookup, req);
    if (!user) {
      res.status(401).json({ success: false, error: `A known user is required in the ${USER_HEADER} header` });
      return;
    }
    await handler(req, res, user);
  });
}

/**
 * Handler where the requester is optional (anonymous readers).
 */
export function withOptionalUser(
  lookup: UserLookup,
  handler: (req: Request, res: Response, user: User | null) => Promise<void>,
): RequestHandler {
  return asyncRoute(async (req, res) => {
    await handler(req, res, await resolveRequester(lookup, req));
  });
}
