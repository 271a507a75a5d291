import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Identity, TokenVerifier } from '../../../application/auth/tokens.js';
import { UnauthorizedError } from '../../../application/errors.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by `authMiddleware` on admitted requests. */
      identity?: Identity;
    }
  }
}

/**
 * Bearer-token gate. Rejections end the request with 401; admitted requests
 * carry the verified identity on `req.identity`.
 */
export function authMiddleware(verifier: TokenVerifier): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = verifier.verify(req.headers.authorization);
    if (!result.ok) {
      res.status(401).json({ error: result.error.message });
      return;
    }

    req.identity = result.identity;
    next();
  };
}

/**
 * Identity of the caller on a route mounted behind `authMiddleware`.
 */
export function requireIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.identity;
}
