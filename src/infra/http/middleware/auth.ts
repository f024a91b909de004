import { NextFunction, Request, Response } from 'express';
import { verifyToken } from '../token.js';

export interface AuthRequest extends Request {
  userId?: number;
  userEmail?: string;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Requires a valid Bearer JWT and exposes its claims on the request.
 */
export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      res.status(401).json({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
      return;
    }

    const payload = verifyToken(authHeader.slice(BEARER_PREFIX.length), jwtSecret);
    if (!payload) {
      res.status(401).json({
        code: 'UNAUTHORIZED',
        message: 'Invalid or expired token',
      });
      return;
    }

    req.userId = payload.userId;
    req.userEmail = payload.email;
    next();
  };
}
