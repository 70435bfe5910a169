import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError } from '../shared/errors';
import { getRedis } from '../cache/redis';
import { errorMessage, logAuthFailure, logger } from '../shared/logger';
import '../shared/types';

export const JWT_ISSUER = 'stacker';
export const JWT_AUDIENCE = 'stacker-api';

const PUBLIC_ROUTES: Array<{ method: string; path: string | RegExp }> = [
  { method: 'GET', path: '/api/v1/health' },
];

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  jti: z.string().optional(),
});

function isPublicRoute(method: string, path: string): boolean {
  return PUBLIC_ROUTES.some((route) => {
    if (route.method !== method.toUpperCase()) return false;
    if (typeof route.path === 'string') return route.path === path;
    return route.path.test(path);
  });
}

async function isTokenRevoked(jti: string): Promise<boolean> {
  const redis = getRedis();
  if (!redis) return false; // No revocation list without Redis
  try {
    const result = await redis.get(`jti:${jti}`);
    return result !== null;
  } catch (err) {
    logger.warn('Revocation lookup failed, allowing token', { error: errorMessage(err) });
    return false;
  }
}

function sourceOf(req: Request): { sourceIp: string; userAgent?: string } {
  return {
    sourceIp: req.ip || req.socket.remoteAddress || 'unknown',
    userAgent: req.headers['user-agent'],
  };
}

/**
 * Verifies the bearer token and sets `req.user.userId`. The company and role
 * are resolved later by `requireRole`.
 */
export function createAuthMiddleware(jwtSecret: string) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    if (isPublicRoute(req.method, req.path)) {
      return next();
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      logAuthFailure({ ...sourceOf(req), reason: 'Missing or invalid authorization header' });
      return next(new AuthenticationError('Missing or invalid authorization header'));
    }

    const token = authHeader.slice(7);

    try {
      const decoded = jwt.verify(token, jwtSecret, {
        issuer: JWT_ISSUER,
        audience: JWT_AUDIENCE,
      });
      const payload = tokenPayloadSchema.safeParse(decoded);
      if (!payload.success) {
        logAuthFailure({ ...sourceOf(req), reason: 'Malformed token payload' });
        return next(new AuthenticationError('Invalid token'));
      }

      if (payload.data.jti && (await isTokenRevoked(payload.data.jti))) {
        logAuthFailure({ ...sourceOf(req), reason: 'Token has been revoked' });
        return next(new AuthenticationError('Token has been revoked'));
      }

      req.user = { userId: payload.data.userId };
      next();
    } catch (err) {
      const expired = err instanceof jwt.TokenExpiredError;
      logAuthFailure({ ...sourceOf(req), reason: expired ? 'Token has expired' : 'Invalid token' });
      return next(new AuthenticationError(expired ? 'Token has expired' : 'Invalid token'));
    }
  };
}
