import { Request, Response, NextFunction } from 'express';
import { log, type RequestLogEntry } from '../shared/logger';
import '../shared/types';

function routePath(req: Request): string | undefined {
  const route: unknown = req.route;
  if (typeof route !== 'object' || route === null || !('path' in route)) return undefined;
  return typeof route.path === 'string' ? route.path : undefined;
}

/**
 * Logs one line per request once the response is sent. The caller's user and
 * company are read at that point, after auth and `requireRole` have filled
 * them in.
 */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const entry: RequestLogEntry = {
      method: req.method,
      path: req.originalUrl,
      route: routePath(req),
      statusCode: res.statusCode,
      responseTime: Date.now() - start,
      requestId: req.id,
    };
    if (req.user) {
      entry.userId = req.user.userId;
      entry.companyId = req.user.companyId;
    }
    log(entry);
  });

  next();
}
