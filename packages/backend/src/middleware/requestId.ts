import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import '../shared/types';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * The caller's id when it is a UUID (the first one, if the header repeats),
 * otherwise a fresh v4.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const incoming = Array.isArray(header) ? header[0] : header;
  return incoming !== undefined && isUuid(incoming) ? incoming : uuidv4();
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  req.id = resolveRequestId(req.headers['x-request-id']);
  res.setHeader(REQUEST_ID_HEADER, req.id);
  next();
}
