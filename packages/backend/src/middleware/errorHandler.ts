import { Request, Response, NextFunction } from 'express';
import { AppError } from '../shared/errors';
import { errorResponse } from '../shared/envelope';
import { logger } from '../shared/logger';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

const INTERNAL_PATTERNS = [
  /\/app\/src\//i,
  /\/home\//i,
  /\/usr\//i,
  /\.(ts|js):\d+/,
  /at\s+\S+\s+\(/,
  /node_modules\//,
  /Error:\s+relation\s+"/i,
  /ECONNREFUSED/i,
  /ENOTFOUND/i,
  /password authentication failed/i,
  /syntax error at or near/i,
  /duplicate key value/i,
  /index_not_found_exception|search_phase_execution_exception/i,
];

/** File paths, stack frames, driver and document store errors. */
function containsInternalDetails(message: string): boolean {
  return INTERNAL_PATTERNS.some((pattern) => pattern.test(message));
}

// express.json() rejects unparseable bodies with a SyntaxError carrying `body`.
function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isMalformedJson(err)) {
    res.status(400).json(errorResponse('VALIDATION_ERROR', 'Malformed JSON body'));
    return;
  }

  if (err instanceof AppError) {
    logger.error('AppError', {
      requestId: req.id,
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
      stack: err.stack,
    });

    const message = isProduction() && containsInternalDetails(err.message)
      ? 'An error occurred'
      : err.message;
    res.status(err.statusCode).json(errorResponse(err.code, message));
    return;
  }

  logger.error('Unhandled error', {
    requestId: req.id,
    error: err.message,
    stack: err.stack,
  });

  // Never expose internal details for unknown errors
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
