import { SearchTimeoutError, SearchUnavailableError } from '../../../shared/errors';

// @opensearch-project/opensearch puts the HTTP status on `statusCode` or `meta.statusCode`.
export function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  if ('meta' in err && typeof err.meta === 'object' && err.meta !== null) {
    const { meta } = err;
    if ('statusCode' in meta && typeof meta.statusCode === 'number') {
      return meta.statusCode;
    }
  }
  return undefined;
}

export function isOpenSearchError(err: unknown, statusCode: number): boolean {
  return statusCodeOf(err) === statusCode;
}

function errorShape(err: unknown): { name: string; message: string } {
  return err instanceof Error ? { name: err.name, message: err.message } : { name: '', message: '' };
}

export function isTimeoutError(err: unknown): boolean {
  const { name, message } = errorShape(err);
  if (name === 'TimeoutError' || name === 'RequestAbortedError') return true;
  if (/timeout|ETIMEDOUT/i.test(message)) return true;
  return isOpenSearchError(err, 408);
}

export function isConnectionError(err: unknown): boolean {
  const { name, message } = errorShape(err);
  if (name === 'ConnectionError' || name === 'NoLivingConnectionsError') return true;
  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND/.test(message)) return true;
  return isOpenSearchError(err, 503);
}

/**
 * Maps transport failures on the read path to request errors. Anything
 * else is returned unchanged for the caller to rethrow.
 */
export function toSearchError(err: unknown): unknown {
  if (isTimeoutError(err)) return new SearchTimeoutError();
  if (isConnectionError(err)) return new SearchUnavailableError();
  return err;
}
