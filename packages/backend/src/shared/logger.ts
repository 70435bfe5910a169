export interface RequestLogEntry {
  method: string;
  path: string;
  /** Matched route path within its router, e.g. `/:id/skiptrace`. */
  route?: string;
  statusCode: number;
  responseTime: number;
  requestId?: string;
  companyId?: number;
  userId?: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SERVICE_NAME = 'stacker-search';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// Read per call; LOG_LEVEL may change after import.
function threshold(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return;

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    message,
    ...data,
  });
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(line + '\n');
}

function requestLevel(statusCode: number): LogLevel {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}

/**
 * Writes a structured JSON log line for an HTTP request. Server errors go to
 * stderr at `error`, client errors at `warn`.
 */
export function log(entry: RequestLogEntry): void {
  const level = requestLevel(entry.statusCode);
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    method: entry.method,
    path: entry.path,
    ...(entry.route ? { route: entry.route } : {}),
    statusCode: entry.statusCode,
    responseTime: entry.responseTime,
    ...(entry.requestId ? { requestId: entry.requestId } : {}),
    ...(entry.companyId !== undefined ? { companyId: entry.companyId } : {}),
    ...(entry.userId !== undefined ? { userId: entry.userId } : {}),
  });
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(line + '\n');
}

/**
 * General-purpose structured logger. Lines below LOG_LEVEL are dropped;
 * errors go to stderr, everything else to stdout.
 */
export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    write('debug', message, data);
  },

  info(message: string, data?: Record<string, unknown>): void {
    write('info', message, data);
  },

  warn(message: string, data?: Record<string, unknown>): void {
    write('warn', message, data);
  },

  error(message: string, data?: Record<string, unknown>): void {
    write('error', message, data);
  },
};

/** Extracts a loggable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- Security event logging ---

export function logAuthFailure(details: {
  sourceIp: string;
  userAgent?: string;
  reason: string;
}): void {
  logger.warn('Security event: authentication failure', {
    event_type: 'auth_failure',
    ...details,
  });
}

export function logAuthzFailure(details: {
  userId: number | 'unknown';
  resource: string;
  requiredRole: string;
  actualRole: string;
}): void {
  logger.warn('Security event: authorization failure', {
    event_type: 'authz_failure',
    ...details,
  });
}
