import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { log, logger, errorMessage, type RequestLogEntry } from './logger';

function parsedCall(spy: MockInstance<typeof process.stdout.write>, index = 0): Record<string, unknown> {
  return JSON.parse(String(spy.mock.calls[index][0]).trim());
}

describe('logger', () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let stderrSpy: MockInstance<typeof process.stdout.write>;
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
  });

  describe('log', () => {
    it('writes a request line with the request id', () => {
      const entry: RequestLogEntry = {
        method: 'POST',
        path: '/api/v1/stacker',
        statusCode: 201,
        responseTime: 18,
        requestId: 'req-1',
      };

      log(entry);

      expect(stdoutSpy).toHaveBeenCalledOnce();
      expect(String(stdoutSpy.mock.calls[0][0]).endsWith('\n')).toBe(true);
      const parsed = parsedCall(stdoutSpy);
      expect(parsed).toMatchObject({
        level: 'info',
        service: 'stacker-search',
        method: 'POST',
        path: '/api/v1/stacker',
        statusCode: 201,
        responseTime: 18,
        requestId: 'req-1',
      });
      expect(parsed.timestamp).toBeDefined();
    });

    it('omits requestId when absent', () => {
      log({ method: 'GET', path: '/health', statusCode: 200, responseTime: 1 });
      expect(parsedCall(stdoutSpy)).not.toHaveProperty('requestId');
      expect(parsedCall(stdoutSpy)).not.toHaveProperty('companyId');
    });

    it('adds the route and the caller company', () => {
      log({
        method: 'GET',
        path: '/api/v1/stacker/41/skiptrace',
        route: '/:id/skiptrace',
        statusCode: 200,
        responseTime: 4,
        companyId: 3,
        userId: 8,
      });
      expect(parsedCall(stdoutSpy)).toMatchObject({
        route: '/:id/skiptrace',
        companyId: 3,
        userId: 8,
      });
    });

    it('logs client errors at warn and server errors to stderr', () => {
      log({ method: 'GET', path: '/api/v1/stacker/9/property/data', statusCode: 404, responseTime: 2 });
      expect(parsedCall(stdoutSpy).level).toBe('warn');

      log({ method: 'POST', path: '/api/v1/stacker', statusCode: 503, responseTime: 2 });
      expect(stdoutSpy).toHaveBeenCalledOnce();
      expect(parsedCall(stderrSpy).level).toBe('error');
    });
  });

  describe('levels', () => {
    it('info writes to stdout with extra data merged', () => {
      logger.info('populate finished', { companyIds: [3] });
      expect(parsedCall(stdoutSpy)).toMatchObject({
        level: 'info',
        message: 'populate finished',
        companyIds: [3],
      });
    });

    it('error writes to stderr', () => {
      logger.error('bulk item failed', { id: 9 });
      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(parsedCall(stderrSpy)).toMatchObject({ level: 'error', message: 'bulk item failed', id: 9 });
    });

    it('debug is dropped at the default level', () => {
      logger.debug('noisy');
      expect(stdoutSpy).not.toHaveBeenCalled();
    });

    it('debug is written when LOG_LEVEL=debug', () => {
      process.env.LOG_LEVEL = 'debug';
      logger.debug('noisy');
      expect(parsedCall(stdoutSpy)).toMatchObject({ level: 'debug', message: 'noisy' });
    });

    it('LOG_LEVEL=error suppresses warn', () => {
      process.env.LOG_LEVEL = 'error';
      logger.warn('ignored');
      logger.error('kept');
      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(stderrSpy).toHaveBeenCalledOnce();
    });

    it('falls back to info for an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      logger.debug('dropped');
      logger.info('kept');
      expect(stdoutSpy).toHaveBeenCalledOnce();
    });
  });

  describe('errorMessage', () => {
    it('uses Error.message or stringifies', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
    });
  });
});
