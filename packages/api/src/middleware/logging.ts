/**
 * Structured logging middleware for the Briefing API
 * Provides JSON-formatted request/response logging
 */
import { createMiddleware } from 'hono/factory';
import type { BriefingLogger } from '@meeting-briefing/agents';
import type { AppEnv } from '../types';

/**
 * Generate a short request ID
 */
function generateRequestId(): string {
  return Math.random().toString(36).substring(2, 10);
}

/**
 * Structured logging middleware factory
 */
export function loggingMiddleware(logger: BriefingLogger) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const requestId = c.req.header('x-request-id') ?? generateRequestId();
    const requestLogger = logger.child({ request_id: requestId });
    const startTime = Date.now();

    // Attach request ID and logger to context for use in handlers
    c.set('requestId', requestId);
    c.set('logger', requestLogger);

    requestLogger.debug('request_start', { method: c.req.method, path: c.req.path });

    await next();

    const entry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startTime,
    };

    if (c.res.status >= 500) {
      requestLogger.warn('request_complete', entry);
    } else {
      requestLogger.info('request_complete', entry);
    }
  });
}
