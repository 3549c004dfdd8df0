/**
 * Briefing API
 * Hono app serving the meeting briefing pipeline to browser sessions
 */
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Tracer } from '@meeting-briefing/lib';
import type {
  BriefingLogger,
  BriefingPipeline,
  CompletionClient,
  SearchClient,
} from '@meeting-briefing/agents';
import { loggingMiddleware } from './middleware/logging';
import { ErrorCodes, handleError } from './middleware/error-handler';
import { createBriefingRoutes } from './routes/briefings';
import { createStatusRoutes } from './routes/status';
import type { SessionStore } from './services/session-store';
import type { AppEnv } from './types';

export const API_VERSION = '0.1.0';

export interface AppDependencies {
  pipeline: BriefingPipeline;
  sessions: SessionStore;
  logger: BriefingLogger;
  model: CompletionClient;
  search: SearchClient;
  tracer: Tracer;
  /** Browser origins allowed to call the API with cookies */
  corsOrigins?: string[];
  /** Include internal error messages in 500 responses */
  exposeInternalErrors?: boolean;
  /** Clock used for uptime; defaults to the system time */
  now?: () => Date;
}

export function createApp(deps: AppDependencies) {
  const app = new Hono<AppEnv>();
  const now = deps.now ?? (() => new Date());
  const startedAt = now().getTime();

  // ============================================================================
  // Global Middleware
  // ============================================================================

  app.use('*', loggingMiddleware(deps.logger));

  app.use(
    '*',
    cors({
      origin: deps.corsOrigins ?? ['http://localhost:5173', 'http://127.0.0.1:5173'],
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-Id'],
      credentials: true,
    })
  );

  // ============================================================================
  // Public Routes
  // ============================================================================

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      version: API_VERSION,
      uptime_seconds: Math.floor((now().getTime() - startedAt) / 1000),
      timestamp: now().toISOString(),
    });
  });

  app.route('/api/status', createStatusRoutes(deps));

  // ============================================================================
  // Session Routes
  // ============================================================================

  app.route('/api/briefings', createBriefingRoutes(deps));

  // ============================================================================
  // Error Handling
  // ============================================================================

  app.onError(handleError({ exposeInternalErrors: deps.exposeInternalErrors }));

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: 'Not found',
        code: ErrorCodes.NOT_FOUND,
        timestamp: new Date().toISOString(),
      },
      404
    );
  });

  return app;
}

export type App = ReturnType<typeof createApp>;

export { SessionStore, createSessionStore } from './services/session-store';
export { SESSION_COOKIE } from './middleware/session';
export { AppError, type ErrorResponse } from './middleware/error-handler';
