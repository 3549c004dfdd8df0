/**
 * Status route
 * Reports which providers are configured and whether tracing is on
 */
import { Hono } from 'hono';
import type { Tracer } from '@meeting-briefing/lib';
import type { CompletionClient, SearchClient } from '@meeting-briefing/agents';
import type { AppEnv } from '../types';

export interface StatusRoutesDependencies {
  model: CompletionClient;
  search: SearchClient;
  tracer: Tracer;
}

export function createStatusRoutes(deps: StatusRoutesDependencies) {
  const status = new Hono<AppEnv>();

  /**
   * GET /api/status
   */
  status.get('/', (c) => {
    return c.json({
      success: true,
      model: {
        provider: deps.model.provider,
        model: deps.model.model,
        configured: true,
      },
      search: {
        provider: deps.search.provider,
        configured: true,
      },
      tracing: {
        enabled: deps.tracer.enabled,
        project: deps.tracer.project,
      },
    });
  });

  return status;
}
