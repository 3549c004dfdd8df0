/**
 * Briefing routes
 * Submit a meeting request, follow its progress, download the result
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  ErrorCodes,
  MeetingRequestSchema,
  getSessionProgress,
  resetSession,
  toMeetingRequest,
  type BriefingDocument,
  type BriefingPipeline,
} from '@meeting-briefing/agents';
import { AppError, notFoundError, runInProgressError } from '../middleware/error-handler';
import { sessionMiddleware } from '../middleware/session';
import type { SessionStore } from '../services/session-store';
import type { AppEnv } from '../types';

export interface BriefingRoutesDependencies {
  pipeline: BriefingPipeline;
  sessions: SessionStore;
}

/**
 * Content-Disposition value with an ASCII fallback name
 */
export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function toBriefingResponse(document: BriefingDocument) {
  return {
    company_name: document.company_name,
    filename: document.filename,
    markdown: document.markdown,
    created_at: document.created_at,
    stages: document.stages.map((output) => ({
      stage: output.stage,
      generated_at: output.generated_at,
    })),
  };
}

export function createBriefingRoutes(deps: BriefingRoutesDependencies) {
  const briefings = new Hono<AppEnv>();

  briefings.use('*', sessionMiddleware(deps.sessions));

  /**
   * POST /api/briefings
   * Validate the meeting request and run the pipeline for this session
   */
  briefings.post(
    '/',
    zValidator('json', MeetingRequestSchema, (result) => {
      if (!result.success) {
        throw result.error;
      }
    }),
    async (c) => {
      const logger = c.get('logger');
      const session = c.get('session');
      const request = toMeetingRequest(c.req.valid('json'));

      logger.info('briefing_submitted', {
        session_id: session.session_id,
        company_name: request.company_name,
      });

      const result = await deps.pipeline.run(session, request);
      // The run may outlast the TTL; its end is activity too
      deps.sessions.touch(session.session_id);

      if (result.success) {
        return c.json({ success: true, briefing: toBriefingResponse(result.document) });
      }

      if (result.code === ErrorCodes.RUN_IN_PROGRESS) {
        throw runInProgressError(result.error);
      }

      throw new AppError(result.error, result.code, 500, {
        failed_stage: result.failed_stage,
        cause: result.cause,
      });
    }
  );

  /**
   * GET /api/briefings/current
   * Progress of this session's run
   */
  briefings.get('/current', (c) => {
    return c.json({ success: true, session: getSessionProgress(c.get('session')) });
  });

  /**
   * GET /api/briefings/current/download
   * The finished briefing as a Markdown attachment
   */
  briefings.get('/current/download', (c) => {
    const document = c.get('session').document;
    if (!document) {
      throw notFoundError('Briefing');
    }

    return c.body(document.markdown, 200, {
      'Content-Type': 'text/markdown; charset=utf-8',
      'Content-Disposition': attachmentDisposition(document.filename),
    });
  });

  /**
   * DELETE /api/briefings/current
   * Reset this session to idle
   */
  briefings.delete('/current', (c) => {
    const session = c.get('session');
    if (!resetSession(session)) {
      throw runInProgressError('Cannot reset while a briefing is being generated');
    }

    c.get('logger').info('session_reset', { session_id: session.session_id });
    return c.json({ success: true, session: getSessionProgress(session) });
  });

  return briefings;
}
