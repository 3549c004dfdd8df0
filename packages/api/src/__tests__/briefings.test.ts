/**
 * Briefing Route Tests
 */
import { describe, test, expect, vi, afterEach } from 'vitest';
import type { StageResult } from '@meeting-briefing/agents';
import { FIXED_NOW, acmeRequest, createTestApp, postJson, sessionCookie } from './helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

const ACME_MARKDOWN = [
  '# Meeting Briefing: Acme Corp',
  '',
  '- **Objective:** Negotiate renewal',
  '- **Attendees:** Jane Doe (CFO)',
  '- **Duration:** 30 minutes',
  '- **Focus Areas:** pricing',
  '- **Prepared:** 2025-03-14T09:30:00.000Z',
  '',
  '---',
  '',
  '## Company Context',
  '',
  'Context output',
  '',
  '## Industry Analysis',
  '',
  'Industry output',
  '',
  '## Meeting Strategy',
  '',
  'Strategy output',
  '',
  '## Executive Briefing',
  '',
  'Briefing output',
  '',
].join('\n');

describe('POST /api/briefings', () => {
  test('runs the pipeline and returns the briefing', async () => {
    const { app } = createTestApp();

    const res = await postJson(app, '/api/briefings', acmeRequest);

    expect(res.status).toBe(200);
    expect(res.headers.get('set-cookie')).toContain('briefing_session=');
    expect(res.headers.get('set-cookie')).toContain('HttpOnly');
    const body = await res.json();
    expect(body).toEqual({
      success: true,
      briefing: {
        company_name: 'Acme Corp',
        filename: 'briefing_acme_corp.md',
        markdown: ACME_MARKDOWN,
        created_at: '2025-03-14T09:30:00.000Z',
        stages: [
          { stage: 'context', generated_at: '2025-03-14T09:30:00.000Z' },
          { stage: 'industry', generated_at: '2025-03-14T09:30:00.000Z' },
          { stage: 'strategy', generated_at: '2025-03-14T09:30:00.000Z' },
          { stage: 'briefing', generated_at: '2025-03-14T09:30:00.000Z' },
        ],
      },
    });
  });

  test('returns 400 with per-field messages before any stage runs', async () => {
    const { app, stages } = createTestApp();

    const res = await postJson(app, '/api/briefings', {
      ...acmeRequest,
      company_name: '',
      attendees: '',
    });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body).toMatchObject({
      success: false,
      code: 'VALIDATION_ERROR',
      error: 'Company name is required',
      details: {
        fields: {
          company_name: ['Company name is required'],
          attendees: ['At least one attendee is required'],
        },
      },
    });
    expect(stages.every((stage) => stage.calls === 0)).toBe(true);
  });

  test('returns 400 for a body that is not JSON', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/briefings', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
  });

  test('returns 500 naming the failed stage', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app, stages } = createTestApp({
      stages: {
        industry: () => ({
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message: '429 rate limited',
            userMessage: 'Too many requests. Please try again in a few minutes.',
            source: 'search',
          },
        }),
      },
    });

    const res = await postJson(app, '/api/briefings', acmeRequest);

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      success: false,
      error: 'Briefing generation failed',
      code: 'BRIEFING_GENERATION_FAILED',
      details: {
        failed_stage: 'industry',
        cause: { code: 'RATE_LIMITED', message: '429 rate limited' },
      },
    });
    expect(stages[2]?.calls).toBe(0);
  });

  test('returns 409 while the session already has a run in flight', async () => {
    let release: (result: StageResult) => void = () => undefined;
    let entered: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      entered = resolve;
    });
    const { app } = createTestApp({
      stages: {
        context: () =>
          new Promise<StageResult>((resolve) => {
            release = resolve;
            entered();
          }),
      },
    });

    const first = await app.request('/api/briefings/current');
    const cookie = sessionCookie(first);

    const running = postJson(app, '/api/briefings', acmeRequest, cookie);
    await started;
    const conflict = await postJson(app, '/api/briefings', acmeRequest, cookie);

    expect(conflict.status).toBe(409);
    expect(await conflict.json()).toMatchObject({ success: false, code: 'RUN_IN_PROGRESS' });

    release({ success: true, text: 'Context output', tokensUsed: 1 });
    const done = await running;
    expect(done.status).toBe(200);
  });
});

describe('GET /api/briefings/current', () => {
  test('reports an idle session before any run', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/briefings/current');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      session: {
        status: 'idle',
        stage_index: 0,
        total_stages: 4,
        completed_stages: [],
        company_name: null,
        failure: null,
      },
    });
  });

  test('reports completion for the same session cookie', async () => {
    const { app } = createTestApp();
    const submitted = await postJson(app, '/api/briefings', acmeRequest);

    const res = await app.request('/api/briefings/current', {
      headers: { Cookie: sessionCookie(submitted) },
    });

    expect(await res.json()).toMatchObject({
      session: {
        status: 'complete',
        stage_index: 4,
        completed_stages: ['context', 'industry', 'strategy', 'briefing'],
        company_name: 'Acme Corp',
        filename: 'briefing_acme_corp.md',
      },
    });
  });
});

describe('GET /api/briefings/current/download', () => {
  test('returns 404 before any briefing exists', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/briefings/current/download');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      success: false,
      error: 'Briefing not found',
      code: 'NOT_FOUND',
    });
  });

  test('downloads the Markdown as an attachment', async () => {
    const { app } = createTestApp();
    const submitted = await postJson(app, '/api/briefings', acmeRequest);

    const res = await app.request('/api/briefings/current/download', {
      headers: { Cookie: sessionCookie(submitted) },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/markdown; charset=utf-8');
    expect(res.headers.get('content-disposition')).toBe(
      `attachment; filename="briefing_acme_corp.md"; filename*=UTF-8''briefing_acme_corp.md`
    );
    expect(await res.text()).toBe(ACME_MARKDOWN);
  });

  test('keeps the briefing when the run outlasts the session TTL', async () => {
    let clock = FIXED_NOW.getTime();
    const { app } = createTestApp({
      ttlMinutes: 1,
      now: () => new Date(clock),
      stages: {
        context: () => {
          clock += 2 * 60_000;
          return { success: true, text: 'Context output', tokensUsed: 1 };
        },
      },
    });
    const submitted = await postJson(app, '/api/briefings', acmeRequest);

    const res = await app.request('/api/briefings/current/download', {
      headers: { Cookie: sessionCookie(submitted) },
    });

    expect(submitted.status).toBe(200);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-disposition')).toBe(
      `attachment; filename="briefing_acme_corp.md"; filename*=UTF-8''briefing_acme_corp.md`
    );
  });

  test('keeps sessions independent', async () => {
    const { app } = createTestApp();
    await postJson(app, '/api/briefings', acmeRequest);

    const other = await app.request('/api/briefings/current/download');

    expect(other.status).toBe(404);
  });
});

describe('DELETE /api/briefings/current', () => {
  test('resets the session so the download is gone', async () => {
    const { app } = createTestApp();
    const submitted = await postJson(app, '/api/briefings', acmeRequest);
    const cookie = sessionCookie(submitted);

    const reset = await app.request('/api/briefings/current', {
      method: 'DELETE',
      headers: { Cookie: cookie },
    });
    const download = await app.request('/api/briefings/current/download', {
      headers: { Cookie: cookie },
    });

    expect(reset.status).toBe(200);
    expect(await reset.json()).toMatchObject({ success: true, session: { status: 'idle' } });
    expect(download.status).toBe(404);
  });
});
