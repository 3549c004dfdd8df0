/**
 * Test helpers for the Briefing API
 */
import { createNoopTracer } from '@meeting-briefing/lib';
import {
  BriefingPipeline,
  createLogger,
  type Completion,
  type CompletionClient,
  type SearchClient,
  type Stage,
  type StageInput,
  type StageName,
  type StageResult,
} from '@meeting-briefing/agents';
import { createApp, SESSION_COOKIE, type App } from '../index';
import { SessionStore } from '../services/session-store';

export const FIXED_NOW = new Date(Date.UTC(2025, 2, 14, 9, 30, 0));

export type StageBehavior = (input: StageInput) => Promise<StageResult> | StageResult;

export class StubStage implements Stage {
  readonly name: StageName;
  calls = 0;
  private readonly behavior: StageBehavior;

  constructor(name: StageName, behavior: StageBehavior) {
    this.name = name;
    this.behavior = behavior;
  }

  async execute(input: StageInput): Promise<StageResult> {
    this.calls += 1;
    return this.behavior(input);
  }
}

const succeed =
  (text: string): StageBehavior =>
  () => ({ success: true, text, tokensUsed: 1 });

const unusedModel: CompletionClient = {
  provider: 'anthropic',
  model: 'test-model',
  modelParameters: { temperature: 0.7, maxTokens: 2000 },
  complete: async (): Promise<Completion> => {
    throw new Error('not used in API tests');
  },
};

const unusedSearch: SearchClient = {
  provider: 'serpapi',
  search: async () => {
    throw new Error('not used in API tests');
  },
};

export interface TestAppOptions {
  stages?: Partial<Record<StageName, StageBehavior>>;
  now?: () => Date;
  ttlMinutes?: number;
}

export function createTestApp(options: TestAppOptions = {}): {
  app: App;
  sessions: SessionStore;
  stages: StubStage[];
} {
  const now = options.now ?? (() => new Date(FIXED_NOW.getTime()));
  const logger = createLogger({ level: 'error' });
  const tracer = createNoopTracer('briefing-tests');
  const stages = [
    new StubStage('context', options.stages?.context ?? succeed('Context output')),
    new StubStage('industry', options.stages?.industry ?? succeed('Industry output')),
    new StubStage('strategy', options.stages?.strategy ?? succeed('Strategy output')),
    new StubStage('briefing', options.stages?.briefing ?? succeed('Briefing output')),
  ];
  const sessions = new SessionStore({ ttlMinutes: options.ttlMinutes ?? 60, now });

  const app = createApp({
    pipeline: new BriefingPipeline({ stages, tracer, logger, now }),
    sessions,
    logger,
    model: unusedModel,
    search: unusedSearch,
    tracer,
    now,
  });

  return { app, sessions, stages };
}

/**
 * Session cookie pair from a response, ready for a Cookie header
 */
export function sessionCookie(response: Response): string {
  const header = response.headers.get('set-cookie') ?? '';
  const match = new RegExp(`${SESSION_COOKIE}=([^;]+)`).exec(header);
  if (!match) {
    throw new Error(`No session cookie in: ${header}`);
  }
  return `${SESSION_COOKIE}=${match[1]}`;
}

export const acmeRequest = {
  company_name: 'Acme Corp',
  objective: 'Negotiate renewal',
  attendees: '• Jane Doe - CFO',
  duration_minutes: 30,
  focus_areas: 'pricing',
};

export function postJson(app: App, path: string, body: unknown, cookie?: string) {
  return app.request(path, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...(cookie ? { Cookie: cookie } : {}),
    },
    body: JSON.stringify(body),
  });
}
