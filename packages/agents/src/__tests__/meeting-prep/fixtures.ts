/**
 * Test Fixtures for the Meeting Briefing Pipeline
 *
 * In-process fakes for the model and search clients, stub stages and
 * request factories.
 */

import { createNoopTracer } from '@meeting-briefing/lib';
import {
  validateMeetingRequest,
  type MeetingRequest,
  type MeetingRequestInput,
} from '../../meeting-prep/contracts';
import type { StageName } from '../../meeting-prep/contracts';
import type { Completion, CompletionClient } from '../../meeting-prep/clients/completion';
import type { SearchClient } from '../../meeting-prep/clients/web-search';
import { createLogger } from '../../meeting-prep/logger';
import type {
  ResearchStageDependencies,
  Stage,
  StageInput,
  StageResult,
} from '../../meeting-prep/stages/types';

// ===========================================
// Constants
// ===========================================

/** 2025-03-14T09:30:00.000Z */
export const FIXED_NOW = new Date(Date.UTC(2025, 2, 14, 9, 30, 0));
export const FIXED_ISO = '2025-03-14T09:30:00.000Z';

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

// ===========================================
// Requests
// ===========================================

export const createRequestInput = (
  overrides: Partial<MeetingRequestInput> = {}
): MeetingRequestInput => ({
  company_name: 'Acme Corp',
  objective: 'Explore partnership',
  attendees: [
    { name: 'Jane Doe', role: 'CFO' },
    { name: 'John Roe', role: '' },
  ],
  duration_minutes: 60,
  focus_areas: [],
  ...overrides,
});

export function createMeetingRequest(overrides: Partial<MeetingRequestInput> = {}): MeetingRequest {
  const result = validateMeetingRequest(createRequestInput(overrides));
  if (!result.success) {
    throw new Error(`Invalid fixture request: ${result.error}`);
  }
  return result.request;
}

// ===========================================
// Client Fakes
// ===========================================

export class FakeCompletionClient implements CompletionClient {
  readonly provider = 'fake';
  readonly model = 'test-model';
  readonly modelParameters = { temperature: 0.7, maxTokens: 2000 };
  readonly prompts: string[] = [];
  private readonly respond: (prompt: string, call: number) => Promise<string> | string;

  constructor(respond: (prompt: string, call: number) => Promise<string> | string) {
    this.respond = respond;
  }

  async complete(prompt: string): Promise<Completion> {
    this.prompts.push(prompt);
    const text = await this.respond(prompt, this.prompts.length);
    return {
      text,
      model: this.model,
      usage: { input_tokens: 10, output_tokens: 5 },
    };
  }
}

export class FakeSearchClient implements SearchClient {
  readonly provider = 'fake';
  readonly queries: string[] = [];
  private readonly respond: (query: string) => Promise<string> | string;

  constructor(respond: (query: string) => Promise<string> | string = () => 'search results') {
    this.respond = respond;
  }

  async search(query: string): Promise<string> {
    this.queries.push(query);
    return this.respond(query);
  }
}

export function createStageDeps(
  model: CompletionClient,
  search: SearchClient = new FakeSearchClient()
): ResearchStageDependencies {
  return {
    model,
    search,
    tracer: createNoopTracer(),
    logger: createLogger({ level: 'error' }),
  };
}

// ===========================================
// Stub Stages
// ===========================================

export type StageBehavior = (input: StageInput) => Promise<StageResult> | StageResult;

export class StubStage implements Stage {
  readonly name: StageName;
  readonly inputs: StageInput[] = [];
  private readonly behavior: StageBehavior;

  constructor(name: StageName, behavior: StageBehavior) {
    this.name = name;
    this.behavior = behavior;
  }

  async execute(input: StageInput): Promise<StageResult> {
    this.inputs.push(input);
    return this.behavior(input);
  }
}

export const succeedWith =
  (text: string): StageBehavior =>
  () => ({ success: true, text, tokensUsed: 15 });

/**
 * Stubs for all four stages; each returns "<NAME> OUTPUT" unless overridden.
 */
export function createStubStages(
  overrides: Partial<Record<StageName, StageBehavior>> = {}
): [StubStage, StubStage, StubStage, StubStage] {
  return [
    new StubStage('context', overrides.context ?? succeedWith('CONTEXT OUTPUT')),
    new StubStage('industry', overrides.industry ?? succeedWith('INDUSTRY OUTPUT')),
    new StubStage('strategy', overrides.strategy ?? succeedWith('STRATEGY OUTPUT')),
    new StubStage('briefing', overrides.briefing ?? succeedWith('BRIEFING OUTPUT')),
  ];
}
