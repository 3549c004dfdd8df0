/**
 * Stage Types
 *
 * @module meeting-prep/stages/types
 */

import type { TraceContext, Tracer } from '@meeting-briefing/lib';
import type { MeetingRequest } from '../contracts/meeting-request';
import type { StageName, StageOutput } from '../contracts/stage-output';
import type { CompletionClient } from '../clients/completion';
import type { SearchClient } from '../clients/web-search';
import type { ClassifiedError } from '../error-handler';
import type { BriefingLogger } from '../logger';

// ===========================================
// Stage Contract
// ===========================================

export interface StageInput {
  request: MeetingRequest;
  /** Outputs of the stages that already ran, in order */
  transcript: readonly StageOutput[];
  trace: TraceContext | null;
  /** Pipeline clock reading at the start of the run */
  now: Date;
}

export type StageResult =
  | { success: true; text: string; tokensUsed: number }
  | { success: false; error: ClassifiedError };

export interface Stage {
  readonly name: StageName;
  execute(input: StageInput): Promise<StageResult>;
}

// ===========================================
// Dependencies
// ===========================================

export interface StageDependencies {
  model: CompletionClient;
  tracer: Tracer;
  logger: BriefingLogger;
}

export interface ResearchStageDependencies extends StageDependencies {
  search: SearchClient;
}

export interface ResearchStageConfig {
  /** Search text is cut to this many characters before prompting */
  maxResultChars: number;
}
