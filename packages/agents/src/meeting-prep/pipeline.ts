/**
 * Briefing Pipeline
 *
 * Runs the four stages strictly in order against one session, threading
 * the growing transcript from each stage into the next, then assembles
 * the briefing document. Any stage failure aborts the run.
 *
 * @module meeting-prep/pipeline
 */

import type { Tracer, TraceContext } from '@meeting-briefing/lib';
import { createBriefingDocument, type BriefingDocument } from './contracts/briefing';
import { ErrorCodes, type StageErrorCode } from './contracts/errors';
import {
  validateMeetingRequest,
  type MeetingRequest,
  type ValidationIssue,
} from './contracts/meeting-request';
import { STAGE_ORDER, type StageName, type StageOutput } from './contracts/stage-output';
import { EmptyCompletionError } from './clients/completion';
import { classifyError, type ClassifiedError } from './error-handler';
import type { BriefingLogger } from './logger';
import {
  beginRun,
  completeRun,
  failRun,
  recordStageOutput,
  type MeetingSession,
} from './session';
import type { Stage, StageInput, StageResult } from './stages/types';

// ===========================================
// Types
// ===========================================

/** Where a run has got to, for attributing an unexpected throw */
interface RunCursor {
  stage: StageName;
  trace: TraceContext | null;
}

export interface BriefingPipelineDependencies {
  /** Must be exactly context, industry, strategy, briefing */
  stages: readonly Stage[];
  tracer: Tracer;
  logger: BriefingLogger;
  /** Clock; defaults to the system time */
  now?: () => Date;
}

export interface StageFailureCause {
  code: StageErrorCode;
  message: string;
}

export type GenerationFailure = {
  success: false;
  code: typeof ErrorCodes.BRIEFING_GENERATION_FAILED;
  error: string;
  failed_stage: StageName;
  cause: StageFailureCause;
};

export type RunInProgressFailure = {
  success: false;
  code: typeof ErrorCodes.RUN_IN_PROGRESS;
  error: string;
};

export type InvalidRequestFailure = {
  success: false;
  code: typeof ErrorCodes.INVALID_REQUEST;
  error: string;
  issues: ValidationIssue[];
};

export type PipelineResult =
  | { success: true; document: BriefingDocument }
  | GenerationFailure
  | RunInProgressFailure;

export type PipelineInputResult = PipelineResult | InvalidRequestFailure;

export const TRACE_NAME = 'meeting_preparation';
export const GENERATION_FAILED_MESSAGE = 'Briefing generation failed';

// ===========================================
// Pipeline
// ===========================================

export class BriefingPipeline {
  private readonly stages: readonly Stage[];
  private readonly tracer: Tracer;
  private readonly logger: BriefingLogger;
  private readonly now: () => Date;

  constructor(deps: BriefingPipelineDependencies) {
    const names = deps.stages.map((stage) => stage.name);
    if (names.length !== STAGE_ORDER.length || names.some((name, i) => name !== STAGE_ORDER[i])) {
      throw new Error(
        `Pipeline stages must be ${STAGE_ORDER.join(', ')}; got ${names.join(', ') || 'none'}`
      );
    }

    this.stages = [...deps.stages];
    this.tracer = deps.tracer;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Validate raw form input, then run. Invalid input never reaches a stage.
   */
  async runFromInput(session: MeetingSession, input: unknown): Promise<PipelineInputResult> {
    const validation = validateMeetingRequest(input);

    if (!validation.success) {
      this.logger.warn('Meeting request rejected', {
        session_id: session.session_id,
        issues: validation.issues,
      });
      return {
        success: false,
        code: ErrorCodes.INVALID_REQUEST,
        error: validation.error,
        issues: validation.issues,
      };
    }

    return this.run(session, validation.request);
  }

  /**
   * Run all four stages for a validated request.
   */
  async run(session: MeetingSession, request: MeetingRequest): Promise<PipelineResult> {
    const startedAt = this.now();

    if (!beginRun(session, request, startedAt)) {
      return {
        success: false,
        code: ErrorCodes.RUN_IN_PROGRESS,
        error: 'A briefing is already being generated for this session',
      };
    }

    const timer = this.logger.startTimer();
    const cursor: RunCursor = { stage: 'context', trace: null };

    // Anything thrown outside a stage still ends the run, never leaving it running
    try {
      return await this.runStages(session, request, startedAt, timer, cursor);
    } catch (error) {
      return this.fail(session, cursor.trace, cursor.stage, classifyError(error, 'internal'), timer());
    }
  }

  // ===========================================
  // Internals
  // ===========================================

  private async runStages(
    session: MeetingSession,
    request: MeetingRequest,
    startedAt: Date,
    timer: () => number,
    cursor: RunCursor
  ): Promise<PipelineResult> {
    const logContext = {
      session_id: session.session_id,
      company_name: request.company_name,
    };

    this.logger.briefingRequested({
      ...logContext,
      attendee_count: request.attendees.length,
      duration_minutes: request.duration_minutes,
      focus_area_count: request.focus_areas.length,
    });

    const trace = this.tracer.startTrace({
      name: TRACE_NAME,
      metadata: {
        agentName: 'meeting_prep',
        sessionId: session.session_id,
        tags: ['briefing'],
      },
      input: {
        company_name: request.company_name,
        objective: request.objective,
        attendee_count: request.attendees.length,
        duration_minutes: request.duration_minutes,
        focus_areas: [...request.focus_areas],
        industry: request.industry ?? null,
      },
    });
    cursor.trace = trace;

    for (const [index, stage] of this.stages.entries()) {
      cursor.stage = stage.name;
      const stageTimer = this.logger.startTimer();
      const span = this.tracer.createSpan(trace, {
        name: stage.name,
        input: { stage_index: index, transcript_length: session.transcript.length },
      });

      const result = await this.executeStage(stage, {
        request,
        transcript: [...session.transcript],
        trace,
        now: startedAt,
      });

      if (!result.success) {
        this.tracer.endSpan(span, { level: 'ERROR', statusMessage: result.error.message });
        this.logger.stageFailed({
          ...logContext,
          stage: stage.name,
          stage_index: index,
          error_code: result.error.code,
          error_message: result.error.message,
          duration_ms: stageTimer(),
        });

        return this.fail(session, trace, stage.name, result.error, timer());
      }

      const output: StageOutput = Object.freeze({
        stage: stage.name,
        text: result.text,
        generated_at: this.now().toISOString(),
      });
      recordStageOutput(session, output, this.now());

      this.tracer.endSpan(span, { output: { chars: output.text.length } });
      this.logger.stageCompleted({
        ...logContext,
        stage: stage.name,
        stage_index: index,
        output_chars: output.text.length,
        tokens_used: result.tokensUsed,
        duration_ms: stageTimer(),
      });
    }

    const document = createBriefingDocument(request, session.transcript, this.now().toISOString());
    completeRun(session, document, this.now());

    this.tracer.endTrace(trace, {
      success: true,
      filename: document.filename,
      markdown_chars: document.markdown.length,
    });
    this.logger.briefingCompiled({
      ...logContext,
      filename: document.filename,
      markdown_chars: document.markdown.length,
      total_processing_ms: timer(),
    });

    return { success: true, document };
  }

  /**
   * Run one stage, folding thrown errors and blank output into failures.
   */
  private async executeStage(stage: Stage, input: StageInput): Promise<StageResult> {
    let result: StageResult;
    try {
      result = await stage.execute(input);
    } catch (error) {
      return { success: false, error: classifyError(error, 'internal') };
    }

    if (!result.success) {
      return result;
    }

    const text = result.text.trim();
    if (!text) {
      return {
        success: false,
        error: classifyError(new EmptyCompletionError(stage.name), 'model'),
      };
    }

    return { ...result, text };
  }

  private fail(
    session: MeetingSession,
    trace: TraceContext | null,
    stage: StageName,
    cause: ClassifiedError,
    totalMs: number
  ): GenerationFailure {
    failRun(session, { code: cause.code, message: cause.userMessage, stage }, this.now());

    this.tracer.endTrace(trace, {
      success: false,
      failed_stage: stage,
      error_code: cause.code,
      error_message: cause.message,
    });
    this.logger.briefingFailed({
      session_id: session.session_id,
      company_name: session.request?.company_name ?? '',
      failed_stage: stage,
      error_code: cause.code,
      error_message: cause.message,
      total_processing_ms: totalMs,
    });

    return {
      success: false,
      code: ErrorCodes.BRIEFING_GENERATION_FAILED,
      error: GENERATION_FAILED_MESSAGE,
      failed_stage: stage,
      cause: { code: cause.code, message: cause.message },
    };
  }
}
