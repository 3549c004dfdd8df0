/**
 * Meeting Session
 *
 * Explicit per-browser-session state: the validated request, the transcript
 * of stage outputs, the finished document or the failure. Passed by
 * reference through the pipeline and mutated only by the functions here.
 *
 * @module meeting-prep/session
 */

import { toSessionId, type SessionId } from '@meeting-briefing/lib';
import type { BriefingDocument } from './contracts/briefing';
import type { ErrorCode } from './contracts/errors';
import type { MeetingRequest } from './contracts/meeting-request';
import { STAGE_ORDER, type StageName, type StageOutput } from './contracts/stage-output';

// ===========================================
// Types
// ===========================================

export type SessionStatus = 'idle' | 'running' | 'complete' | 'failed';

export interface SessionFailure {
  code: ErrorCode;
  message: string;
  stage?: StageName;
}

export interface MeetingSession {
  readonly session_id: SessionId;
  status: SessionStatus;
  request: MeetingRequest | null;
  transcript: StageOutput[];
  /** Number of stages completed in the current run */
  stage_index: number;
  document: BriefingDocument | null;
  failure: SessionFailure | null;
  readonly created_at: string;
  updated_at: string;
}

export interface SessionProgress {
  session_id: SessionId;
  status: SessionStatus;
  stage_index: number;
  total_stages: number;
  completed_stages: StageName[];
  current_stage: StageName | null;
  company_name: string | null;
  filename: string | null;
  failure: SessionFailure | null;
  updated_at: string;
}

// ===========================================
// Lifecycle
// ===========================================

export function createSession(id?: string, now: Date = new Date()): MeetingSession {
  const timestamp = now.toISOString();
  return {
    session_id: toSessionId(id ?? crypto.randomUUID()),
    status: 'idle',
    request: null,
    transcript: [],
    stage_index: 0,
    document: null,
    failure: null,
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Start a run. Clears the previous run's transcript, document and failure.
 *
 * @returns false when a run is already in flight
 */
export function beginRun(
  session: MeetingSession,
  request: MeetingRequest,
  now: Date = new Date()
): boolean {
  if (session.status === 'running') {
    return false;
  }

  session.status = 'running';
  session.request = request;
  session.transcript = [];
  session.stage_index = 0;
  session.document = null;
  session.failure = null;
  session.updated_at = now.toISOString();
  return true;
}

export function recordStageOutput(
  session: MeetingSession,
  output: StageOutput,
  now: Date = new Date()
): void {
  session.transcript = [...session.transcript, output];
  session.stage_index = session.transcript.length;
  session.updated_at = now.toISOString();
}

export function completeRun(
  session: MeetingSession,
  document: BriefingDocument,
  now: Date = new Date()
): void {
  session.status = 'complete';
  session.document = document;
  session.updated_at = now.toISOString();
}

export function failRun(
  session: MeetingSession,
  failure: SessionFailure,
  now: Date = new Date()
): void {
  session.status = 'failed';
  session.document = null;
  session.failure = failure;
  session.updated_at = now.toISOString();
}

/**
 * Back to idle, dropping request, transcript and document.
 *
 * @returns false while a run is in flight
 */
export function resetSession(session: MeetingSession, now: Date = new Date()): boolean {
  if (session.status === 'running') {
    return false;
  }

  session.status = 'idle';
  session.request = null;
  session.transcript = [];
  session.stage_index = 0;
  session.document = null;
  session.failure = null;
  session.updated_at = now.toISOString();
  return true;
}

// ===========================================
// Progress
// ===========================================

export function getSessionProgress(session: MeetingSession): SessionProgress {
  const completed = session.transcript.map((output) => output.stage);

  return {
    session_id: session.session_id,
    status: session.status,
    stage_index: session.stage_index,
    total_stages: STAGE_ORDER.length,
    completed_stages: completed,
    current_stage:
      session.status === 'running' ? (STAGE_ORDER[session.stage_index] ?? null) : null,
    company_name: session.request?.company_name ?? null,
    filename: session.document?.filename ?? null,
    failure: session.failure,
    updated_at: session.updated_at,
  };
}
