/**
 * Meeting Briefing Types
 *
 * Internal type definitions for the briefing pipeline: structured log
 * events emitted by the logger.
 *
 * @module meeting-prep/types
 */

import type { StageName } from './contracts/stage-output';

// ===========================================
// Logging Event Types
// ===========================================

export type LogEventType =
  | 'briefing_requested'
  | 'stage_completed'
  | 'stage_failed'
  | 'briefing_compiled'
  | 'briefing_failed';

export interface BaseLogEvent {
  event: LogEventType;
  timestamp: string;
  session_id: string;
  company_name: string;
}

export interface BriefingRequestedEvent extends BaseLogEvent {
  event: 'briefing_requested';
  attendee_count: number;
  duration_minutes: number;
  focus_area_count: number;
}

export interface StageCompletedEvent extends BaseLogEvent {
  event: 'stage_completed';
  stage: StageName;
  stage_index: number;
  output_chars: number;
  tokens_used: number;
  duration_ms: number;
}

export interface StageFailedEvent extends BaseLogEvent {
  event: 'stage_failed';
  stage: StageName;
  stage_index: number;
  error_code: string;
  error_message: string;
  duration_ms: number;
}

export interface BriefingCompiledEvent extends BaseLogEvent {
  event: 'briefing_compiled';
  filename: string;
  markdown_chars: number;
  total_processing_ms: number;
}

export interface BriefingFailedEvent extends BaseLogEvent {
  event: 'briefing_failed';
  failed_stage: StageName;
  error_code: string;
  error_message: string;
  total_processing_ms: number;
}

export type LogEvent =
  | BriefingRequestedEvent
  | StageCompletedEvent
  | StageFailedEvent
  | BriefingCompiledEvent
  | BriefingFailedEvent;
