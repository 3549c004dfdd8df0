/**
 * Observability Types
 *
 * Type definitions for Langfuse integration and tracing.
 */

import type { Environment, SessionId } from '../types';

// ===========================================
// Agent Names
// ===========================================

/** Agent names for tracing */
export type AgentName = 'meeting_prep';

// ===========================================
// Trace Types
// ===========================================

/** Trace metadata for agent operations */
export interface TraceMetadata {
  agentName: AgentName;
  sessionId?: SessionId;
  userId?: string;
  tags?: string[];
}

/** Input for creating an agent trace */
export interface CreateTraceInput {
  name: string;
  metadata: TraceMetadata;
  input?: Record<string, unknown>;
}

// ===========================================
// Span Types
// ===========================================

export type ObservationLevel = 'DEBUG' | 'DEFAULT' | 'WARNING' | 'ERROR';

export interface SpanInput {
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

export interface SpanOutput {
  output?: unknown;
  statusMessage?: string;
  level?: ObservationLevel;
}

// ===========================================
// Generation Types (LLM Calls)
// ===========================================

/** LLM generation input */
export interface GenerationInput {
  name: string;
  model: string;
  input: unknown;
  modelParameters?: {
    temperature?: number;
    maxTokens?: number;
  };
  metadata?: Record<string, unknown>;
}

/** LLM generation output */
export interface GenerationOutput {
  output: unknown;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  latencyMs?: number;
  error?: string;
}

/** Token usage as reported by a completion */
export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

// ===========================================
// Configuration
// ===========================================

/** Tracing configuration, built once at startup */
export interface TracingConfig {
  /** Master toggle; tracing also stays off without keys */
  enabled: boolean;
  publicKey?: string;
  secretKey?: string;
  baseUrl: string;
  /** Project name attached to every trace */
  project: string;
  environment?: Environment;
  flushAt?: number;
  flushInterval?: number;
  requestTimeout?: number;
}

/** Environment variable names for Langfuse configuration */
export const LANGFUSE_ENV_VARS = {
  publicKey: 'LANGFUSE_PUBLIC_KEY',
  secretKey: 'LANGFUSE_SECRET_KEY',
  baseUrl: 'LANGFUSE_BASE_URL',
} as const;

export const DEFAULT_LANGFUSE_BASE_URL = 'https://cloud.langfuse.com';
