/**
 * Observability Module
 *
 * Langfuse integration for tracing briefing runs.
 *
 * @example
 * ```typescript
 * import { createTracer } from '@meeting-briefing/lib/observability';
 *
 * const tracer = createTracer(config.tracing);
 * const trace = tracer.startTrace({
 *   name: 'meeting_preparation',
 *   metadata: { agentName: 'meeting_prep', sessionId },
 *   input: { company_name: 'Acme Corp' },
 * });
 *
 * // ... run stages ...
 *
 * tracer.endTrace(trace, { success: true });
 * await tracer.shutdown();
 * ```
 */

export {
  createLangfuseClient,
  flushLangfuse,
  shutdownLangfuse,
} from './langfuse-client';

export {
  Tracer,
  createTracer,
  createNoopTracer,
  type TraceContext,
  type LangfuseSpan,
  type LangfuseGeneration,
} from './tracing';

export type {
  AgentName,
  TraceMetadata,
  CreateTraceInput,
  GenerationInput,
  GenerationOutput,
  ObservationLevel,
  SpanInput,
  SpanOutput,
  TokenUsage,
  TracingConfig,
} from './types';

export { LANGFUSE_ENV_VARS, DEFAULT_LANGFUSE_BASE_URL } from './types';
