/**
 * Tracing Helpers
 *
 * Wraps Langfuse's trace, span and generation APIs behind a Tracer that is
 * constructed once at startup and passed to the components that need it.
 * A Tracer without a client turns every call into a no-op.
 */

import type { Langfuse } from 'langfuse';
import type {
  CreateTraceInput,
  GenerationInput,
  GenerationOutput,
  SpanInput,
  SpanOutput,
  TokenUsage,
  TraceMetadata,
  TracingConfig,
} from './types';
import { createLangfuseClient, flushLangfuse, shutdownLangfuse } from './langfuse-client';

// ===========================================
// Types for Langfuse Objects
// ===========================================

type LangfuseTrace = ReturnType<Langfuse['trace']>;
export type LangfuseSpan = ReturnType<LangfuseTrace['span']>;
export type LangfuseGeneration = ReturnType<LangfuseTrace['generation']>;

export interface TraceContext {
  trace: LangfuseTrace;
  traceId: string;
  metadata: TraceMetadata;
}

// ===========================================
// Tracer
// ===========================================

export class Tracer {
  private readonly client: Langfuse | null;
  private readonly config: Pick<TracingConfig, 'project' | 'environment'>;

  constructor(
    client: Langfuse | null,
    config: Pick<TracingConfig, 'project' | 'environment'>
  ) {
    this.client = client;
    this.config = config;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  get project(): string {
    return this.config.project;
  }

  /**
   * Create a new agent trace
   *
   * @returns Trace context or null if observability is disabled
   */
  startTrace(input: CreateTraceInput): TraceContext | null {
    if (!this.client) {
      return null;
    }

    const trace = this.client.trace({
      name: input.name,
      userId: input.metadata.userId,
      sessionId: input.metadata.sessionId,
      tags: [
        input.metadata.agentName,
        this.config.project,
        ...(input.metadata.tags ?? []),
      ],
      metadata: {
        agentName: input.metadata.agentName,
        project: this.config.project,
        environment: this.config.environment ?? 'development',
      },
      input: input.input,
    });

    return {
      trace,
      traceId: trace.id,
      metadata: input.metadata,
    };
  }

  endTrace(context: TraceContext | null, output?: Record<string, unknown>): void {
    if (context) {
      context.trace.update({ output });
    }
  }

  // ===========================================
  // Span Helpers
  // ===========================================

  createSpan(context: TraceContext | null, input: SpanInput): LangfuseSpan | null {
    if (!context) {
      return null;
    }

    return context.trace.span({
      name: input.name,
      input: input.input,
      metadata: input.metadata,
    });
  }

  endSpan(span: LangfuseSpan | null, output?: SpanOutput): void {
    if (span) {
      span.end({
        output: output?.output,
        statusMessage: output?.statusMessage,
        level: output?.level,
      });
    }
  }

  // ===========================================
  // Generation (LLM Call) Helpers
  // ===========================================

  createGeneration(
    context: TraceContext | null,
    input: GenerationInput
  ): LangfuseGeneration | null {
    if (!context) {
      return null;
    }

    return context.trace.generation({
      name: input.name,
      model: input.model,
      input: input.input,
      modelParameters: input.modelParameters,
      metadata: input.metadata,
    });
  }

  endGeneration(generation: LangfuseGeneration | null, output: GenerationOutput): void {
    if (generation) {
      generation.end({
        output: output.output,
        usage: output.usage
          ? {
              input: output.usage.inputTokens,
              output: output.usage.outputTokens,
              total: output.usage.totalTokens,
            }
          : undefined,
        metadata: {
          latencyMs: output.latencyMs,
          ...(output.error ? { error: output.error } : {}),
        },
        ...(output.error ? { level: 'ERROR' as const, statusMessage: output.error } : {}),
      });
    }
  }

  /**
   * Wrap an LLM call with generation tracking
   */
  async withGeneration<T extends { usage?: TokenUsage }>(
    context: TraceContext | null,
    input: GenerationInput,
    fn: () => Promise<T>
  ): Promise<T> {
    const generation = this.createGeneration(context, input);
    const startTime = Date.now();

    try {
      const result = await fn();

      this.endGeneration(generation, {
        output: result,
        usage: result.usage
          ? {
              inputTokens: result.usage.input_tokens,
              outputTokens: result.usage.output_tokens,
              totalTokens: result.usage.input_tokens + result.usage.output_tokens,
            }
          : undefined,
        latencyMs: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      this.endGeneration(generation, {
        output: null,
        error: String(error),
        latencyMs: Date.now() - startTime,
      });
      throw error;
    }
  }

  // ===========================================
  // Lifecycle
  // ===========================================

  async flush(): Promise<void> {
    await flushLangfuse(this.client);
  }

  async shutdown(): Promise<void> {
    await shutdownLangfuse(this.client);
  }
}

// ===========================================
// Factory Functions
// ===========================================

/**
 * Create a tracer from configuration.
 * Returns a disabled tracer when the toggle is off or keys are missing.
 */
export function createTracer(config: TracingConfig): Tracer {
  return new Tracer(createLangfuseClient(config), {
    project: config.project,
    environment: config.environment,
  });
}

/**
 * Create a tracer that records nothing
 */
export function createNoopTracer(project: string = 'meeting-briefing'): Tracer {
  return new Tracer(null, { project });
}
