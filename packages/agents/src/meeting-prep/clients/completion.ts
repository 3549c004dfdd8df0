/**
 * Completion Client
 *
 * Single-turn text completion over the Anthropic Messages API.
 *
 * @module meeting-prep/clients/completion
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { TokenUsage } from '@meeting-briefing/lib';
import { DEFAULT_COMPLETION_CONFIG, type CompletionConfig } from '../config';

// ===========================================
// Types
// ===========================================

export interface Completion {
  text: string;
  model: string;
  usage: TokenUsage;
}

export interface CompletionClient {
  /** Provider name reported by the status route */
  readonly provider: string;
  /** Model id reported to tracing and the status route */
  readonly model: string;
  readonly modelParameters: { temperature: number; maxTokens: number };
  complete(prompt: string): Promise<Completion>;
}

/**
 * The slice of a Messages API response the client reads
 */
export interface MessageResponse {
  model: string;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic SDK the client calls; `anthropic.messages`
 * satisfies it.
 */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<MessageResponse>;
}

// ===========================================
// Errors
// ===========================================

/**
 * The model answered without any text content
 */
export class EmptyCompletionError extends Error {
  constructor(model: string) {
    super(`Model ${model} returned no text`);
    this.name = 'EmptyCompletionError';
  }
}

// ===========================================
// Anthropic Client
// ===========================================

export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = 'anthropic';
  private readonly messages: MessagesApi;
  private readonly config: CompletionConfig;

  constructor(anthropic: { messages: MessagesApi }, config: Partial<CompletionConfig> = {}) {
    this.messages = anthropic.messages;
    this.config = { ...DEFAULT_COMPLETION_CONFIG, ...config };
  }

  get model(): string {
    return this.config.model;
  }

  get modelParameters(): { temperature: number; maxTokens: number } {
    return {
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    };
  }

  async complete(prompt: string): Promise<Completion> {
    const response = await this.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      messages: [{ role: 'user', content: prompt }],
      stream: false,
    });

    const text = response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();

    if (!text) {
      throw new EmptyCompletionError(response.model);
    }

    return {
      text,
      model: response.model,
      usage: {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      },
    };
  }
}
