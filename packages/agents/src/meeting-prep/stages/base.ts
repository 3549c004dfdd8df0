/**
 * Stage Base Classes
 *
 * PromptStage owns the single model call every stage makes. ResearchStage
 * adds one web search in front of it; SynthesisStage only templates text
 * produced by earlier stages.
 *
 * @module meeting-prep/stages/base
 */

import type { StageName } from '../contracts/stage-output';
import { DEFAULT_SEARCH_CONFIG } from '../config';
import { EmptyCompletionError } from '../clients/completion';
import type { SearchClient } from '../clients/web-search';
import { classifyError } from '../error-handler';
import { truncate } from '../utils';
import type {
  ResearchStageConfig,
  ResearchStageDependencies,
  Stage,
  StageDependencies,
  StageInput,
  StageResult,
} from './types';

// ===========================================
// Prompt Stage
// ===========================================

export abstract class PromptStage implements Stage {
  abstract readonly name: StageName;
  protected readonly deps: StageDependencies;

  constructor(deps: StageDependencies) {
    this.deps = deps;
  }

  abstract execute(input: StageInput): Promise<StageResult>;

  /**
   * Run one completion for the prompt, traced as a generation.
   * Failures come back as classified results, never thrown.
   */
  protected async generate(input: StageInput, prompt: string): Promise<StageResult> {
    const { model, tracer } = this.deps;

    try {
      const completion = await tracer.withGeneration(
        input.trace,
        {
          name: this.name,
          model: model.model,
          input: prompt,
          modelParameters: model.modelParameters,
          metadata: { stage: this.name },
        },
        () => model.complete(prompt)
      );

      const text = completion.text.trim();
      if (!text) {
        return {
          success: false,
          error: classifyError(new EmptyCompletionError(completion.model), 'model'),
        };
      }

      return {
        success: true,
        text,
        tokensUsed: completion.usage.input_tokens + completion.usage.output_tokens,
      };
    } catch (error) {
      return { success: false, error: classifyError(error, 'model') };
    }
  }
}

// ===========================================
// Research Stage
// ===========================================

export abstract class ResearchStage extends PromptStage {
  protected readonly search: SearchClient;
  protected readonly config: ResearchStageConfig;

  constructor(deps: ResearchStageDependencies, config: Partial<ResearchStageConfig> = {}) {
    super(deps);
    this.search = deps.search;
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
  }

  protected abstract buildQuery(input: StageInput): string;

  protected abstract buildPrompt(input: StageInput, searchResults: string): string;

  async execute(input: StageInput): Promise<StageResult> {
    const { tracer, logger } = this.deps;
    const query = this.buildQuery(input);
    const span = tracer.createSpan(input.trace, {
      name: `${this.name}_search`,
      input: { query, provider: this.search.provider },
    });

    let results: string;
    try {
      results = await this.search.search(query);
    } catch (error) {
      const classified = classifyError(error, 'search');
      tracer.endSpan(span, { level: 'ERROR', statusMessage: classified.message });
      return { success: false, error: classified };
    }

    // Plain cut, no ellipsis
    const searchText = truncate(results, this.config.maxResultChars, '');
    tracer.endSpan(span, {
      output: { chars: results.length, truncated: searchText.length < results.length },
    });
    logger.debug('Web search completed', {
      stage: this.name,
      query,
      result_chars: results.length,
    });

    return this.generate(input, this.buildPrompt(input, searchText));
  }
}

// ===========================================
// Synthesis Stage
// ===========================================

export abstract class SynthesisStage extends PromptStage {
  protected abstract buildPrompt(input: StageInput): string;

  async execute(input: StageInput): Promise<StageResult> {
    return this.generate(input, this.buildPrompt(input));
  }
}
