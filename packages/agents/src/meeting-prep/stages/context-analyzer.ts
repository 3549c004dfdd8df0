/**
 * Context Analyzer
 *
 * Researches recent company news, products and services and relates
 * them to the meeting objective.
 *
 * @module meeting-prep/stages/context-analyzer
 */

import { ResearchStage } from './base';
import { buildContextPrompt, buildContextQuery } from './prompts';
import type { StageInput } from './types';

export class ContextAnalyzer extends ResearchStage {
  readonly name = 'context' as const;

  protected buildQuery(input: StageInput): string {
    return buildContextQuery(input.request, input.now);
  }

  protected buildPrompt(input: StageInput, searchResults: string): string {
    return buildContextPrompt(input.request, searchResults);
  }
}
