/**
 * Industry Analyzer
 *
 * Researches the company's market: sector overview, trends, competitors,
 * opportunities and threats.
 *
 * @module meeting-prep/stages/industry-analyzer
 */

import { ResearchStage } from './base';
import { buildIndustryPrompt, buildIndustryQuery } from './prompts';
import type { StageInput } from './types';

export class IndustryAnalyzer extends ResearchStage {
  readonly name = 'industry' as const;

  protected buildQuery(input: StageInput): string {
    return buildIndustryQuery(input.request);
  }

  protected buildPrompt(input: StageInput, searchResults: string): string {
    return buildIndustryPrompt(input.request, searchResults);
  }
}
