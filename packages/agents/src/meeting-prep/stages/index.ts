/**
 * Pipeline Stages
 *
 * @module meeting-prep/stages
 */

import { BriefingCompiler } from './briefing-compiler';
import { ContextAnalyzer } from './context-analyzer';
import { IndustryAnalyzer } from './industry-analyzer';
import { StrategyBuilder } from './strategy-builder';
import type { ResearchStageConfig, ResearchStageDependencies, Stage } from './types';

export * from './types';
export * from './prompts';
export { PromptStage, ResearchStage, SynthesisStage } from './base';
export { ContextAnalyzer, IndustryAnalyzer, StrategyBuilder, BriefingCompiler };

/**
 * The four stages in pipeline order
 */
export function createDefaultStages(
  deps: ResearchStageDependencies,
  config: Partial<ResearchStageConfig> = {}
): Stage[] {
  return [
    new ContextAnalyzer(deps, config),
    new IndustryAnalyzer(deps, config),
    new StrategyBuilder(deps),
    new BriefingCompiler(deps),
  ];
}
