/**
 * Strategy Builder
 *
 * Turns both analyses into a timed agenda, talking points, questions
 * and next steps.
 *
 * @module meeting-prep/stages/strategy-builder
 */

import { findStageText } from '../contracts/stage-output';
import { SynthesisStage } from './base';
import { buildStrategyPrompt } from './prompts';
import type { StageInput } from './types';

export class StrategyBuilder extends SynthesisStage {
  readonly name = 'strategy' as const;

  protected buildPrompt(input: StageInput): string {
    return buildStrategyPrompt(input.request, {
      context: findStageText(input.transcript, 'context'),
      industry: findStageText(input.transcript, 'industry'),
    });
  }
}
