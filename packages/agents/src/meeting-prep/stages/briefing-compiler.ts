/**
 * Briefing Compiler
 *
 * @module meeting-prep/stages/briefing-compiler
 */

import { findStageText } from '../contracts/stage-output';
import { SynthesisStage } from './base';
import { buildBriefingPrompt } from './prompts';
import type { StageInput } from './types';

export class BriefingCompiler extends SynthesisStage {
  readonly name = 'briefing' as const;

  protected buildPrompt(input: StageInput): string {
    return buildBriefingPrompt(input.request, {
      context: findStageText(input.transcript, 'context'),
      industry: findStageText(input.transcript, 'industry'),
      strategy: findStageText(input.transcript, 'strategy'),
    });
  }
}
