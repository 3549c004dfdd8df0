/**
 * Stage Output Contract
 *
 * One entry of the session transcript: the text a pipeline stage produced
 * and when it was produced.
 *
 * @module meeting-prep/contracts/stage-output
 */

import { z } from 'zod';

// ===========================================
// Stage Names
// ===========================================

export const StageNameSchema = z.enum(['context', 'industry', 'strategy', 'briefing']);

export type StageName = z.infer<typeof StageNameSchema>;

/** Fixed execution order of the pipeline */
export const STAGE_ORDER: readonly StageName[] = StageNameSchema.options;

/** Section heading each stage's text is filed under in the briefing */
export const STAGE_TITLES: Record<StageName, string> = {
  context: 'Company Context',
  industry: 'Industry Analysis',
  strategy: 'Meeting Strategy',
  briefing: 'Executive Briefing',
};

// ===========================================
// Stage Output Schema
// ===========================================

export const StageOutputSchema = z.object({
  stage: StageNameSchema,
  text: z.string().min(1),
  generated_at: z.string().datetime({ offset: true }),
});

export type StageOutput = Readonly<z.infer<typeof StageOutputSchema>>;

/**
 * Text produced by a stage, if it is in the transcript.
 */
export function findStageText(
  transcript: readonly StageOutput[],
  stage: StageName
): string | undefined {
  return transcript.find((output) => output.stage === stage)?.text;
}
