/**
 * Briefing Document Contract
 *
 * The final Markdown document assembled from the four stage outputs.
 * Layout is deterministic: identical requests and stage texts render
 * byte-identical documents.
 *
 * @module meeting-prep/contracts/briefing
 */

import { slugify } from '../utils';
import {
  NO_FOCUS_AREAS_TEXT,
  type Attendee,
  type MeetingRequest,
} from './meeting-request';
import { STAGE_ORDER, STAGE_TITLES, type StageOutput } from './stage-output';

// ===========================================
// Types
// ===========================================

export interface BriefingDocument {
  readonly company_name: string;
  readonly filename: string;
  readonly markdown: string;
  readonly stages: readonly StageOutput[];
  readonly created_at: string;
}

// ===========================================
// Formatting Helpers
// ===========================================

export function formatAttendee(attendee: Readonly<Attendee>): string {
  return attendee.role ? `${attendee.name} (${attendee.role})` : attendee.name;
}

export function formatAttendees(attendees: readonly Readonly<Attendee>[]): string {
  return attendees.map(formatAttendee).join(', ');
}

export function formatFocusAreas(focusAreas: readonly string[]): string {
  return focusAreas.length > 0 ? focusAreas.join(', ') : NO_FOCUS_AREAS_TEXT;
}

/**
 * Download filename for a company, e.g. `briefing_acme_corp.md`.
 */
export function briefingFilename(companyName: string): string {
  const slug = slugify(companyName);
  return slug ? `briefing_${slug}.md` : 'briefing.md';
}

// ===========================================
// Rendering
// ===========================================

/**
 * Render the briefing Markdown.
 *
 * Expects `stages` in pipeline order; see {@link createBriefingDocument}.
 */
export function renderBriefingMarkdown(
  request: MeetingRequest,
  stages: readonly StageOutput[]
): string {
  const last = stages[stages.length - 1];

  const lines: string[] = [
    `# Meeting Briefing: ${request.company_name}`,
    '',
    `- **Objective:** ${request.objective}`,
    `- **Attendees:** ${formatAttendees(request.attendees)}`,
    `- **Duration:** ${request.duration_minutes} minutes`,
    `- **Focus Areas:** ${formatFocusAreas(request.focus_areas)}`,
  ];

  if (request.industry) {
    lines.push(`- **Industry:** ${request.industry}`);
  }
  if (last) {
    lines.push(`- **Prepared:** ${last.generated_at}`);
  }

  lines.push('', '---');

  for (const output of stages) {
    lines.push('', `## ${STAGE_TITLES[output.stage]}`, '', output.text);
  }

  return lines.join('\n') + '\n';
}

/**
 * Build the frozen briefing document from a complete transcript.
 *
 * @throws Error when the transcript is not exactly one output per stage in order
 */
export function createBriefingDocument(
  request: MeetingRequest,
  stages: readonly StageOutput[],
  createdAt: string
): BriefingDocument {
  const names = stages.map((output) => output.stage);
  if (names.length !== STAGE_ORDER.length || names.some((name, i) => name !== STAGE_ORDER[i])) {
    throw new Error(
      `Briefing needs stages ${STAGE_ORDER.join(', ')}; got ${names.join(', ') || 'none'}`
    );
  }

  const frozenStages = Object.freeze(stages.map((output) => Object.freeze({ ...output })));

  return Object.freeze({
    company_name: request.company_name,
    filename: briefingFilename(request.company_name),
    markdown: renderBriefingMarkdown(request, frozenStages),
    stages: frozenStages,
    created_at: createdAt,
  });
}
