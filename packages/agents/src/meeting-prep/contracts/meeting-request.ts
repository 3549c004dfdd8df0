/**
 * Meeting Request Contract
 *
 * Defines the schema for the form a user fills in before a meeting:
 * company, objective, attendees, duration and optional focus areas.
 * Attendees and focus areas are accepted either as structured arrays
 * or as the free text typed into the form.
 *
 * @module meeting-prep/contracts/meeting-request
 */

import { z } from 'zod';
import { uniqueCaseInsensitive } from '../utils';

// ===========================================
// Constants
// ===========================================

export const DURATION_LIMITS = {
  min: 5,
  max: 480,
  default: 60,
} as const;

export const NO_FOCUS_AREAS_TEXT = 'No specific focus areas defined';

// ===========================================
// Attendee Schema
// ===========================================

export const AttendeeSchema = z.object({
  name: z.string().trim().min(1, 'Attendee name is required'),
  role: z.string().trim().default(''),
});

export type Attendee = z.infer<typeof AttendeeSchema>;

const BULLET_PATTERN = /^[•\-*]\s*/;
// A dash wins over a comma, so "Doe, Jane - CFO" keeps the comma in the name
const DASH_SEPARATORS = [' - ', ' – '] as const;
const COMMA_SEPARATORS = [', '] as const;

function findSeparator(
  text: string,
  separators: readonly string[]
): { index: number; length: number } | null {
  let found: { index: number; length: number } | null = null;
  for (const separator of separators) {
    const index = text.indexOf(separator);
    if (index !== -1 && (found === null || index < found.index)) {
      found = { index, length: separator.length };
    }
  }
  return found;
}

/**
 * Parse one free-text attendee line such as `• Jane Doe - CFO`.
 *
 * @returns null for blank lines
 */
export function parseAttendeeLine(line: string): Attendee | null {
  const cleaned = line.trim().replace(BULLET_PATTERN, '').trim();
  if (!cleaned) {
    return null;
  }

  const split =
    findSeparator(cleaned, DASH_SEPARATORS) ?? findSeparator(cleaned, COMMA_SEPARATORS);

  if (!split) {
    return { name: cleaned, role: '' };
  }

  const name = cleaned.slice(0, split.index).trim();
  const role = cleaned.slice(split.index + split.length).trim();

  // "- CFO" with no name keeps the whole line as the name
  if (!name) {
    return { name: cleaned, role: '' };
  }

  return { name, role };
}

/**
 * Parse the attendee text area, one attendee per line.
 */
export function parseAttendeeList(text: string): Attendee[] {
  const attendees: Attendee[] = [];
  for (const line of text.split(/\r?\n/)) {
    const attendee = parseAttendeeLine(line);
    if (attendee) {
      attendees.push(attendee);
    }
  }
  return attendees;
}

// ===========================================
// Focus Areas
// ===========================================

/**
 * Trim, drop empties and de-duplicate focus areas case-insensitively,
 * keeping the first spelling and first-seen order.
 */
export function normalizeFocusAreas(values: readonly string[]): string[] {
  const trimmed = values.map((value) => value.trim()).filter((value) => value.length > 0);
  return uniqueCaseInsensitive(trimmed);
}

function splitFocusAreas(value: unknown): unknown {
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === 'string') {
    return value.split(',');
  }
  return value;
}

// ===========================================
// Meeting Request Schema
// ===========================================

export const MeetingRequestSchema = z.object({
  company_name: z
    .string({ required_error: 'Company name is required' })
    .trim()
    .min(1, 'Company name is required')
    .pipe(z.string().min(2, 'Company name must be at least 2 characters')),

  objective: z
    .string({ required_error: 'Meeting objective is required' })
    .trim()
    .min(1, 'Meeting objective is required'),

  attendees: z.preprocess(
    (value) => value ?? '',
    z
      .union([z.string().transform(parseAttendeeList), z.array(AttendeeSchema)])
      .pipe(z.array(AttendeeSchema).min(1, 'At least one attendee is required'))
  ),

  duration_minutes: z.coerce
    .number()
    .int('Duration must be a whole number of minutes')
    .min(DURATION_LIMITS.min, `Duration must be at least ${DURATION_LIMITS.min} minutes`)
    .max(DURATION_LIMITS.max, `Duration must be at most ${DURATION_LIMITS.max} minutes`)
    .default(DURATION_LIMITS.default),

  focus_areas: z.preprocess(splitFocusAreas, z.array(z.string())).transform(normalizeFocusAreas),

  industry: z.preprocess(
    (value) => value ?? undefined,
    z
      .string()
      .trim()
      .optional()
      .transform((value) => (value ? value : undefined))
  ),
});

export type MeetingRequestInput = z.input<typeof MeetingRequestSchema>;
export type MeetingRequestData = z.output<typeof MeetingRequestSchema>;

/**
 * A validated meeting request. Frozen once validated.
 */
export interface MeetingRequest {
  readonly company_name: string;
  readonly objective: string;
  readonly attendees: readonly Readonly<Attendee>[];
  readonly duration_minutes: number;
  readonly focus_areas: readonly string[];
  readonly industry?: string;
}

// ===========================================
// Validation
// ===========================================

export interface ValidationIssue {
  field: string;
  message: string;
}

export type ValidateMeetingRequestResult =
  | { success: true; request: MeetingRequest }
  | { success: false; error: string; issues: ValidationIssue[] };

/**
 * Convert zod issues to field/message pairs
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'request',
    message: issue.message,
  }));
}

/**
 * Validate raw form input into a frozen MeetingRequest.
 */
export function validateMeetingRequest(input: unknown): ValidateMeetingRequestResult {
  const parsed = MeetingRequestSchema.safeParse(input);

  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    return {
      success: false,
      error: issues[0]?.message ?? 'Invalid meeting request',
      issues,
    };
  }

  return { success: true, request: toMeetingRequest(parsed.data) };
}

/**
 * Freeze schema output into a MeetingRequest
 */
export function toMeetingRequest(data: MeetingRequestData): MeetingRequest {
  const request: MeetingRequest = {
    company_name: data.company_name,
    objective: data.objective,
    attendees: Object.freeze(data.attendees.map((attendee) => Object.freeze({ ...attendee }))),
    duration_minutes: data.duration_minutes,
    focus_areas: Object.freeze([...data.focus_areas]),
    ...(data.industry ? { industry: data.industry } : {}),
  };
  return Object.freeze(request);
}
