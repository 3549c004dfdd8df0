/**
 * Meeting Request Contract Tests
 */

import { describe, test, expect } from 'vitest';
import {
  normalizeFocusAreas,
  parseAttendeeLine,
  parseAttendeeList,
  validateMeetingRequest,
} from '../../meeting-prep/contracts';
import { createRequestInput } from './fixtures';

describe('parseAttendeeLine', () => {
  test('strips bullets and splits name from role', () => {
    expect(parseAttendeeLine('• Jane Doe - CFO')).toEqual({ name: 'Jane Doe', role: 'CFO' });
    expect(parseAttendeeLine('- John Roe, Head of Sales')).toEqual({
      name: 'John Roe',
      role: 'Head of Sales',
    });
    expect(parseAttendeeLine('* Ana Lima – CTO')).toEqual({ name: 'Ana Lima', role: 'CTO' });
  });

  test('splits on the first separator only', () => {
    expect(parseAttendeeLine('Jane Doe - VP, Finance - EMEA')).toEqual({
      name: 'Jane Doe',
      role: 'VP, Finance - EMEA',
    });
  });

  test('prefers a dash over a comma', () => {
    expect(parseAttendeeLine('Doe, Jane - CFO')).toEqual({ name: 'Doe, Jane', role: 'CFO' });
  });

  test('keeps a line without a separator as the name', () => {
    expect(parseAttendeeLine('Jane Doe')).toEqual({ name: 'Jane Doe', role: '' });
  });

  test('returns null for blank lines', () => {
    expect(parseAttendeeLine('   ')).toBeNull();
    expect(parseAttendeeLine('•')).toBeNull();
  });
});

describe('parseAttendeeList', () => {
  test('parses one attendee per line and skips blanks', () => {
    expect(parseAttendeeList('• Jane Doe - CFO\n\n• John Roe\r\n')).toEqual([
      { name: 'Jane Doe', role: 'CFO' },
      { name: 'John Roe', role: '' },
    ]);
  });
});

describe('normalizeFocusAreas', () => {
  test('trims, drops empties and de-duplicates case-insensitively', () => {
    expect(normalizeFocusAreas([' Pricing', 'timeline', '', 'pricing ', 'Timeline', 'Security'])).toEqual([
      'Pricing',
      'timeline',
      'Security',
    ]);
  });
});

describe('validateMeetingRequest', () => {
  test('accepts a well-formed request and freezes it', () => {
    const result = validateMeetingRequest(createRequestInput({ company_name: '  Acme Corp  ' }));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.request.company_name).toBe('Acme Corp');
    expect(result.request.duration_minutes).toBe(60);
    expect(Object.isFrozen(result.request)).toBe(true);
    expect(Object.isFrozen(result.request.attendees)).toBe(true);
  });

  test('accepts free-text attendees and comma-separated focus areas', () => {
    const result = validateMeetingRequest({
      company_name: 'Acme Corp',
      objective: 'Negotiate renewal',
      attendees: '• Jane Doe - CFO\n• John Roe',
      focus_areas: 'pricing, Timeline, PRICING, ',
      duration_minutes: '90',
      industry: 'Logistics',
    });

    expect(result).toEqual({
      success: true,
      request: {
        company_name: 'Acme Corp',
        objective: 'Negotiate renewal',
        attendees: [
          { name: 'Jane Doe', role: 'CFO' },
          { name: 'John Roe', role: '' },
        ],
        duration_minutes: 90,
        focus_areas: ['pricing', 'Timeline'],
        industry: 'Logistics',
      },
    });
  });

  test('defaults the duration to 60 minutes and drops a blank industry', () => {
    const { duration_minutes: _omit, ...input } = createRequestInput();
    const result = validateMeetingRequest({ ...input, industry: '  ' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.request.duration_minutes).toBe(60);
    expect('industry' in result.request).toBe(false);
  });

  test('treats a null industry as not set', () => {
    const result = validateMeetingRequest({ ...createRequestInput(), industry: null });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect('industry' in result.request).toBe(false);
  });

  test('requires a company name of at least 2 characters', () => {
    const result = validateMeetingRequest(createRequestInput({ company_name: 'A' }));

    expect(result).toEqual({
      success: false,
      error: 'Company name must be at least 2 characters',
      issues: [{ field: 'company_name', message: 'Company name must be at least 2 characters' }],
    });
  });

  test('requires an objective', () => {
    const result = validateMeetingRequest(createRequestInput({ objective: ' ' }));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([{ field: 'objective', message: 'Meeting objective is required' }]);
  });

  test('requires at least one attendee', () => {
    const result = validateMeetingRequest(createRequestInput({ attendees: '\n  \n' }));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      { field: 'attendees', message: 'At least one attendee is required' },
    ]);
  });

  test('rejects a duration outside 5 to 480 minutes', () => {
    const result = validateMeetingRequest(createRequestInput({ duration_minutes: 600 }));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      { field: 'duration_minutes', message: 'Duration must be at most 480 minutes' },
    ]);
  });

  test('reports every invalid field', () => {
    const result = validateMeetingRequest({});

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues.map((issue) => issue.field)).toEqual([
      'company_name',
      'objective',
      'attendees',
    ]);
    expect(result.error).toBe('Company name is required');
  });
});
