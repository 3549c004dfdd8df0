/**
 * Meeting Briefing Contracts
 *
 * @module meeting-prep/contracts
 */

export * from './meeting-request';
export * from './stage-output';
export * from './briefing';
export * from './errors';
