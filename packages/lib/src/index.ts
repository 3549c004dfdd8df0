/**
 * Meeting Briefing Library
 *
 * Shared types and observability for the meeting briefing packages.
 */

// Types
export * from './types';

// Observability (Langfuse integration)
export * from './observability';
