/**
 * Shared Types for the Meeting Briefing service
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// Identifiers
// ===========================================

/** Unique identifier for a browser session */
export type SessionId = string & { readonly __brand: 'SessionId' };

/** Brand a raw string as a session identifier */
export function toSessionId(value: string): SessionId {
  return value as SessionId;
}

// ===========================================
// Runtime Environment
// ===========================================

/** Deployment environment reported to tracing */
export type Environment = 'development' | 'staging' | 'production';

export function resolveEnvironment(value: string | undefined): Environment {
  if (value === 'production' || value === 'staging') {
    return value;
  }
  return 'development';
}
