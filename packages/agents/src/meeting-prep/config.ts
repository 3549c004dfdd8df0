/**
 * Meeting Briefing - Configuration
 *
 * Reads the process environment once into an explicit BriefingConfig that
 * the server entry point passes to every component.
 *
 * Required environment variables:
 *   ANTHROPIC_API_KEY   - Anthropic API key for the completion model
 *   SERPAPI_API_KEY     - SerpAPI key for web search
 *
 * @module meeting-prep/config
 */

import {
  DEFAULT_LANGFUSE_BASE_URL,
  LANGFUSE_ENV_VARS,
  resolveEnvironment,
  type TracingConfig,
} from '@meeting-briefing/lib';
import type { LogFormat, LogLevel } from './logger';

// ===========================================
// Types
// ===========================================

export interface CompletionConfig {
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface SearchConfig {
  /** Search text is cut to this many characters before prompting */
  maxResultChars: number;
}

export interface BriefingConfig {
  anthropicApiKey: string;
  serpApiKey: string;
  completion: CompletionConfig;
  search: SearchConfig;
  tracing: TracingConfig;
  server: {
    port: number;
    sessionTtlMinutes: number;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

// ===========================================
// Defaults
// ===========================================

export const DEFAULT_COMPLETION_CONFIG: CompletionConfig = {
  model: 'claude-sonnet-4-20250514',
  maxTokens: 2000,
  temperature: 0.7,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxResultChars: 3000,
};

export const DEFAULT_PORT = 3005;
export const DEFAULT_SESSION_TTL_MINUTES = 60;
export const DEFAULT_TRACE_PROJECT = 'meeting-briefing';

const REQUIRED_VARS = ['ANTHROPIC_API_KEY', 'SERPAPI_API_KEY'] as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

// ===========================================
// Errors
// ===========================================

/**
 * Thrown when the environment is missing or has invalid settings.
 * Lists every problem found, not just the first.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

// ===========================================
// Parsers
// ===========================================

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(
  env: Env,
  key: string,
  fallback: number,
  range: { min: number; max: number },
  problems: string[]
): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    problems.push(`${key} must be an integer between ${range.min} and ${range.max}`);
    return fallback;
  }
  return value;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  range: { min: number; max: number },
  problems: string[]
): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    problems.push(`${key} must be a number between ${range.min} and ${range.max}`);
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, key: string, problems: string[]): boolean | undefined {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  problems.push(`${key} must be true or false`);
  return undefined;
}

function readChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T,
  problems: string[]
): T {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;

  const match = choices.find((choice) => choice === raw);
  if (!match) {
    problems.push(`${key} must be one of ${choices.join(', ')}`);
    return fallback;
  }
  return match;
}

// ===========================================
// Loader
// ===========================================

/**
 * Load configuration from environment variables.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadEnvConfig(env: Env = process.env): BriefingConfig {
  const problems: string[] = [];

  const missing = REQUIRED_VARS.filter((key) => !readString(env, key));
  if (missing.length > 0) {
    problems.push(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const publicKey = readString(env, LANGFUSE_ENV_VARS.publicKey);
  const secretKey = readString(env, LANGFUSE_ENV_VARS.secretKey);
  const tracingToggle = readBoolean(env, 'TRACING_ENABLED', problems);

  const config: BriefingConfig = {
    anthropicApiKey: readString(env, 'ANTHROPIC_API_KEY') ?? '',
    serpApiKey: readString(env, 'SERPAPI_API_KEY') ?? '',
    completion: {
      model: readString(env, 'BRIEFING_MODEL') ?? DEFAULT_COMPLETION_CONFIG.model,
      maxTokens: readInteger(
        env,
        'BRIEFING_MAX_TOKENS',
        DEFAULT_COMPLETION_CONFIG.maxTokens,
        { min: 1, max: 64000 },
        problems
      ),
      temperature: readNumber(
        env,
        'BRIEFING_TEMPERATURE',
        DEFAULT_COMPLETION_CONFIG.temperature,
        { min: 0, max: 1 },
        problems
      ),
    },
    search: {
      maxResultChars: readInteger(
        env,
        'SEARCH_RESULT_CHARS',
        DEFAULT_SEARCH_CONFIG.maxResultChars,
        { min: 100, max: 100000 },
        problems
      ),
    },
    tracing: {
      enabled: tracingToggle ?? Boolean(publicKey && secretKey),
      publicKey,
      secretKey,
      baseUrl: readString(env, LANGFUSE_ENV_VARS.baseUrl) ?? DEFAULT_LANGFUSE_BASE_URL,
      project: readString(env, 'TRACE_PROJECT') ?? DEFAULT_TRACE_PROJECT,
      environment: resolveEnvironment(readString(env, 'NODE_ENV')),
    },
    server: {
      port: readInteger(env, 'PORT', DEFAULT_PORT, { min: 1, max: 65535 }, problems),
      sessionTtlMinutes: readInteger(
        env,
        'SESSION_TTL_MINUTES',
        DEFAULT_SESSION_TTL_MINUTES,
        { min: 1, max: 24 * 60 },
        problems
      ),
    },
    logging: {
      level: readChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info', problems),
      format: readChoice(env, 'LOG_FORMAT', LOG_FORMATS, 'json', problems),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}
