/**
 * Meeting Briefing - Structured Logger
 *
 * Structured JSON logging for the briefing pipeline.
 * Events: briefing_requested, stage_completed, stage_failed,
 * briefing_compiled, briefing_failed.
 *
 * @module meeting-prep/logger
 */

import type {
  LogEvent,
  BriefingRequestedEvent,
  StageCompletedEvent,
  StageFailedEvent,
  BriefingCompiledEvent,
  BriefingFailedEvent,
} from './types';
import type { StageName } from './contracts/stage-output';

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Output format */
  format: LogFormat;

  /** Include stack traces in errors */
  includeStack: boolean;

  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
  includeStack: true,
};

// ===========================================
// Log Level Utilities
// ===========================================

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

function shouldLog(currentLevel: LogLevel, targetLevel: LogLevel): boolean {
  return LOG_LEVELS[currentLevel] <= LOG_LEVELS[targetLevel];
}

function write(level: LogLevel, line: string, ...extra: unknown[]): void {
  switch (level) {
    case 'debug':
      console.debug(line, ...extra);
      break;
    case 'info':
      console.log(line, ...extra);
      break;
    case 'warn':
      console.warn(line, ...extra);
      break;
    case 'error':
      console.error(line, ...extra);
      break;
  }
}

// ===========================================
// Logger Class
// ===========================================

export class BriefingLogger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Logger that adds fixed fields to every entry
   */
  child(metadata: Record<string, unknown>): BriefingLogger {
    return new BriefingLogger({
      ...this.config,
      metadata: { ...this.config.metadata, ...metadata },
    });
  }

  // ===========================================
  // Core Logging Methods
  // ===========================================

  private formatOutput(event: LogEvent): string {
    const enriched = { ...event, ...this.config.metadata };

    if (this.config.format === 'json') {
      return JSON.stringify(enriched);
    }

    const { event: eventType, timestamp, session_id, company_name, ...rest } = enriched;
    const time = new Date(timestamp).toISOString().split('T')[1];
    return `[${time}] ${eventType.toUpperCase()} session=${session_id} company="${company_name}" ${JSON.stringify(rest)}`;
  }

  private output(level: LogLevel, event: LogEvent): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }
    write(level, this.formatOutput(event));
  }

  // ===========================================
  // Event Logging Methods
  // ===========================================

  /**
   * Log briefing_requested event
   */
  briefingRequested(params: {
    session_id: string;
    company_name: string;
    attendee_count: number;
    duration_minutes: number;
    focus_area_count: number;
  }): void {
    const event: BriefingRequestedEvent = {
      event: 'briefing_requested',
      timestamp: new Date().toISOString(),
      ...params,
    };

    this.output('info', event);
  }

  /**
   * Log stage_completed event
   */
  stageCompleted(params: {
    session_id: string;
    company_name: string;
    stage: StageName;
    stage_index: number;
    output_chars: number;
    tokens_used: number;
    duration_ms: number;
  }): void {
    const event: StageCompletedEvent = {
      event: 'stage_completed',
      timestamp: new Date().toISOString(),
      ...params,
    };

    this.output('info', event);
  }

  /**
   * Log stage_failed event
   */
  stageFailed(params: {
    session_id: string;
    company_name: string;
    stage: StageName;
    stage_index: number;
    error_code: string;
    error_message: string;
    duration_ms: number;
  }): void {
    const event: StageFailedEvent = {
      event: 'stage_failed',
      timestamp: new Date().toISOString(),
      ...params,
    };

    this.output('warn', event);
  }

  /**
   * Log briefing_compiled event
   */
  briefingCompiled(params: {
    session_id: string;
    company_name: string;
    filename: string;
    markdown_chars: number;
    total_processing_ms: number;
  }): void {
    const event: BriefingCompiledEvent = {
      event: 'briefing_compiled',
      timestamp: new Date().toISOString(),
      ...params,
    };

    this.output('info', event);
  }

  /**
   * Log briefing_failed event
   */
  briefingFailed(params: {
    session_id: string;
    company_name: string;
    failed_stage: StageName;
    error_code: string;
    error_message: string;
    total_processing_ms: number;
  }): void {
    const event: BriefingFailedEvent = {
      event: 'briefing_failed',
      timestamp: new Date().toISOString(),
      ...params,
    };

    this.output('error', event);
  }

  // ===========================================
  // Convenience Methods
  // ===========================================

  private message(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!shouldLog(this.config.level, level)) return;

    if (this.config.format === 'json') {
      write(
        level,
        JSON.stringify({
          level,
          message,
          timestamp: new Date().toISOString(),
          ...this.config.metadata,
          ...context,
        })
      );
    } else {
      write(level, `[${level.toUpperCase()}] ${message}`, context ?? '');
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.message('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.message('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.message('warn', message, context);
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const details: Record<string, unknown> = { ...context };

    if (error instanceof Error) {
      details.error_name = error.name;
      details.error_message = error.message;
      if (this.config.includeStack) {
        details.stack = error.stack;
      }
    } else if (error !== undefined) {
      details.error = String(error);
    }

    this.message('error', message, details);
  }

  // ===========================================
  // Metrics Helpers
  // ===========================================

  /**
   * Create a timer for measuring durations
   */
  startTimer(): () => number {
    const start = performance.now();
    return () => Math.round(performance.now() - start);
  }
}

// ===========================================
// Factory
// ===========================================

export function createLogger(config: Partial<LoggerConfig> = {}): BriefingLogger {
  return new BriefingLogger(config);
}

