/**
 * Meeting Briefing Pipeline
 *
 * Researches a company and its market with web search and a language model,
 * builds a meeting strategy and compiles a downloadable Markdown briefing.
 *
 * @module meeting-prep
 */

// ===========================================
// Public Contracts
// ===========================================

export * from './contracts';

// ===========================================
// Pipeline
// ===========================================

export {
  BriefingPipeline,
  TRACE_NAME,
  GENERATION_FAILED_MESSAGE,
  type BriefingPipelineDependencies,
  type PipelineResult,
  type PipelineInputResult,
  type GenerationFailure,
  type RunInProgressFailure,
  type InvalidRequestFailure,
  type StageFailureCause,
} from './pipeline';

export {
  createSession,
  beginRun,
  recordStageOutput,
  completeRun,
  failRun,
  resetSession,
  getSessionProgress,
  type MeetingSession,
  type SessionStatus,
  type SessionFailure,
  type SessionProgress,
} from './session';

export * from './stages';

// ===========================================
// Clients
// ===========================================

export {
  AnthropicCompletionClient,
  EmptyCompletionError,
  type Completion,
  type CompletionClient,
  type MessageResponse,
  type MessagesApi,
} from './clients/completion';

export {
  SerpApiSearchClient,
  SearchError,
  createSerpApiSearchClient,
  formatSerpApiResults,
  DEFAULT_SERPAPI_CONFIG,
  NO_RESULTS_TEXT,
  type SearchClient,
  type FetchFn,
  type SerpApiConfig,
  type SerpApiResponse,
} from './clients/web-search';

// ===========================================
// Configuration, Errors, Logging
// ===========================================

export {
  loadEnvConfig,
  ConfigError,
  DEFAULT_COMPLETION_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_PORT,
  DEFAULT_SESSION_TTL_MINUTES,
  DEFAULT_TRACE_PROJECT,
  type BriefingConfig,
  type CompletionConfig,
  type SearchConfig,
} from './config';

export { classifyError, type ClassifiedError, type ErrorSource } from './error-handler';

export {
  BriefingLogger,
  createLogger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
} from './logger';

export type * from './types';
