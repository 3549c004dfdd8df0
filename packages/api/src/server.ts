/**
 * Briefing API - Server Entry Point
 *
 * Loads configuration, builds the model, search and tracing clients once
 * and serves the Hono app on Node.
 *
 * Usage:
 *   npm start
 *
 * Required environment variables:
 *   ANTHROPIC_API_KEY   - Anthropic API key
 *   SERPAPI_API_KEY     - SerpAPI key
 */
import 'dotenv/config';
import Anthropic from '@anthropic-ai/sdk';
import { serve } from '@hono/node-server';
import { createTracer } from '@meeting-briefing/lib';
import {
  AnthropicCompletionClient,
  BriefingPipeline,
  ConfigError,
  createDefaultStages,
  createLogger,
  createSerpApiSearchClient,
  loadEnvConfig,
} from '@meeting-briefing/agents';
import { createApp } from './index';
import { createSessionStore } from './services/session-store';

// ===========================================
// Main Entry Point
// ===========================================

function main(): void {
  const config = loadEnvConfig();
  const logger = createLogger({
    level: config.logging.level,
    format: config.logging.format,
    metadata: { service: 'briefing-api' },
  });

  // Clients are built once and injected
  const model = new AnthropicCompletionClient(
    new Anthropic({ apiKey: config.anthropicApiKey }),
    config.completion
  );
  const search = createSerpApiSearchClient(config.serpApiKey);
  const tracer = createTracer(config.tracing);

  const pipeline = new BriefingPipeline({
    stages: createDefaultStages({ model, search, tracer, logger }, config.search),
    tracer,
    logger,
  });

  const app = createApp({
    pipeline,
    sessions: createSessionStore({ ttlMinutes: config.server.sessionTtlMinutes }),
    logger,
    model,
    search,
    tracer,
    exposeInternalErrors: config.tracing.environment === 'development',
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    logger.info('server_started', {
      port: info.port,
      model: model.model,
      search: search.provider,
      tracing: tracer.enabled,
    });
  });

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('server_stopping');
    server.close();
    await tracer.shutdown();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error('shutdown_failed', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`Failed to start Briefing API:\n  - ${error.problems.join('\n  - ')}`);
  } else {
    console.error('Failed to start Briefing API:', error);
  }
  process.exit(1);
}
