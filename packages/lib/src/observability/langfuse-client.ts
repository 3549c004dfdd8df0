/**
 * Langfuse Client
 *
 * Builds a Langfuse client from explicit configuration and handles
 * flushing and shutdown. The caller owns the returned instance.
 */

import { Langfuse } from 'langfuse';
import type { TracingConfig } from './types';

/**
 * Create a Langfuse client
 *
 * @returns The client, or null when tracing is disabled or keys are missing
 */
export function createLangfuseClient(config: TracingConfig): Langfuse | null {
  if (!config.enabled) {
    console.info('[Langfuse] Observability disabled via configuration.');
    return null;
  }

  if (!config.publicKey || !config.secretKey) {
    console.warn(
      '[Langfuse] Missing credentials. Set LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY environment variables.'
    );
    return null;
  }

  const client = new Langfuse({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
    flushAt: config.flushAt ?? 15,
    flushInterval: config.flushInterval ?? 10000,
    requestTimeout: config.requestTimeout ?? 10000,
  });

  console.info('[Langfuse] Client initialized successfully.');
  return client;
}

/**
 * Flush all pending events to Langfuse
 *
 * Call this before process exit to ensure all traces are sent.
 */
export async function flushLangfuse(client: Langfuse | null): Promise<void> {
  if (!client) return;

  try {
    await client.flushAsync();
    console.info('[Langfuse] Flushed all pending events.');
  } catch (error) {
    console.error('[Langfuse] Failed to flush events:', error);
  }
}

/**
 * Shutdown the Langfuse client, flushing pending events first
 */
export async function shutdownLangfuse(client: Langfuse | null): Promise<void> {
  if (!client) return;

  try {
    await client.shutdownAsync();
    console.info('[Langfuse] Client shutdown complete.');
  } catch (error) {
    console.error('[Langfuse] Failed to shutdown client:', error);
  }
}
