/**
 * Web Search Client
 *
 * SerpAPI-backed search that returns the result page as a block of
 * plain text ready to paste into a prompt.
 *
 * @module meeting-prep/clients/web-search
 */

import { z } from 'zod';

// ===========================================
// Types
// ===========================================

export interface SearchClient {
  /** Provider name reported by the status route */
  readonly provider: string;
  search(query: string): Promise<string>;
}

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface SerpApiConfig {
  apiKey: string;
  baseUrl: string;
  engine: string;
  /** Organic results kept from the response */
  maxResults: number;
}

export const DEFAULT_SERPAPI_CONFIG: Omit<SerpApiConfig, 'apiKey'> = {
  baseUrl: 'https://serpapi.com/search.json',
  engine: 'google',
  maxResults: 10,
};

export const NO_RESULTS_TEXT = 'No good search result found';

// ===========================================
// Errors
// ===========================================

export class SearchError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'SearchError';
    this.status = status;
  }
}

// ===========================================
// Response Schema
// ===========================================

const SerpApiResponseSchema = z
  .object({
    error: z.string().optional(),
    answer_box: z
      .object({
        answer: z.string().optional(),
        snippet: z.string().optional(),
        snippet_highlighted_words: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
    knowledge_graph: z
      .object({
        description: z.string().optional(),
      })
      .passthrough()
      .optional(),
    organic_results: z
      .array(
        z
          .object({
            title: z.string().optional(),
            snippet: z.string().optional(),
            link: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export type SerpApiResponse = z.infer<typeof SerpApiResponseSchema>;

/**
 * Flatten a SerpAPI response into prompt text.
 *
 * Answer box first, then the knowledge graph description, then one
 * `title: snippet (link)` line per organic result.
 */
export function formatSerpApiResults(response: SerpApiResponse, maxResults = 10): string {
  const lines: string[] = [];

  const answerBox = response.answer_box;
  if (answerBox) {
    const answer =
      answerBox.answer ?? answerBox.snippet ?? answerBox.snippet_highlighted_words?.[0];
    if (answer) {
      lines.push(answer);
    }
  }

  const description = response.knowledge_graph?.description;
  if (description) {
    lines.push(description);
  }

  for (const result of (response.organic_results ?? []).slice(0, maxResults)) {
    const parts: string[] = [];
    if (result.title) parts.push(result.snippet ? `${result.title}:` : result.title);
    if (result.snippet) parts.push(result.snippet);
    if (result.link) parts.push(`(${result.link})`);
    if (parts.length > 0) {
      lines.push(parts.join(' '));
    }
  }

  return lines.length > 0 ? lines.join('\n') : NO_RESULTS_TEXT;
}

// ===========================================
// SerpAPI Client
// ===========================================

export class SerpApiSearchClient implements SearchClient {
  readonly provider = 'serpapi';
  private readonly config: SerpApiConfig;
  private readonly fetchFn: FetchFn;

  constructor(
    config: Pick<SerpApiConfig, 'apiKey'> & Partial<SerpApiConfig>,
    deps: { fetch?: FetchFn } = {}
  ) {
    this.config = { ...DEFAULT_SERPAPI_CONFIG, ...config };
    this.fetchFn = deps.fetch ?? fetch;
  }

  async search(query: string): Promise<string> {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('engine', this.config.engine);
    url.searchParams.set('q', query);
    url.searchParams.set('api_key', this.config.apiKey);

    const response = await this.fetchFn(url);

    if (!response.ok) {
      const body = await response.text();
      throw new SearchError(`SerpAPI error: ${response.status} - ${body}`, response.status);
    }

    const parsed = SerpApiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SearchError(`SerpAPI returned an unexpected response: ${parsed.error.message}`);
    }
    if (parsed.data.error) {
      throw new SearchError(`SerpAPI error: ${parsed.data.error}`, response.status);
    }

    return formatSerpApiResults(parsed.data, this.config.maxResults);
  }
}

export function createSerpApiSearchClient(
  apiKey: string,
  deps: { fetch?: FetchFn } = {}
): SerpApiSearchClient {
  return new SerpApiSearchClient({ apiKey }, deps);
}
