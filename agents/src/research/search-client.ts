/**
 * Perplexity-style research search over the chat completions API.
 * Reports `unavailable` instead of throwing, so callers can fall back.
 */

import { z } from 'zod';
import { createTimeoutSignal } from '@exitready/llm';
import type { Citation, ResearchClient, SearchOutcome } from './types.js';

const PERPLEXITY_BASE = 'https://api.perplexity.ai';
const DEFAULT_MODEL = process.env.PERPLEXITY_MODEL ?? 'sonar';
export const DEFAULT_RESEARCH_TIMEOUT_MS = Number(process.env.RESEARCH_TIMEOUT_MS) || 30_000;

const RESEARCH_SYSTEM_PROMPT =
  'You are a business M&A research specialist. Always provide specific statistics, percentages, ' +
  'and data points with their sources and dates. Never give general statements without supporting data.';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
  citations: z.array(z.string()).optional(),
});

export interface PerplexityClientOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class PerplexityResearchClient implements ResearchClient {
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: PerplexityClientOptions = {}) {
    this.apiKey = (options.apiKey ?? process.env.PERPLEXITY_API_KEY)?.trim() || undefined;
    this.model = options.model ?? DEFAULT_MODEL;
    this.baseUrl = (options.baseUrl ?? PERPLEXITY_BASE).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RESEARCH_TIMEOUT_MS;
  }

  async search(query: string, options?: { signal?: AbortSignal }): Promise<SearchOutcome> {
    if (!this.apiKey) {
      return { status: 'unavailable', reason: 'PERPLEXITY_API_KEY is not set' };
    }

    const deadline = createTimeoutSignal(this.timeoutMs, options?.signal);

    try {
      const res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: RESEARCH_SYSTEM_PROMPT },
            { role: 'user', content: query },
          ],
          temperature: 0.2,
          max_tokens: 1000,
        }),
        signal: deadline.signal,
      });

      if (!res.ok) {
        return { status: 'unavailable', reason: `search returned HTTP ${res.status}` };
      }

      const parsed = chatCompletionSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { status: 'unavailable', reason: 'unexpected search response shape' };
      }

      const citations: Citation[] = (parsed.data.citations ?? []).map((url) => ({
        source: hostnameOf(url),
        url,
      }));
      return { status: 'ok', content: parsed.data.choices[0].message.content, citations };
    } catch (err) {
      if (options?.signal?.aborted) throw err;
      if (deadline.timedOut()) {
        return { status: 'unavailable', reason: `search timed out after ${this.timeoutMs}ms` };
      }
      return {
        status: 'unavailable',
        reason: `search request failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    } finally {
      deadline.dispose();
    }
  }
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}
