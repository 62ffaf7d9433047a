/**
 * Ollama HTTP client for local LLM inference.
 */

import { z } from 'zod';
import {
  OLLAMA_BASE_URL,
  DEFAULT_GENERATION_TIMEOUT_MS,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';
import type { GenerationRequest, TextGenerator } from './types.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const ollamaChatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});
export type OllamaChatResponse = z.infer<typeof ollamaChatResponseSchema>;

/**
 * Signal that fires on timeout or when `parent` aborts, whichever comes first.
 * `dispose` must be called once the request settles.
 */
export function createTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let expired = false;
  const timeoutId = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();

  if (parent?.aborted) controller.abort();
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(
    baseUrl: string = OLLAMA_BASE_URL,
    defaultTimeout: number = DEFAULT_GENERATION_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(
    request: OllamaChatRequest,
    timeout?: number,
    signal?: AbortSignal,
  ): Promise<OllamaChatResponse> {
    const limit = timeout ?? this.defaultTimeout;
    const deadline = createTimeoutSignal(limit, signal);

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: deadline.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama chat failed: ${response.status} - ${error}`);
      }

      return ollamaChatResponseSchema.parse(await response.json());
    } catch (err) {
      if (deadline.timedOut()) {
        throw new Error(`Ollama chat timed out after ${limit}ms`);
      }
      throw err;
    } finally {
      deadline.dispose();
    }
  }
}

export const defaultClient = new OllamaClient();

/**
 * TextGenerator backed by an Ollama chat model. Request fields override the
 * model type's defaults.
 */
export function createOllamaGenerator(
  modelType: OllamaModelType = 'WRITER',
  client: OllamaClient = defaultClient,
): TextGenerator {
  const config = defaultModelConfigs[modelType];

  return {
    async generate(request: GenerationRequest): Promise<string> {
      const messages: OllamaChatMessage[] = [];
      if (request.system) {
        messages.push({ role: 'system', content: request.system });
      }
      messages.push(...request.messages);

      const response = await client.chat(
        {
          model: config.model,
          messages,
          format: request.format === 'json' ? 'json' : undefined,
          options: {
            temperature: request.temperature ?? config.temperature,
            top_p: config.topP,
            num_predict: request.maxTokens ?? config.maxTokens,
          },
        },
        request.timeoutMs ?? config.timeout,
        request.signal,
      );

      return response.message.content;
    },
  };
}
