/**
 * Structured-response coercion: one logical generation call that must yield a
 * JSON object with the required keys, with repair and escalating retries.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { withJsonInstruction } from './prompts.js';
import {
  defaultRepairers,
  repairJson,
  type JsonObject,
  type JsonRepairer,
} from './parse.js';
import type { ChatMessage, TextGenerator } from './types.js';

export class StructuredOutputError extends Error {
  readonly kind = 'StructuredOutputError';

  constructor(
    readonly reason: string,
    readonly lastRaw: string,
    readonly attempts: number,
  ) {
    super(`Structured output failed after ${attempts} attempt(s): ${reason}`);
    this.name = 'StructuredOutputError';
  }
}

/** Accepts any JSON object; for callers that only need the required-key check. */
export const jsonObjectSchema: ZodType<JsonObject, ZodTypeDef, unknown> = z.record(z.unknown());

export interface StructuredAttempt {
  attempt: number;
  ok: boolean;
  reason?: string;
  strategy?: string;
}

export interface StructuredRequestOptions<T> {
  generator: TextGenerator;
  systemPrompt: string;
  userPrompt: string;
  requiredKeys: readonly string[];
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Retries after the first attempt (default 2). */
  maxRetries?: number;
  knownKeys?: readonly string[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  repairers?: readonly JsonRepairer[];
  onAttempt?: (attempt: StructuredAttempt) => void;
}

export type StructuredCallResult<T> =
  | { ok: true; data: T; attempts: number; raw: string; strategy: string }
  | { ok: false; error: StructuredOutputError };

export const DEFAULT_MAX_RETRIES = 2;

/**
 * Correction appended to the conversation after a failed attempt. Level 1 is a
 * plain reminder; level 3 and above is the final, strictest wording.
 */
export function correctionMessage(
  level: number,
  reason: string,
  requiredKeys: readonly string[],
): string {
  const keys = requiredKeys.join(', ');
  if (level <= 1) {
    return `Your previous reply could not be used (${reason}). Reply again with only a JSON object containing the keys: ${keys}.`;
  }
  if (level === 2) {
    return (
      `The reply must be valid JSON. Start it with { and end it with }. ` +
      `Do not include explanations, markdown or code fences. Required keys: ${keys}. ` +
      `Problem with the last reply: ${reason}.`
    );
  }
  return `FINAL ATTEMPT. Output nothing except one JSON object with these top-level keys: ${keys}. Any other text makes the reply unusable.`;
}

type Evaluation<T> =
  | { ok: true; data: T; strategy: string }
  | { ok: false; reason: string };

function evaluateResponse<T>(
  raw: string,
  options: StructuredRequestOptions<T>,
  knownKeys: readonly string[],
): Evaluation<T> {
  if (!raw.trim()) return { ok: false, reason: 'empty response' };

  const repaired = repairJson(raw, { knownKeys }, options.repairers ?? defaultRepairers);
  if (!repaired) return { ok: false, reason: 'response was not a JSON object' };

  const missing = options.requiredKeys.filter((key) => !(key in repaired.value));
  if (missing.length > 0) {
    return { ok: false, reason: `missing required keys: ${missing.join(', ')}` };
  }

  const validated = options.schema.safeParse(repaired.value);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    return { ok: false, reason: `schema validation failed: ${issues}` };
  }

  return { ok: true, data: validated.data, strategy: repaired.strategy };
}

/**
 * Request a JSON object from the generator. Never throws for bad output or
 * backend failures (both consume an attempt); rethrows only when `signal`
 * has been aborted.
 */
export async function requestStructured<T>(
  options: StructuredRequestOptions<T>,
): Promise<StructuredCallResult<T>> {
  const totalAttempts = 1 + Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const knownKeys = [...new Set([...options.requiredKeys, ...(options.knownKeys ?? [])])];
  const system = withJsonInstruction(options.systemPrompt);
  const messages: ChatMessage[] = [{ role: 'user', content: options.userPrompt }];

  let lastRaw = '';
  let lastReason = 'no attempt made';

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    let raw: string | null = null;

    try {
      raw = await options.generator.generate({
        system,
        messages: [...messages],
        format: 'json',
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      lastReason = `backend error: ${err instanceof Error ? err.message : String(err)}`;
    }

    if (raw !== null) {
      lastRaw = raw;
      const evaluation = evaluateResponse(raw, options, knownKeys);
      if (evaluation.ok) {
        options.onAttempt?.({ attempt, ok: true, strategy: evaluation.strategy });
        return { ok: true, data: evaluation.data, attempts: attempt, raw, strategy: evaluation.strategy };
      }
      lastReason = evaluation.reason;
    }

    options.onAttempt?.({ attempt, ok: false, reason: lastReason });

    if (attempt < totalAttempts) {
      if (raw !== null) messages.push({ role: 'assistant', content: raw });
      messages.push({
        role: 'user',
        content: correctionMessage(attempt, lastReason, options.requiredKeys),
      });
    }
  }

  return {
    ok: false,
    error: new StructuredOutputError(lastReason, lastRaw, totalAttempts),
  };
}
