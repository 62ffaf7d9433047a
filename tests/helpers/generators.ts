import { vi } from 'vitest';
import type { GenerationRequest, TextGenerator } from '@exitready/llm';

export type ScriptedReply = string | Error;

/**
 * Generator that plays back replies in order and repeats the last one.
 */
export function scriptedGenerator(replies: ScriptedReply[]) {
  let index = 0;
  const generate = vi.fn(async (_request: GenerationRequest): Promise<string> => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const generator: TextGenerator = { generate };
  return { generator, generate };
}

/** Generator that never returns usable JSON, so every structured call falls back. */
export function unusableGenerator() {
  return scriptedGenerator(['I am not able to help with that.']);
}

export interface Route {
  match: RegExp;
  replies: ScriptedReply[];
}

/**
 * Generator that answers by matching the first user message; each route plays
 * its replies in order and repeats the last. Unmatched prompts get `fallback`.
 */
export function routedGenerator(routes: Route[], fallback: ScriptedReply = 'no usable answer') {
  const calls = new Map<Route, number>();
  const generate = vi.fn(async (request: GenerationRequest): Promise<string> => {
    const prompt = request.messages[0]?.content ?? '';
    const route = routes.find((r) => r.match.test(prompt));
    let reply = fallback;
    if (route) {
      const index = calls.get(route) ?? 0;
      calls.set(route, index + 1);
      reply = route.replies[Math.min(index, route.replies.length - 1)];
    }
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const generator: TextGenerator = { generate };
  return { generator, generate };
}
