import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  correctionMessage,
  jsonObjectSchema,
  requestStructured,
  StructuredOutputError,
  type GenerationRequest,
  type TextGenerator,
} from '@exitready/llm';
import { scriptedGenerator } from '../helpers/generators.js';

const tierSchema = z.object({ score: z.number().max(10), tier: z.string() });

describe('requestStructured', () => {
  it('returns the parsed object on the first attempt', async () => {
    const { generator, generate } = scriptedGenerator(['{"score": 7, "tier": "Needs Work"}']);

    const result = await requestStructured({
      generator,
      systemPrompt: 'Score the business.',
      userPrompt: 'Answers: ...',
      requiredKeys: ['score', 'tier'],
      schema: tierSchema,
    });

    expect(result).toEqual({
      ok: true,
      data: { score: 7, tier: 'Needs Work' },
      attempts: 1,
      raw: '{"score": 7, "tier": "Needs Work"}',
      strategy: 'direct',
    });
    const request = generate.mock.calls[0][0];
    expect(request.format).toBe('json');
    expect(request.system).toBe('Score the business.\n\nAlways respond with a single valid JSON object.');
    expect(request.messages).toEqual([{ role: 'user', content: 'Answers: ...' }]);
  });

  it('leaves a system prompt that already mentions JSON unchanged', async () => {
    const { generator, generate } = scriptedGenerator(['{"a": 1}']);
    await requestStructured({
      generator,
      systemPrompt: 'Reply in JSON.',
      userPrompt: 'x',
      requiredKeys: ['a'],
      schema: jsonObjectSchema,
    });
    expect(generate.mock.calls[0][0].system).toBe('Reply in JSON.');
  });

  it('retries with escalating corrections until the reply is valid', async () => {
    const { generator, generate } = scriptedGenerator([
      'I cannot answer that.',
      '{"score": 7',
      '{"score": 7, "tier": "Exit Ready"}',
    ]);
    const onAttempt = vi.fn();

    const result = await requestStructured({
      generator,
      systemPrompt: 'Score the business.',
      userPrompt: 'Answers: ...',
      requiredKeys: ['score', 'tier'],
      schema: tierSchema,
      maxRetries: 2,
      onAttempt,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.attempts).toBe(3);
      expect(result.data).toEqual({ score: 7, tier: 'Exit Ready' });
    }
    expect(generate).toHaveBeenCalledTimes(3);

    const third = generate.mock.calls[2][0].messages;
    expect(third).toEqual([
      { role: 'user', content: 'Answers: ...' },
      { role: 'assistant', content: 'I cannot answer that.' },
      { role: 'user', content: correctionMessage(1, 'response was not a JSON object', ['score', 'tier']) },
      { role: 'assistant', content: '{"score": 7' },
      { role: 'user', content: correctionMessage(2, 'missing required keys: tier', ['score', 'tier']) },
    ]);
    expect(generate.mock.calls[0][0].messages).toHaveLength(1);

    expect(onAttempt.mock.calls.map(([a]) => a)).toEqual([
      { attempt: 1, ok: false, reason: 'response was not a JSON object' },
      { attempt: 2, ok: false, reason: 'missing required keys: tier' },
      { attempt: 3, ok: true, strategy: 'direct' },
    ]);
  });

  it('fails with the last raw reply after 1 + maxRetries attempts', async () => {
    const { generator, generate } = scriptedGenerator(['nope']);

    const result = await requestStructured({
      generator,
      systemPrompt: 'x',
      userPrompt: 'y',
      requiredKeys: ['score'],
      schema: jsonObjectSchema,
      maxRetries: 1,
    });

    expect(generate).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StructuredOutputError);
      expect(result.error.reason).toBe('response was not a JSON object');
      expect(result.error.lastRaw).toBe('nope');
      expect(result.error.attempts).toBe(2);
      expect(result.error.message).toBe('Structured output failed after 2 attempt(s): response was not a JSON object');
    }
  });

  it('reports empty replies', async () => {
    const { generator } = scriptedGenerator(['   ']);
    const result = await requestStructured({
      generator,
      systemPrompt: 'x',
      userPrompt: 'y',
      requiredKeys: [],
      schema: jsonObjectSchema,
      maxRetries: 0,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('empty response');
  });

  it('reports schema violations', async () => {
    const { generator } = scriptedGenerator(['{"score": 42, "tier": "Exit Ready"}']);
    const result = await requestStructured({
      generator,
      systemPrompt: 'x',
      userPrompt: 'y',
      requiredKeys: ['score'],
      schema: tierSchema,
      maxRetries: 0,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toContain('schema validation failed: score:');
  });

  it('counts a backend error as a failed attempt', async () => {
    const { generator, generate } = scriptedGenerator([new Error('connection refused'), '{"score": 5}']);

    const result = await requestStructured({
      generator,
      systemPrompt: 'x',
      userPrompt: 'y',
      requiredKeys: ['score'],
      schema: jsonObjectSchema,
    });

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.attempts).toBe(2);
    expect(generate.mock.calls[1][0].messages).toEqual([
      { role: 'user', content: 'y' },
      { role: 'user', content: correctionMessage(1, 'backend error: connection refused', ['score']) },
    ]);
  });

  it('propagates errors once the signal is aborted', async () => {
    const controller = new AbortController();
    const generate = vi.fn(async (request: GenerationRequest): Promise<string> => {
      controller.abort();
      expect(request.signal?.aborted).toBe(true);
      throw new Error('The operation was aborted');
    });
    const generator: TextGenerator = { generate };

    await expect(
      requestStructured({
        generator,
        systemPrompt: 'x',
        userPrompt: 'y',
        requiredKeys: ['score'],
        schema: jsonObjectSchema,
        signal: controller.signal,
      }),
    ).rejects.toThrow('The operation was aborted');
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('escalates correction wording by level', () => {
    expect(correctionMessage(1, 'empty response', ['a'])).toBe(
      'Your previous reply could not be used (empty response). Reply again with only a JSON object containing the keys: a.',
    );
    expect(correctionMessage(2, 'empty response', ['a'])).toContain('Start it with { and end it with }.');
    expect(correctionMessage(3, 'empty response', ['a', 'b'])).toBe(
      'FINAL ATTEMPT. Output nothing except one JSON object with these top-level keys: a, b. Any other text makes the reply unusable.',
    );
  });
});
