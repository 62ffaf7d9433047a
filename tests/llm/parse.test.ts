import { describe, it, expect } from 'vitest';
import {
  extractLargestBalancedObject,
  jsonRepairers,
  repairJson,
  stripCodeFences,
  type JsonRepairer,
} from '@exitready/llm';

describe('parse', () => {
  describe('stripCodeFences', () => {
    it('removes a json fence', () => {
      expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('leaves unfenced text trimmed', () => {
      expect(stripCodeFences('  {"a": 1}  ')).toBe('{"a": 1}');
    });
  });

  describe('repairJson', () => {
    const context = { knownKeys: ['score', 'overall', 'summary', 'a'] };

    it('parses valid JSON directly', () => {
      expect(repairJson('{"score": 7}', context)).toEqual({ value: { score: 7 }, strategy: 'direct' });
    });

    it('parses fenced JSON directly', () => {
      expect(repairJson('```json\n{"a": 1}\n```', context)).toEqual({ value: { a: 1 }, strategy: 'direct' });
    });

    it('prepends a missing leading brace at the first known field', () => {
      const result = repairJson('"score": 7, "notes": "ok"}', context);
      expect(result).toEqual({ value: { score: 7, notes: 'ok' }, strategy: 'prepend-open-brace' });
    });

    it('drops leading prose when prepending the brace', () => {
      const result = repairJson('Here you go: "overall": 8, "tier": "Exit Ready"}', context);
      expect(result?.value).toEqual({ overall: 8, tier: 'Exit Ready' });
      expect(result?.strategy).toBe('prepend-open-brace');
    });

    it('skips a bare field name in the prose before the object', () => {
      const result = repairJson('Here is the summary: "summary": "ok", "score": 7}', context);
      expect(result).toEqual({ value: { summary: 'ok', score: 7 }, strategy: 'prepend-open-brace' });
    });

    it('moves past a quoted field name that does not start the object', () => {
      const result = repairJson('I set "score": as asked. "score": 7, "summary": "ok"', context);
      expect(result).toEqual({ value: { score: 7, summary: 'ok' }, strategy: 'append-closing-braces' });
    });

    it('appends missing closing brackets and braces', () => {
      const result = repairJson('{"score": 7, "tags": ["a", "b"', context);
      expect(result).toEqual({ value: { score: 7, tags: ['a', 'b'] }, strategy: 'append-closing-braces' });
    });

    it('closes a string cut off mid-value', () => {
      const result = repairJson('{"summary": "The business is', context);
      expect(result?.value).toEqual({ summary: 'The business is' });
    });

    it('repairs both a missing leading and trailing brace', () => {
      const result = repairJson('"score": 7, "notes": "ok"', context);
      expect(result).toEqual({ value: { score: 7, notes: 'ok' }, strategy: 'append-closing-braces' });
    });

    it('removes trailing commas', () => {
      const result = repairJson('{"a": 1, "b": [1, 2,],}', context);
      expect(result).toEqual({ value: { a: 1, b: [1, 2] }, strategy: 'remove-trailing-commas' });
    });

    it('extracts an object surrounded by prose', () => {
      const result = repairJson('Sure! Here is the result: {"a": 1} hope it helps', context);
      expect(result).toEqual({ value: { a: 1 }, strategy: 'balanced-substring' });
    });

    it('returns null when nothing parses', () => {
      expect(repairJson('no json here', context)).toBeNull();
    });

    it('does not accept arrays', () => {
      expect(repairJson('[1, 2, 3]', context)).toBeNull();
    });

    it('runs caller-supplied repairers in order', () => {
      const singleQuotes: JsonRepairer = {
        name: 'single-quotes',
        repair: (text) => text.replace(/'/g, '"'),
      };
      const result = repairJson("{'a': 1}", context, [singleQuotes, jsonRepairers.removeTrailingCommas]);
      expect(result).toEqual({ value: { a: 1 }, strategy: 'single-quotes' });
    });
  });

  describe('extractLargestBalancedObject', () => {
    it('prefers the largest parseable object', () => {
      expect(extractLargestBalancedObject('x {"a": {"b": 1}} y {"c": 2}')).toEqual({ a: { b: 1 } });
    });

    it('ignores braces inside strings', () => {
      expect(extractLargestBalancedObject('note {"text": "a } b"} end')).toEqual({ text: 'a } b' });
    });

    it('returns null without a balanced object', () => {
      expect(extractLargestBalancedObject('{"a": 1')).toBeNull();
    });
  });
});
