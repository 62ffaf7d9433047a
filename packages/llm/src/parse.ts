/**
 * JSON recovery for model output: fence stripping, ordered repairers and
 * balanced-brace extraction.
 */

export type JsonObject = Record<string, unknown>;

export interface RepairContext {
  /** Field names whose presence marks text as a headless JSON object. */
  knownKeys: readonly string[];
}

/**
 * A named, cumulative text transform. Each repairer receives the output of the
 * previous one and the result is re-parsed after every step.
 */
export interface JsonRepairer {
  name: string;
  repair(text: string, context: RepairContext): string;
}

export interface RepairOutcome {
  value: JsonObject;
  /** `direct`, the repairer that produced parseable text, or `balanced-substring`. */
  strategy: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip markdown code fences around a response.
 */
export function stripCodeFences(response: string): string {
  const trimmed = response.trim();
  const fenced = trimmed.match(/```(?:json|JSON)?\s*([\s\S]*?)(?:```|$)/);
  if (fenced && trimmed.startsWith('```')) {
    return fenced[1].trim();
  }
  return trimmed;
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Start positions of known field tokens: every quoted `"key":` in text order,
 * then every bare `key:`.
 */
function keyTokenIndexes(text: string, keys: readonly string[]): number[] {
  const quoted = new Set<number>();
  const bare = new Set<number>();
  for (const key of keys) {
    const name = escapeRegExp(key);
    for (const match of text.matchAll(new RegExp(`"${name}"\\s*:`, 'g'))) quoted.add(match.index ?? 0);
    for (const match of text.matchAll(new RegExp(`\\b${name}\\s*:`, 'g'))) bare.add(match.index ?? 0);
  }
  const ascending = (a: number, b: number) => a - b;
  return [...[...quoted].sort(ascending), ...[...bare].sort(ascending)];
}

function closeOpenStructures(text: string): string {
  const { closers, inString } = scanOpenStructures(text);
  if (closers.length === 0 && !inString) return text;
  return `${text}${inString ? '"' : ''}${closers.join('')}`;
}

/**
 * Scan outside string literals, returning the closers still owed and whether
 * the text ends inside a string.
 */
function scanOpenStructures(text: string): { closers: string[]; inString: boolean } {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop();
  }

  return { closers: stack.reverse(), inString };
}

export const jsonRepairers = {
  /** Text missing its leading brace but carrying a known field token. */
  prependOpenBrace: {
    name: 'prepend-open-brace',
    repair(text: string, context: RepairContext): string {
      const trimmed = text.trim();
      if (trimmed.startsWith('{')) return trimmed;
      const candidates = keyTokenIndexes(trimmed, context.knownKeys).map((index) => `{${trimmed.slice(index)}`);
      if (candidates.length === 0) return trimmed;
      // Prose may name a field before the object starts; take the first cut that parses once closed.
      return candidates.find((candidate) => tryParseObject(closeOpenStructures(candidate)) !== null) ?? candidates[0];
    },
  },

  /** Truncated output: close an open string, then every open bracket and brace. */
  appendClosingBraces: {
    name: 'append-closing-braces',
    repair(text: string): string {
      return closeOpenStructures(text);
    },
  },

  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: {
    name: 'remove-trailing-commas',
    repair(text: string): string {
      return text.replace(/,\s*([}\]])/g, '$1');
    },
  },
} satisfies Record<string, JsonRepairer>;

export const defaultRepairers: readonly JsonRepairer[] = [
  jsonRepairers.prependOpenBrace,
  jsonRepairers.appendClosingBraces,
  jsonRepairers.removeTrailingCommas,
];

function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Parse the largest balanced `{...}` substring that is a JSON object.
 */
export function extractLargestBalancedObject(text: string): JsonObject | null {
  const candidates: string[] = [];
  for (let i = text.indexOf('{'); i !== -1; i = text.indexOf('{', i + 1)) {
    const end = findMatchingBrace(text, i);
    if (end !== -1) candidates.push(text.slice(i, end + 1));
  }

  candidates.sort((a, b) => b.length - a.length);
  for (const candidate of candidates) {
    const parsed = tryParseObject(candidate);
    if (parsed) return parsed;
  }
  return null;
}

/**
 * Recover a JSON object from model output, or `null` when nothing parses.
 */
export function repairJson(
  response: string,
  context: RepairContext,
  repairers: readonly JsonRepairer[] = defaultRepairers,
): RepairOutcome | null {
  const text = stripCodeFences(response);

  const direct = tryParseObject(text);
  if (direct) return { value: direct, strategy: 'direct' };

  let repaired = text;
  for (const repairer of repairers) {
    repaired = repairer.repair(repaired, context);
    const parsed = tryParseObject(repaired);
    if (parsed) return { value: parsed, strategy: repairer.name };
  }

  const extracted = extractLargestBalancedObject(text);
  if (extracted) return { value: extracted, strategy: 'balanced-substring' };

  return null;
}
