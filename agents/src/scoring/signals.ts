/**
 * Signal parsers for free-text questionnaire answers.
 */

import type { MarginTrend } from '@exitready/schemas';
import { allIntegers, clamp, firstInteger, words } from '../shared/text.js';

const FIRST_PERSON = new Set(['i', 'me', 'my', 'myself', 'mine', "i'm", "i've", "i'll", "i'd"]);

/** Share of words that are first-person singular pronouns. */
export function firstPersonDensity(text: string): number {
  const tokens = words(text);
  if (tokens.length === 0) return 0;
  return tokens.filter((w) => FIRST_PERSON.has(w)).length / tokens.length;
}

export const DOES_EVERYTHING_PATTERN = /\b(everything|every decision|all of it|do it all|all aspects)\b/i;
export const DELEGATION_PATTERN = /\b(team|delegat\w*|managers?|supervisors?|staff|employees|leadership)\b/i;

/**
 * Days the business can run without the owner, from bucket text or a number
 * with a unit. Null when nothing usable is present.
 */
export function parseDaysWithoutOwner(answer: string): number | null {
  const text = answer.trim().toLowerCase();
  if (!text) return null;

  if (/less than (3|three) days/.test(text)) return 2;
  if (/(more than|over) (a|one|1) month/.test(text)) return 45;
  if (/\b3\s*-\s*7 days\b/.test(text)) return 5;
  if (/\b1\s*-\s*2 weeks\b/.test(text)) return 10;
  if (/\b2\s*-\s*4 weeks\b/.test(text)) return 21;
  if (/\bnone\b|\bnot at all\b|\bcan'?t\b|\bcannot\b/.test(text)) return 0;

  const n = firstInteger(text);
  if (n === null) return null;
  if (/month/.test(text)) return n * 30;
  if (/week/.test(text)) return n * 7;
  return n;
}

/** Revenue streams listed as comma, semicolon or newline separated items. */
export function countRevenueStreams(answer: string): number {
  return answer
    .split(/[,;\n]+/)
    .map((part) => part.trim())
    .filter(Boolean).length;
}

export const RECURRING_PATTERN =
  /\b(subscriptions?|recurring|monthly|annual|retainers?|contracts?|contracted|memberships?)\b/i;

/** Midpoint percentage of a concentration answer such as "10-20%" or "under 10%". */
export function concentrationMidpoint(answer: string): number | null {
  const text = answer.toLowerCase();
  const numbers = allIntegers(text);
  if (numbers.length === 0) return null;
  if (/\b(less than|under|below)\b/.test(text)) return numbers[0] / 2;
  const low = numbers[0];
  const high = numbers.length > 1 ? numbers[1] : low;
  return (low + high) / 2;
}

/** 0-10 scale answer, clamped; null when no number is present. */
export function parseScale(answer: string): number | null {
  const n = firstInteger(answer);
  return n === null ? null : clamp(n, 0, 10);
}

export function classifyMarginTrend(answer: string): MarginTrend | null {
  const text = answer.toLowerCase();
  if (/\b(don'?t know|not sure|unknown|unsure|no idea)\b/.test(text)) return 'UNKNOWN';
  if (/(declin|decreas)\w*\s+significantly|significant(ly)?\s+(declin|decreas)/.test(text)) {
    return 'DECLINED_SIGNIFICANTLY';
  }
  if (/declin|decreas/.test(text)) return 'DECLINED_SLIGHTLY';
  if (/(improv|increas)\w*\s+significantly|significant(ly)?\s+(improv|increas)/.test(text)) {
    return 'IMPROVED_SIGNIFICANTLY';
  }
  if (/improv|increas/.test(text)) return 'IMPROVED_SLIGHTLY';
  if (/\b(flat|stable|same|unchanged|steady)\b/.test(text)) return 'FLAT';
  return null;
}

export const SOLE_KNOWLEDGE_PATTERN =
  /\b(only (i|me|myself|the owner)|just me|no one else|nobody else|only person|sole|in my head)\b/i;
export const DISTRIBUTED_KNOWLEDGE_PATTERN =
  /\b(team|several|multiple|cross-trained|shared|documented|distributed|everyone)\b/i;

export const NEGATIVE_ANSWER_PATTERN = /\b(none|nothing|not really|no)\b/i;
