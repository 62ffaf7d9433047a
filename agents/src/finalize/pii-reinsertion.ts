import { COMPANY_NAME_TOKEN, PII_TOKEN_PATTERN } from '../intake/pii-redactor.js';
import type { PiiMapping } from '../intake/types.js';
import { mapSections } from '../summary/report.js';
import type { ReportSections } from '../summary/types.js';
import type { ReinsertionReport } from './types.js';

/** Used for `[COMPANY_NAME]` when the owner gave no company name. */
export const COMPANY_NAME_FALLBACK = 'your business';

/**
 * Replace placeholder tokens with their original values. Longer tokens go
 * first so `[EMAIL_1]` is never clipped by `[EMAIL]`.
 */
export function reinsertPii(text: string, mapping: PiiMapping): string {
  const entries = Object.entries(mapping).sort(([a], [b]) => b.length - a.length);
  let result = text;
  for (const [token, value] of entries) {
    result = result.split(token).join(value);
  }
  if (mapping[COMPANY_NAME_TOKEN] === undefined) {
    result = result.split(COMPANY_NAME_TOKEN).join(COMPANY_NAME_FALLBACK);
  }
  return result;
}

export function reinsertIntoSections(sections: ReportSections, mapping: PiiMapping): ReportSections {
  return mapSections(sections, (text) => reinsertPii(text, mapping));
}

export function findRemainingPlaceholders(text: string): ReinsertionReport {
  const remainingPlaceholders = [...new Set(text.match(PII_TOKEN_PATTERN) ?? [])];
  return { isComplete: remainingPlaceholders.length === 0, remainingPlaceholders };
}
