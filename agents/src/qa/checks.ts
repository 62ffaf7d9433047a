/**
 * Mechanical report checks. Pure functions over the anonymised sections; the
 * QA stage combines them with the generated checks.
 */

import { PII_TOKEN_PATTERN } from '../intake/pii-redactor.js';
import { CATEGORY_ORDER, CATEGORY_TABLE } from '../scoring/categories.js';
import type { CategoryScores, ConsistencyReport } from '../scoring/types.js';
import type { ReportSections } from '../summary/types.js';
import { clamp, round1, wordCount } from '../shared/text.js';
import type { FramingReport, FramingViolation, QaCheckName, QaCheckResult, QaChecks } from './types.js';

export const QA_WEIGHTS: Record<QaCheckName, number> = {
  scoringConsistency: 0.15,
  contentQuality: 0.2,
  piiCompliance: 0.15,
  structure: 0.1,
  redundancy: 0.1,
  tone: 0.1,
  citations: 0.1,
  outcomeFraming: 0.1,
};

export const APPROVAL_THRESHOLD = 6.0;
export const MIN_EXECUTIVE_SUMMARY_WORDS = 150;
export const MIN_CATEGORY_SUMMARY_WORDS = 25;

const CRITICAL_MARKERS = ['CRITICAL', 'PII', 'PROMISE LANGUAGE'] as const;

export function isCriticalIssue(issue: string): boolean {
  return CRITICAL_MARKERS.some((marker) => issue.includes(marker));
}

export function checkScoringConsistency(consistency: ConsistencyReport): QaCheckResult {
  return {
    name: 'scoringConsistency',
    score: consistency.isConsistent ? 10 : 5,
    issues: [...consistency.issues],
    warnings: [...consistency.warnings],
    source: 'mechanical',
  };
}

const PLACEHOLDER_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'bracketed placeholder', pattern: /\[[^\]\n]*\]/g },
  { label: 'TODO', pattern: /\bTODO\b/g },
  { label: 'PLACEHOLDER', pattern: /PLACEHOLDER/gi },
  { label: 'INSERT ... HERE', pattern: /INSERT\b.*?\bHERE/gi },
  { label: 'X.X', pattern: /\bX\.X\b/g },
];

const UNPROFESSIONAL_TERMS: ReadonlyArray<{ term: string; pattern: RegExp }> = [
  { term: 'gonna', pattern: /\bgonna\b/i },
  { term: 'wanna', pattern: /\bwanna\b/i },
  { term: 'stuff', pattern: /\bstuff\b/i },
  { term: 'things', pattern: /\bthings\b/i },
  { term: 'etc.', pattern: /\betc\./i },
];

/** Placeholder-like text that is not one of the PII tokens finalize will fill in. */
export function findPlaceholders(text: string): string[] {
  const found: string[] = [];
  for (const { pattern } of PLACEHOLDER_PATTERNS) {
    for (const match of text.match(pattern) ?? []) {
      if (match.startsWith('[') && match.replace(PII_TOKEN_PATTERN, '') === '') continue;
      found.push(match);
    }
  }
  return found;
}

export function checkContentQuality(sections: ReportSections): QaCheckResult {
  const issues: string[] = [];
  const warnings: string[] = [];
  let score = 10;

  const summary = sections.executiveSummary.trim();
  if (!summary) {
    issues.push('Missing executive summary');
    score -= 3;
  } else {
    for (const placeholder of findPlaceholders(summary)) {
      issues.push(`Placeholder text found in executive summary: ${placeholder}`);
      score -= 2;
    }
    if (wordCount(summary) < MIN_EXECUTIVE_SUMMARY_WORDS) {
      warnings.push(`Executive summary too brief (< ${MIN_EXECUTIVE_SUMMARY_WORDS} words)`);
      score -= 1;
    }
  }

  const present = CATEGORY_ORDER.filter((c) => sections.categorySummaries[c].trim() !== '');
  if (present.length < CATEGORY_ORDER.length) {
    issues.push(`Missing category summaries (${present.length}/${CATEGORY_ORDER.length})`);
    score -= 2;
  }
  for (const category of present) {
    if (wordCount(sections.categorySummaries[category]) < MIN_CATEGORY_SUMMARY_WORDS) {
      warnings.push(`${CATEGORY_TABLE[category].title} summary too brief`);
      score -= 0.5;
    }
  }

  const allText = [
    sections.executiveSummary,
    ...CATEGORY_ORDER.map((c) => sections.categorySummaries[c]),
    sections.recommendations,
    sections.industryContext,
    sections.nextSteps,
  ].join('\n');
  for (const { term, pattern } of UNPROFESSIONAL_TERMS) {
    if (pattern.test(allText)) {
      warnings.push(`Unprofessional language: '${term}'`);
      score -= 0.5;
    }
  }

  return { name: 'contentQuality', score: Math.max(0, score), issues, warnings, source: 'mechanical' };
}

const PII_PATTERNS: ReadonlyArray<{ type: string; pattern: RegExp; minDigits?: number }> = [
  { type: 'email', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { type: 'phone', pattern: /(?:\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g, minDigits: 10 },
  { type: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/g },
  { type: 'credit_card', pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g },
];

export interface PiiFinding {
  type: string;
  count: number;
}

export function scanForPii(text: string): PiiFinding[] {
  const findings: PiiFinding[] = [];
  for (const { type, pattern, minDigits = 0 } of PII_PATTERNS) {
    const matches = (text.match(pattern) ?? []).filter(
      (m) => m.replace(/\D/g, '').length >= minDigits,
    );
    if (matches.length > 0) findings.push({ type, count: matches.length });
  }
  return findings;
}

export function checkPiiCompliance(report: string): QaCheckResult {
  const findings = scanForPii(report);
  const issues =
    findings.length > 0
      ? [`PII detected: ${findings.map((f) => `${f.type} (${f.count}x)`).join(', ')}`]
      : [];
  return {
    name: 'piiCompliance',
    score: findings.length > 0 ? 0 : 10,
    issues,
    warnings: [],
    source: 'mechanical',
  };
}

const MIN_SECTION_CHARS = 10;
const STRUCTURE_SECTION_COUNT = 5;

export function checkStructure(sections: ReportSections, categoryScores: Partial<CategoryScores>): QaCheckResult {
  const missing: string[] = [];
  const incomplete: string[] = [];

  const grade = (label: string, text: string) => {
    const trimmed = text.trim();
    if (!trimmed) missing.push(label);
    else if (trimmed.length < MIN_SECTION_CHARS) incomplete.push(label);
  };

  grade('Executive Summary', sections.executiveSummary);
  grade('Recommendations', sections.recommendations);
  grade('Next Steps', sections.nextSteps);

  const summariesPresent = CATEGORY_ORDER.filter((c) => sections.categorySummaries[c].trim() !== '');
  if (summariesPresent.length === 0) missing.push('Category Summaries');

  const missingScores = CATEGORY_ORDER.filter((c) => categoryScores[c] === undefined);
  if (missingScores.length === CATEGORY_ORDER.length) missing.push('Category Scores');
  else if (missingScores.length > 0) incomplete.push(`Missing categories: ${missingScores.join(', ')}`);

  const score = round1(
    Math.max(0, ((STRUCTURE_SECTION_COUNT - missing.length - incomplete.length * 0.5) / STRUCTURE_SECTION_COUNT) * 10),
  );

  return {
    name: 'structure',
    score,
    issues: missing.length > 0 ? [`Missing sections: ${missing.join(', ')}`] : [],
    warnings: incomplete.length > 0 ? [`Incomplete sections: ${incomplete.join(', ')}`] : [],
    source: 'mechanical',
  };
}

const PROMISE_PATTERNS: readonly RegExp[] = [
  /\bwill\s+(?:increase|achieve|ensure|improve|deliver|guarantee)\b/gi,
  /\bguaranteed\b/gi,
  /\bdefinitely\b/gi,
  /\bensure[sd]?\b/gi,
];

const SINGLE_PERCENT_PATTERN = /(?<![\d.\-–])(\d+)%\s+(?:increase|improvement|growth|value|higher)/gi;

/** Regex outcome-framing check over recommendations and next steps. */
export function detectPromiseLanguage(text: string): FramingReport {
  const promiseLanguage: string[] = [];
  const violations: FramingViolation[] = [];

  for (const pattern of PROMISE_PATTERNS) {
    const matches = text.match(pattern) ?? [];
    promiseLanguage.push(...matches);
    for (const match of matches.slice(0, 3)) {
      violations.push({ text: match, issue: 'Uses absolute promise language' });
    }
  }

  const nonRangeNumbers = [...text.matchAll(SINGLE_PERCENT_PATTERN)].map((m) => `${m[1]}%`);
  const framingScore = clamp(10 - promiseLanguage.length * 0.5 - nonRangeNumbers.length * 0.3, 0, 10);

  return {
    framingScore: round1(framingScore),
    violations: violations.slice(0, 5),
    promiseLanguage: [...new Set(promiseLanguage)].slice(0, 5),
    nonRangeNumbers: [...new Set(nonRangeNumbers)].slice(0, 5),
  };
}

/** Weighted average of the check scores over whichever checks are present. */
export function calculateQualityScore(checks: Partial<QaChecks>): number {
  let total = 0;
  let weight = 0;
  for (const check of Object.values(checks)) {
    if (!check) continue;
    total += check.score * QA_WEIGHTS[check.name];
    weight += QA_WEIGHTS[check.name];
  }
  return weight > 0 ? round1(total / weight) : 5;
}
