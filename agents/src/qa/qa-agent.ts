/**
 * QA stage: mechanical and generated checks over the anonymised report,
 * targeted repair while critical issues remain, then a final polish.
 *
 * Every generated check has a default so a failing backend never blocks the run.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { buildPrompt, requestStructured, truncateForPrompt } from '@exitready/llm';
import { piiTokensIn } from '../intake/pii-redactor.js';
import type { ResearchResult } from '../research/types.js';
import type { ScoringResult } from '../scoring/types.js';
import type { StageDefinition, StageEnv } from '../shared/run-context.js';
import { wordCount } from '../shared/text.js';
import { assembleReport } from '../summary/report.js';
import { sectionTextSchema } from '../summary/summary-agent.js';
import type { ReportSections } from '../summary/types.js';
import {
  APPROVAL_THRESHOLD,
  calculateQualityScore,
  checkContentQuality,
  checkPiiCompliance,
  checkScoringConsistency,
  checkStructure,
  detectPromiseLanguage,
  isCriticalIssue,
  scanForPii,
} from './checks.js';
import type { FramingReport, QaCheckResult, QaChecks } from './types.js';

export const DEFAULT_CHECK_SCORE = 8;
export const MAX_REPAIR_ATTEMPTS = 2;
const REPAIR_SCORE_FLOOR = 5;

const checkScore = z.coerce.number().min(0).max(10);

const redundancySchema = z.object({
  redundancy_score: checkScore,
  redundant_sections: z.array(z.string()).default([]),
});

const toneSchema = z.object({
  tone_score: checkScore,
  tone_issues: z.array(z.string()).default([]),
});

const citationSchema = z.object({
  citation_score: checkScore,
  issues_found: z.coerce.number().int().nonnegative().optional(),
  uncited_claims: z.array(z.object({ claim: z.string(), issue: z.string().optional() })).default([]),
});

const framingSchema = z.object({
  framing_score: checkScore,
  violations_found: z.coerce.number().int().nonnegative().default(0),
  specific_violations: z.array(z.object({ text: z.string(), issue: z.string().default('') })).default([]),
  non_range_numbers: z.array(z.string()).default([]),
});

const repairSchema = z
  .object({
    executive_summary: sectionTextSchema.optional(),
    recommendations: sectionTextSchema.optional(),
    next_steps: sectionTextSchema.optional(),
  })
  .refine((v) => Boolean(v.executive_summary ?? v.recommendations ?? v.next_steps), {
    message: 'no sections returned',
  });

const polishSchema = z.object({ executive_summary: sectionTextSchema });

const REVIEWER_SYSTEM = 'You review business exit readiness reports for quality and compliance.';

const REDUNDANCY_PROMPT = `Analyse this report for redundancy.
Strategic repetition of scores, the primary focus area and key recommendations is expected.
Only flag the same sentence appearing 3+ times or a concept explained identically 4+ times.

Report:
{report}

Return JSON: {"redundancy_score": 0-10, "redundant_sections": ["..."]}`;

const TONE_PROMPT = `Rate the tone consistency of this report: professional, direct and encouraging throughout, with no shifts into casual or alarmist language.

Report:
{report}

Return JSON: {"tone_score": 0-10, "tone_issues": ["..."]}`;

const CITATION_PROMPT = `Check that statistical claims in this report are supported by the available research.
Do not flag general business principles or the business's own scores.

Report:
{report}

Available citations:
{citations}

Return JSON: {"citation_score": 0-10, "issues_found": n, "uncited_claims": [{"claim": "...", "issue": "missing citation" | "claim not found in research data"}]}`;

const FRAMING_PROMPT = `Check outcome framing in these report sections.
Outcome claims must use qualifying language ("typically", "often", "on average"), never absolute promises ("will", "guaranteed", "definitely", "ensure"), and improvements must be ranges such as "20-30%", not single numbers.

RECOMMENDATIONS:
{recommendations}

NEXT STEPS:
{nextSteps}

Return JSON: {"framing_score": 0-10, "violations_found": n, "specific_violations": [{"text": "...", "issue": "..."}], "non_range_numbers": ["..."]}`;

const REPAIR_SYSTEM = `You edit business reports to fix quality issues.
Keep every placeholder in square brackets exactly as written. Use "typically" or "often" for outcome claims and express improvements as ranges.`;

const REPAIR_PROMPT = `Fix these issues in the report sections below. Rewrite only the sections that need it.

Critical issues:
{issues}

Warnings:
{warnings}

Overall score: {score}/10 ({tier})

EXECUTIVE SUMMARY:
{executiveSummary}

RECOMMENDATIONS:
{recommendations}

NEXT STEPS:
{nextSteps}

Return JSON with any of: {"executive_summary": "...", "recommendations": "...", "next_steps": "..."}`;

const POLISH_PROMPT = `Polish this executive summary for clarity and flow. Keep its length, every fact, score and placeholder unchanged. Plain text only, no markdown.
Use "typically" or "often" for outcome claims.

Overall score: {score}/10 ({tier})

{executiveSummary}

Return JSON: {"executive_summary": "..."}`;

interface ReviewCall<T> {
  label: string;
  system: string;
  prompt: string;
  requiredKeys: readonly string[];
  knownKeys?: readonly string[];
  schema: ZodType<T, ZodTypeDef, unknown>;
  temperature?: number;
}

/** One coercion-layer call; null when it produced nothing usable. */
async function review<T>(call: ReviewCall<T>, env: StageEnv): Promise<T | null> {
  const result = await requestStructured({
    generator: env.deps.generator,
    systemPrompt: call.system,
    userPrompt: call.prompt,
    requiredKeys: call.requiredKeys,
    knownKeys: call.knownKeys,
    schema: call.schema,
    maxRetries: env.maxRetries,
    temperature: call.temperature ?? 0.1,
    signal: env.signal,
    onAttempt: (a) => env.logger.debug(`${call.label} attempt`, a),
  });
  if (result.ok) return result.data;
  env.logger.warn(`${call.label} failed, using default`, { reason: result.error.reason });
  return null;
}

function ellipsis(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

async function checkRedundancy(report: string, env: StageEnv): Promise<QaCheckResult> {
  const data = await review(
    {
      label: 'Redundancy check',
      system: REVIEWER_SYSTEM,
      prompt: buildPrompt(REDUNDANCY_PROMPT, { report: truncateForPrompt(report, 10000) }),
      requiredKeys: ['redundancy_score'],
      schema: redundancySchema,
    },
    env,
  );
  const score = data?.redundancy_score ?? DEFAULT_CHECK_SCORE;
  const threshold = wordCount(report) > 2000 ? 3 : 5;
  return {
    name: 'redundancy',
    score,
    issues: [],
    warnings: score < threshold ? [`High redundancy detected (score: ${score}/10)`] : [],
    source: data ? 'generated' : 'default',
  };
}

async function checkTone(report: string, env: StageEnv): Promise<QaCheckResult> {
  const data = await review(
    {
      label: 'Tone check',
      system: REVIEWER_SYSTEM,
      prompt: buildPrompt(TONE_PROMPT, { report: truncateForPrompt(report, 10000) }),
      requiredKeys: ['tone_score'],
      schema: toneSchema,
    },
    env,
  );
  const score = data?.tone_score ?? DEFAULT_CHECK_SCORE;
  return {
    name: 'tone',
    score,
    issues: [],
    warnings: score < 4 ? [`Tone inconsistency detected (score: ${score}/10)`] : [],
    source: data ? 'generated' : 'default',
  };
}

async function checkCitations(report: string, research: ResearchResult, env: StageEnv): Promise<QaCheckResult> {
  const citations = research.citations
    .slice(0, 10)
    .map((c) => `- ${c.source}${c.year ? ` ${c.year}` : ''}${c.type ? `: ${c.type}` : ''}`)
    .join('\n');
  const data = await review(
    {
      label: 'Citation check',
      system: REVIEWER_SYSTEM,
      prompt: buildPrompt(CITATION_PROMPT, {
        report: truncateForPrompt(report, 10000),
        citations: citations || 'No citations available',
      }),
      requiredKeys: ['citation_score'],
      knownKeys: ['uncited_claims', 'issues_found'],
      schema: citationSchema,
    },
    env,
  );

  const score = data?.citation_score ?? DEFAULT_CHECK_SCORE;
  const issues: string[] = [];
  const warnings: string[] = [];
  if (data && score < 6) {
    const uncited = data.issues_found ?? data.uncited_claims.length;
    if (uncited > 2) {
      issues.push(`Too many uncited claims found: ${uncited}`);
      for (const claim of data.uncited_claims.slice(0, 3)) {
        if (claim.issue === 'claim not found in research data') {
          issues.push(`CRITICAL: Unfounded claim - ${ellipsis(claim.claim)}`);
        } else {
          warnings.push(`Missing citation: ${ellipsis(claim.claim)}`);
        }
      }
    }
  }
  return { name: 'citations', score, issues, warnings, source: data ? 'generated' : 'default' };
}

async function checkOutcomeFraming(sections: ReportSections, env: StageEnv): Promise<QaCheckResult> {
  const data = await review(
    {
      label: 'Outcome framing check',
      system: REVIEWER_SYSTEM,
      prompt: buildPrompt(FRAMING_PROMPT, {
        recommendations: truncateForPrompt(sections.recommendations, 3000),
        nextSteps: truncateForPrompt(sections.nextSteps, 2000),
      }),
      requiredKeys: ['framing_score'],
      knownKeys: ['violations_found', 'specific_violations', 'non_range_numbers'],
      schema: framingSchema,
    },
    env,
  );

  const framing: FramingReport = data
    ? {
        framingScore: data.framing_score,
        violations: data.specific_violations,
        promiseLanguage: [],
        nonRangeNumbers: data.non_range_numbers,
      }
    : detectPromiseLanguage(`${sections.recommendations}\n${sections.nextSteps}`);
  const violationCount = data ? Math.max(data.violations_found, data.specific_violations.length) : framing.violations.length;

  const issues: string[] = [];
  const warnings: string[] = [];
  if (framing.framingScore < 7 && violationCount > 0) {
    issues.push(`Outcome framing violations found: ${violationCount}`);
    for (const violation of framing.violations.slice(0, 3)) {
      issues.push(`PROMISE LANGUAGE: ${ellipsis(violation.text)} - ${violation.issue}`);
    }
    if (framing.nonRangeNumbers.length > 0) {
      warnings.push(`Specific percentages should be ranges: ${framing.nonRangeNumbers.slice(0, 3).join(', ')}`);
    }
  }
  return {
    name: 'outcomeFraming',
    score: framing.framingScore,
    issues,
    warnings,
    source: data ? 'generated' : 'regex',
  };
}

interface Evaluation {
  checks: QaChecks;
  issues: string[];
  warnings: string[];
  criticalIssues: string[];
  qualityScore: number;
  approved: boolean;
}

async function evaluate(
  sections: ReportSections,
  report: string,
  scoring: ScoringResult,
  research: ResearchResult,
  env: StageEnv,
): Promise<Evaluation> {
  const [redundancy, tone, citations, outcomeFraming] = await Promise.all([
    checkRedundancy(report, env),
    checkTone(report, env),
    checkCitations(report, research, env),
    checkOutcomeFraming(sections, env),
  ]);

  const checks: QaChecks = {
    scoringConsistency: checkScoringConsistency(scoring.consistency),
    contentQuality: checkContentQuality(sections),
    piiCompliance: checkPiiCompliance(report),
    structure: checkStructure(sections, scoring.categoryScores),
    redundancy,
    tone,
    citations,
    outcomeFraming,
  };

  const all = Object.values(checks);
  const issues = all.flatMap((c) => c.issues);
  const warnings = all.flatMap((c) => c.warnings);
  const criticalIssues = issues.filter(isCriticalIssue);
  const qualityScore = calculateQualityScore(checks);

  return {
    checks,
    issues,
    warnings,
    criticalIssues,
    qualityScore,
    approved: criticalIssues.length === 0 && qualityScore >= APPROVAL_THRESHOLD,
  };
}

/** Rewritten text is only accepted when it keeps every placeholder and adds no PII. */
export function keepsPlaceholders(original: string, rewritten: string): boolean {
  const kept = new Set(piiTokensIn(rewritten));
  return piiTokensIn(original).every((token) => kept.has(token)) && scanForPii(rewritten).length === 0;
}

async function repairSections(
  sections: ReportSections,
  evaluation: Evaluation,
  scoring: ScoringResult,
  env: StageEnv,
): Promise<ReportSections | null> {
  const issues = evaluation.criticalIssues.length > 0 ? evaluation.criticalIssues : evaluation.issues;
  const fixes = await review(
    {
      label: 'Report repair',
      system: REPAIR_SYSTEM,
      prompt: buildPrompt(REPAIR_PROMPT, {
        issues: issues.map((i) => `- ${i}`).join('\n') || '- none',
        warnings: evaluation.warnings.map((w) => `- ${w}`).join('\n') || '- none',
        score: String(scoring.overallScore),
        tier: scoring.readinessTier,
        executiveSummary: truncateForPrompt(sections.executiveSummary, 2000),
        recommendations: truncateForPrompt(sections.recommendations, 3000),
        nextSteps: truncateForPrompt(sections.nextSteps, 2000),
      }),
      requiredKeys: [],
      knownKeys: ['executive_summary', 'recommendations', 'next_steps'],
      schema: repairSchema,
      temperature: 0.3,
    },
    env,
  );
  if (!fixes) return null;

  const accept = (original: string, rewritten: string | undefined): string =>
    rewritten !== undefined && keepsPlaceholders(original, rewritten) ? rewritten : original;

  const repaired: ReportSections = {
    ...sections,
    executiveSummary: accept(sections.executiveSummary, fixes.executive_summary),
    recommendations: accept(sections.recommendations, fixes.recommendations),
    nextSteps: accept(sections.nextSteps, fixes.next_steps),
  };
  const changed =
    repaired.executiveSummary !== sections.executiveSummary ||
    repaired.recommendations !== sections.recommendations ||
    repaired.nextSteps !== sections.nextSteps;
  if (!changed) {
    env.logger.warn('Repair returned no acceptable sections');
    return null;
  }
  return repaired;
}

async function polishSummary(
  sections: ReportSections,
  scoring: ScoringResult,
  env: StageEnv,
): Promise<ReportSections | null> {
  const polished = await review(
    {
      label: 'Polish',
      system: REPAIR_SYSTEM,
      prompt: buildPrompt(POLISH_PROMPT, {
        score: String(scoring.overallScore),
        tier: scoring.readinessTier,
        executiveSummary: sections.executiveSummary,
      }),
      requiredKeys: ['executive_summary'],
      schema: polishSchema,
      temperature: 0.4,
    },
    env,
  );
  if (!polished) return null;

  const text = polished.executive_summary;
  if (!keepsPlaceholders(sections.executiveSummary, text)) {
    env.logger.warn('Discarding polish that dropped placeholders');
    return null;
  }
  if (detectPromiseLanguage(text).promiseLanguage.length > 0) {
    env.logger.warn('Discarding polish that introduced promise language');
    return null;
  }
  return { ...sections, executiveSummary: text };
}

export const qaStage: StageDefinition<'qa', 'research' | 'scoring' | 'summary'> = {
  name: 'qa',
  requires: ['research', 'scoring', 'summary'],

  async run(context, env) {
    const { research, scoring, summary } = context.results;
    const header = { overallScore: scoring.overallScore, readinessTier: scoring.readinessTier };

    let sections = summary.sections;
    let report = summary.report;
    let evaluation = await evaluate(sections, report, scoring, research, env);
    env.logger.info('Initial QA evaluation', {
      qualityScore: evaluation.qualityScore,
      criticalIssues: evaluation.criticalIssues,
    });

    let repairAttempts = 0;
    while (
      !evaluation.approved &&
      repairAttempts < MAX_REPAIR_ATTEMPTS &&
      (evaluation.criticalIssues.length > 0 || evaluation.qualityScore < REPAIR_SCORE_FLOOR)
    ) {
      repairAttempts += 1;
      const repaired = await repairSections(sections, evaluation, scoring, env);
      if (!repaired) break;
      sections = repaired;
      report = assembleReport(sections, header);
      evaluation = await evaluate(sections, report, scoring, research, env);
      env.logger.info(`Re-evaluated after repair ${repairAttempts}`, { qualityScore: evaluation.qualityScore });
    }

    let polished = false;
    if (evaluation.approved) {
      const result = await polishSummary(sections, scoring, env);
      if (result) {
        sections = result;
        report = assembleReport(sections, header);
        polished = true;
      }
    }

    const { approved, qualityScore, criticalIssues } = evaluation;
    const readyForDelivery = approved && evaluation.checks.piiCompliance.score === 10;

    return {
      ok: true,
      result: {
        approved,
        readyForDelivery,
        qualityScore,
        checks: evaluation.checks,
        criticalIssues,
        issues: evaluation.issues,
        warnings: evaluation.warnings,
        sections,
        report,
        repairAttempts,
        polished,
      },
      status:
        `QA ${approved ? 'approved' : 'not approved'}: quality ${qualityScore}/10, ` +
        `${criticalIssues.length} critical issue(s), ${repairAttempts} repair attempt(s)`,
      warnings: approved
        ? []
        : [`Report not approved: ${criticalIssues.length > 0 ? criticalIssues.join('; ') : `quality ${qualityScore}/10`}`],
    };
  },
};
