/**
 * Summary stage: personalised narrative over the scores and research, with a
 * deterministic template when generation does not produce usable sections.
 */

import { z } from 'zod';
import { buildPrompt, requestStructured } from '@exitready/llm';
import type { Questionnaire } from '@exitready/schemas';
import { OWNER_NAME_TOKEN } from '../intake/pii-redactor.js';
import type { ResearchResult } from '../research/types.js';
import { CATEGORY_ORDER, CATEGORY_TABLE } from '../scoring/categories.js';
import type { ScoringResult } from '../scoring/types.js';
import type { StageDefinition } from '../shared/run-context.js';
import { wordCount } from '../shared/text.js';
import { buildDefaultSections } from './default-sections.js';
import { assembleReport } from './report.js';
import { sectionTitles, timelineProfile } from './timeline.js';
import type { ReportSections, TimelineProfile } from './types.js';

export const sectionTextSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('\n') : value).trim())
  .pipe(z.string().min(1));

export const narrativeSchema = z
  .object({
    executive_summary: sectionTextSchema,
    category_summaries: z.object({
      owner_dependence: sectionTextSchema,
      revenue_quality: sectionTextSchema,
      financial_readiness: sectionTextSchema,
      operational_resilience: sectionTextSchema,
      growth_value: sectionTextSchema,
    }),
    recommendations: sectionTextSchema,
    industry_context: sectionTextSchema,
    next_steps: sectionTextSchema,
  })
  .transform(
    (n): ReportSections => ({
      executiveSummary: n.executive_summary,
      categorySummaries: {
        OWNER_DEPENDENCE: n.category_summaries.owner_dependence,
        REVENUE_QUALITY: n.category_summaries.revenue_quality,
        FINANCIAL_READINESS: n.category_summaries.financial_readiness,
        OPERATIONAL_RESILIENCE: n.category_summaries.operational_resilience,
        GROWTH_VALUE: n.category_summaries.growth_value,
      },
      recommendations: n.recommendations,
      industryContext: n.industry_context,
      nextSteps: n.next_steps,
    }),
  );

const NARRATIVE_REQUIRED_KEYS = [
  'executive_summary',
  'category_summaries',
  'recommendations',
  'industry_context',
  'next_steps',
] as const;

const NARRATIVE_KNOWN_KEYS = [
  'owner_dependence',
  'revenue_quality',
  'financial_readiness',
  'operational_resilience',
  'growth_value',
] as const;

const NARRATIVE_SYSTEM_PROMPT = `You are an M&A advisor writing an exit readiness report for a business owner.
Address the owner as ${OWNER_NAME_TOKEN} and keep every placeholder in square brackets exactly as written.
Frame outcomes as ranges that are typical for similar businesses. Never promise results and never use "will increase", "guaranteed" or "definitely".
Cite the research source and year when you use a figure.`;

const NARRATIVE_TEMPLATE = `Business: {industry} in {location}, {years} in business, revenue {revenue}.
Exit timeline: {exitTimeline} ({timelineHeader}; focus: {timelineFocus}).

Overall score: {overall}/10 ({tier}).
Category scores:
{categories}

Primary focus: {primaryTitle} ({primaryScore}/10), typical value improvement {primaryRange}.
Secondary focus: {secondaryTitle} ({secondaryScore}/10), typical value improvement {secondaryRange}.

Benchmarks: owner away {ownerDays} days, customer concentration below {concentration}%, recurring revenue above {recurring}% ({premium}), EBITDA margin {margin}.

Research sources: {sources}

Return a JSON object with:
- "executive_summary": 200-250 words opening with ${OWNER_NAME_TOKEN}
- "category_summaries": {"owner_dependence", "revenue_quality", "financial_readiness", "operational_resilience", "growth_value"}, 150-200 words each
- "recommendations": sections titled "{focusTitle}", "{quickWinsTitle}" and "{strategicTitle}"
- "industry_context": market conditions and buyer priorities for {industry}
- "next_steps": sections titled "{immediateTitle}", "{monthTitle}" and "{quarterTitle}"`;

function categoryLines(scoring: ScoringResult): string {
  return CATEGORY_ORDER.map((category) => {
    const score = scoring.categoryScores[category];
    const gaps = score.gaps.length > 0 ? score.gaps.join('; ') : 'none';
    const strengths = score.strengths.length > 0 ? score.strengths.join('; ') : 'none';
    return `- ${CATEGORY_TABLE[category].title}: ${score.score}/10. Strengths: ${strengths}. Gaps: ${gaps}.`;
  }).join('\n');
}

export function buildNarrativePrompt(
  questionnaire: Questionnaire,
  scoring: ScoringResult,
  research: ResearchResult,
  timeline: TimelineProfile,
): string {
  const titles = sectionTitles(timeline);
  const { primary, secondary } = scoring.focusAreas;
  const { benchmarks } = research;

  return buildPrompt(NARRATIVE_TEMPLATE, {
    industry: questionnaire.industry,
    location: questionnaire.location,
    years: questionnaire.yearsInBusiness,
    revenue: questionnaire.revenueRange ?? 'not disclosed',
    exitTimeline: questionnaire.exitTimeline,
    timelineHeader: timeline.header,
    timelineFocus: timeline.focus,
    overall: String(scoring.overallScore),
    tier: scoring.readinessTier,
    categories: categoryLines(scoring),
    primaryTitle: primary.title,
    primaryScore: String(primary.score),
    primaryRange: primary.improvementRange,
    secondaryTitle: secondary.title,
    secondaryScore: String(secondary.score),
    secondaryRange: secondary.improvementRange,
    ownerDays: String(benchmarks.ownerIndependenceDays),
    concentration: String(benchmarks.customerConcentrationThreshold),
    recurring: String(benchmarks.recurringRevenueThreshold),
    premium: benchmarks.recurringRevenuePremium,
    margin: benchmarks.expectedMarginRange,
    sources: research.citations.map((c) => `${c.source}${c.year ? ` ${c.year}` : ''}`).join('; ') || 'none',
    focusTitle: titles.focus,
    quickWinsTitle: titles.quickWins,
    strategicTitle: titles.strategic,
    immediateTitle: titles.immediate,
    monthTitle: titles.month,
    quarterTitle: titles.quarter,
  });
}

export const summaryStage: StageDefinition<'summary', 'intake' | 'research' | 'scoring'> = {
  name: 'summary',
  requires: ['intake', 'research', 'scoring'],

  async run(context, env) {
    const { anonymized } = context.results.intake;
    const { research, scoring } = context.results;
    const timeline = timelineProfile(anonymized.exitTimeline);

    const narrative = await requestStructured({
      generator: env.deps.generator,
      systemPrompt: NARRATIVE_SYSTEM_PROMPT,
      userPrompt: buildNarrativePrompt(anonymized, scoring, research, timeline),
      requiredKeys: NARRATIVE_REQUIRED_KEYS,
      knownKeys: NARRATIVE_KNOWN_KEYS,
      schema: narrativeSchema,
      maxRetries: env.maxRetries,
      temperature: 0.5,
      maxTokens: 4000,
      signal: env.signal,
      onAttempt: (a) => env.logger.debug('Narrative attempt', a),
    });

    let sections: ReportSections;
    let fallbackReason: string | undefined;
    if (narrative.ok) {
      sections = narrative.data;
    } else {
      fallbackReason = narrative.error.reason;
      env.logger.warn('Narrative generation failed, using template sections', {
        reason: fallbackReason,
        attempts: narrative.error.attempts,
      });
      sections = buildDefaultSections(anonymized, scoring, research, timeline);
    }

    const report = assembleReport(sections, {
      overallScore: scoring.overallScore,
      readinessTier: scoring.readinessTier,
    });
    const words = wordCount(report);
    const usedFallback = fallbackReason !== undefined;

    return {
      ok: true,
      result: { sections, report, timeline, usedFallback, fallbackReason, wordCount: words },
      status: `Summary complete (${usedFallback ? 'template' : 'generated'}): ${words} words, ${timeline.header}`,
      warnings: fallbackReason ? [`Summary used template sections: ${fallbackReason}`] : [],
    };
  },
};
