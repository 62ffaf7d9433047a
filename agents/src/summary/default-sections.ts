/**
 * Deterministic report sections built from scores and research data. Used
 * whenever narrative generation does not produce a usable payload.
 */

import type { Questionnaire } from '@exitready/schemas';
import { OWNER_NAME_TOKEN } from '../intake/pii-redactor.js';
import type { ResearchResult } from '../research/types.js';
import { CATEGORY_TABLE } from '../scoring/categories.js';
import type { CategoryScore, ScoringResult } from '../scoring/types.js';
import { sectionTitles } from './timeline.js';
import type { ReportSections, TimelineProfile } from './types.js';

type Dict = Record<string, unknown>;

function isDict(value: unknown): value is Dict {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function cite(entry: Dict): string {
  const source = text(entry.source);
  const year = text(entry.year);
  return source ? ` (${source}${year ? ` ${year}` : ''})` : '';
}

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join('; ') : 'none identified';
}

function categorySummary(score: CategoryScore): string {
  const { title } = CATEGORY_TABLE[score.category];
  return (
    `${title} scored ${score.score}/10. ` +
    `Strengths: ${listOrNone(score.strengths)}. ` +
    `Gaps: ${listOrNone(score.gaps)}. ` +
    `Benchmark: ${score.industryContext.benchmark}. ${score.industryContext.impact}.`
  );
}

function strategyLines(research: ResearchResult): string[] {
  const strategies = research.data.improvement_strategies;
  if (!isDict(strategies)) return [];
  return Object.values(strategies)
    .filter(isDict)
    .flatMap((entry) => {
      const strategy = text(entry.strategy);
      if (!strategy) return [];
      const timeline = text(entry.timeline);
      const impact = text(entry.value_impact);
      return [
        `• ${strategy}${timeline ? ` over ${timeline}` : ''}` +
          `${impact ? `; businesses typically see ${impact} value improvement` : ''}${cite(entry)}`,
      ];
    });
}

function marketLines(research: ResearchResult): string[] {
  const market = research.data.market_conditions;
  if (!isDict(market)) return [];
  const lines: string[] = [];

  if (Array.isArray(market.buyer_priorities)) {
    for (const entry of market.buyer_priorities.filter(isDict)) {
      const priority = text(entry.priority);
      if (priority) lines.push(`• ${priority}: ${text(entry.percentage) ?? 'a common priority'}${cite(entry)}`);
    }
  }
  if (isDict(market.average_sale_time)) {
    const duration = text(market.average_sale_time.duration);
    if (duration) lines.push(`• Businesses typically take ${duration} to sell${cite(market.average_sale_time)}`);
  }
  return lines;
}

export function buildDefaultSections(
  questionnaire: Questionnaire,
  scoring: ScoringResult,
  research: ResearchResult,
  timeline: TimelineProfile,
): ReportSections {
  const titles = sectionTitles(timeline);
  const { primary, secondary } = scoring.focusAreas;
  const scores = scoring.categoryScores;

  const executiveSummary =
    `${OWNER_NAME_TOKEN}, thank you for completing the Exit Ready Snapshot for your ${questionnaire.industry} business. ` +
    `Your overall exit readiness score is ${scoring.overallScore}/10, which places the business at "${scoring.readinessTier}". ` +
    `With an exit timeline of "${questionnaire.exitTimeline}" (${timeline.header}), the priority is ${timeline.focus.toLowerCase()}. ` +
    `The area with the most room for improvement is ${primary.title} at ${primary.score}/10; ` +
    `businesses that strengthen this area typically see a ${primary.improvementRange} improvement in value. ` +
    `${secondary.title} (${secondary.score}/10) is the second priority.` +
    (scoring.topStrengths.length > 0 ? ` Current strengths include: ${scoring.topStrengths.join('; ')}.` : '');

  const strategies = strategyLines(research);
  const recommendations = [
    `${titles.focus}: ${primary.title}`,
    primary.gaps.length > 0 ? primary.gaps.map((g) => `• Address: ${g}`).join('\n') : `• Raise ${primary.title} toward 8/10`,
    '',
    titles.quickWins,
    ...(secondary.gaps.length > 0 ? secondary.gaps.slice(0, 3).map((g) => `• ${g}`) : [`• Review ${secondary.title}`]),
    '',
    titles.strategic,
    ...(strategies.length > 0 ? strategies : ['• Work with an exit advisor on a staged improvement plan']),
  ].join('\n');

  const market = marketLines(research);
  const industryContext = [
    `Benchmarks for ${questionnaire.industry} businesses: owners are expected to be away ${research.benchmarks.ownerIndependenceDays}+ days, ` +
      `no customer group should exceed ${research.benchmarks.customerConcentrationThreshold}% of revenue, ` +
      `and recurring revenue above ${research.benchmarks.recurringRevenueThreshold}% typically earns ${research.benchmarks.recurringRevenuePremium}.`,
    ...market,
  ].join('\n');

  const nextSteps = [
    titles.immediate,
    `• Review the ${primary.title} gaps listed above with your leadership team`,
    '',
    titles.month,
    `• Start the first ${titles.quickWins.toLowerCase()} item and assign an owner to it`,
    '',
    titles.quarter,
    `• Re-assess ${primary.title} and ${secondary.title}; owners who follow a plan typically see steady score gains`,
  ].join('\n');

  return {
    executiveSummary,
    categorySummaries: {
      OWNER_DEPENDENCE: categorySummary(scores.OWNER_DEPENDENCE),
      REVENUE_QUALITY: categorySummary(scores.REVENUE_QUALITY),
      FINANCIAL_READINESS: categorySummary(scores.FINANCIAL_READINESS),
      OPERATIONAL_RESILIENCE: categorySummary(scores.OPERATIONAL_RESILIENCE),
      GROWTH_VALUE: categorySummary(scores.GROWTH_VALUE),
    },
    recommendations,
    industryContext,
    nextSteps,
  };
}
