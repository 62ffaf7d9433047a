/**
 * The five category scorers. Pure functions of the (anonymised) answers,
 * the benchmarks and the industry profile.
 */

import type { QuestionnaireResponses, ScoringCategory } from '@exitready/schemas';
import type { Benchmarks } from '../research/types.js';
import { round1 } from '../shared/text.js';
import { DOCUMENTATION_CUTOFFS } from './industry-profiles.js';
import { ScoreBuilder } from './score-builder.js';
import {
  DELEGATION_PATTERN,
  DISTRIBUTED_KNOWLEDGE_PATTERN,
  DOES_EVERYTHING_PATTERN,
  NEGATIVE_ANSWER_PATTERN,
  RECURRING_PATTERN,
  SOLE_KNOWLEDGE_PATTERN,
  classifyMarginTrend,
  concentrationMidpoint,
  countRevenueStreams,
  firstPersonDensity,
  parseDaysWithoutOwner,
  parseScale,
} from './signals.js';
import type { CategoryScore, IndustryProfile, ValuePhrase } from './types.js';

export interface ScorerInput {
  responses: QuestionnaireResponses;
  benchmarks: Benchmarks;
  industry: string;
  profile: IndustryProfile;
  valuePhrases: readonly ValuePhrase[];
}

export type CategoryScorer = (input: ScorerInput) => CategoryScore;

/** Delta for days without the owner: -2.0 at zero, +3.5 at twice the threshold or more. */
export function ownerIndependenceDelta(days: number, threshold: number): number {
  return round1(-2.0 + 5.5 * Math.min(days / (2 * threshold), 1));
}

export function scoreOwnerDependence({ responses, benchmarks, industry }: ScorerInput): CategoryScore {
  const builder = new ScoreBuilder('OWNER_DEPENDENCE');
  const threshold = benchmarks.ownerIndependenceDays;

  const density = firstPersonDensity(responses.q1);
  if (density >= 0.15) {
    builder
      .adjust(-2.0, `Owner role described almost entirely in the first person (${Math.round(density * 100)}% of words)`)
      .gap('Owner is central to daily operations');
  } else if (density >= 0.08) {
    builder.adjust(-1.0, `Owner role described largely in the first person (${Math.round(density * 100)}% of words)`);
  }

  if (DOES_EVERYTHING_PATTERN.test(responses.q1)) {
    builder.adjust(-1.5, 'Owner handles most critical functions').gap('Owner handles too many critical functions');
  }
  if (DELEGATION_PATTERN.test(responses.q1)) {
    builder.adjust(1.5, 'Delegation to a team or managers described').strength('Delegation to a team is in place');
  }

  const days = parseDaysWithoutOwner(responses.q2);
  if (days === null) {
    builder.gap('Time the business can run without the owner was not reported');
  } else {
    builder.adjust(
      ownerIndependenceDelta(days, threshold),
      `Runs about ${days} day(s) without the owner against a ${threshold}-day benchmark`,
    );
    if (days === 0) builder.gap('Business cannot operate without the owner');
    else if (days >= 2 * threshold) builder.strength(`Runs ${days}+ days without the owner, well beyond the ${threshold}-day benchmark`);
    else if (days >= threshold) builder.strength(`Meets the ${threshold}-day owner independence benchmark`);
    else builder.gap(`Runs only about ${days} day(s) without the owner (benchmark ${threshold} days)`);
  }

  return builder.build({
    benchmark: `Buyers expect ${industry} businesses to run ${threshold}+ days without the owner`,
    impact: 'Owner-dependent businesses typically face lower multiples or earn-out structures',
  });
}

export function scoreRevenueQuality({ responses, benchmarks }: ScorerInput): CategoryScore {
  const builder = new ScoreBuilder('REVENUE_QUALITY');
  const threshold = benchmarks.customerConcentrationThreshold;

  const streams = countRevenueStreams(responses.q3);
  if (streams >= 3) {
    builder.adjust(1.0, `${streams} distinct revenue streams`).strength('Diversified revenue streams');
  } else if (streams === 1) {
    builder.adjust(-1.0, 'Single revenue stream').gap('Revenue depends on a single stream');
  }

  if (RECURRING_PATTERN.test(responses.q3)) {
    builder
      .adjust(1.5, `Recurring or contracted revenue described (buyers reward ${benchmarks.recurringRevenueThreshold}%+ recurring)`)
      .strength('Recurring or contracted revenue');
  } else {
    builder.gap(`No recurring revenue described (benchmark ${benchmarks.recurringRevenueThreshold}%+)`);
  }

  const midpoint = concentrationMidpoint(responses.q4);
  if (midpoint === null) {
    builder.gap('Customer concentration was not reported');
  } else {
    const ratio = midpoint / threshold;
    if (ratio < 0.75) {
      builder
        .adjust(2.5, `Top-customer share about ${midpoint}%, well below the ${threshold}% threshold`)
        .strength('Low customer concentration');
    } else if (ratio <= 1.25) {
      builder.adjust(1.0, `Top-customer share about ${midpoint}%, close to the ${threshold}% threshold`);
    } else if (ratio <= 2.0) {
      builder
        .adjust(-1.0, `Top-customer share about ${midpoint}%, above the ${threshold}% threshold`)
        .gap(`Customer concentration above ${threshold}% may cost ${benchmarks.concentrationDiscount} of value`);
    } else {
      builder
        .adjust(-2.5, `Top-customer share about ${midpoint}%, far above the ${threshold}% threshold`)
        .gap(`High customer concentration: buyers typically discount ${benchmarks.concentrationDiscount}`);
    }
  }

  return builder.build({
    benchmark: `Recurring revenue above ${benchmarks.recurringRevenueThreshold}% and no customer group above ${threshold}% of revenue`,
    impact: `Recurring revenue typically earns ${benchmarks.recurringRevenuePremium}; concentration typically costs ${benchmarks.concentrationDiscount}`,
  });
}

const MARGIN_TREND_DELTAS = {
  DECLINED_SIGNIFICANTLY: -2.0,
  DECLINED_SLIGHTLY: -1.0,
  FLAT: 0.0,
  IMPROVED_SLIGHTLY: 0.5,
  IMPROVED_SIGNIFICANTLY: 1.5,
  UNKNOWN: -1.5,
} as const;

export function scoreFinancialReadiness({ responses, benchmarks }: ScorerInput): CategoryScore {
  const builder = new ScoreBuilder('FINANCIAL_READINESS');
  const margin = benchmarks.expectedMarginRange;

  const confidence = parseScale(responses.q5);
  if (confidence === null) {
    builder.gap('Confidence in financial records was not reported');
  } else if (confidence >= 9) {
    builder.adjust(2.0, `Financial record confidence ${confidence}/10`).strength('Buyer-ready financial records');
  } else if (confidence >= 7) {
    builder.adjust(1.0, `Financial record confidence ${confidence}/10`).strength('Solid financial records');
  } else if (confidence >= 5) {
    builder.adjust(0.0, `Financial record confidence ${confidence}/10`);
  } else {
    builder.adjust(-1.0, `Financial record confidence ${confidence}/10`).gap('Financial records need cleanup before diligence');
    if (confidence <= 2) builder.gap('Critical: financial records are not buyer-ready');
  }

  const trend = classifyMarginTrend(responses.q6);
  if (trend === null) {
    builder.gap('Profit margin trend was not reported');
  } else {
    const delta = MARGIN_TREND_DELTAS[trend];
    const label = trend.toLowerCase().replace(/_/g, ' ');
    builder.adjust(delta, `Profit margins ${label} (expected EBITDA margin ${margin})`);
    if (delta > 0) builder.strength(`Profit margins ${label}`);
    else if (delta < 0) {
      builder.gap(
        trend === 'UNKNOWN'
          ? `Margin trend unknown; buyers expect margins around ${margin}`
          : `Declining margins against an expected ${margin}`,
      );
    }
  }

  return builder.build({
    benchmark: `Expected EBITDA margin: ${margin}`,
    impact: 'Clean, verifiable financials typically shorten due diligence and support the valuation',
  });
}

const RIGOR_LABELS = {
  STANDARD: 'standard',
  HIGH: 'high',
  VERY_HIGH: 'very high',
} as const;

export function scoreOperationalResilience({ responses, industry, profile }: ScorerInput): CategoryScore {
  const builder = new ScoreBuilder('OPERATIONAL_RESILIENCE');

  if (SOLE_KNOWLEDGE_PATTERN.test(responses.q7)) {
    builder.adjust(-3.0, 'Critical knowledge held by one person').gap('Critical knowledge is concentrated in one person');
  } else if (DISTRIBUTED_KNOWLEDGE_PATTERN.test(responses.q7)) {
    builder.adjust(2.0, 'Critical knowledge distributed across the team').strength('Knowledge is shared across the team');
  } else {
    builder.adjust(-1.0, 'Some key-person dependency in critical knowledge').gap('Some key person dependencies exist');
  }

  const documentation = parseScale(responses.q8);
  const [excellent, good, fair] = DOCUMENTATION_CUTOFFS[profile.documentationRigor];
  const rigor = RIGOR_LABELS[profile.documentationRigor];
  if (documentation === null) {
    builder.gap('Documentation confidence was not reported');
  } else if (documentation >= excellent) {
    builder.adjust(2.5, `Documentation ${documentation}/10 meets ${rigor} rigor`).strength('Processes are thoroughly documented');
  } else if (documentation >= good) {
    builder.adjust(1.5, `Documentation ${documentation}/10 against ${rigor} rigor`).strength('Most processes are documented');
  } else if (documentation >= fair) {
    builder.adjust(0.5, `Documentation ${documentation}/10 against ${rigor} rigor`);
  } else {
    builder.adjust(-1.0, `Documentation ${documentation}/10 below ${rigor} rigor`).gap('Processes are largely undocumented');
  }

  return builder.build({
    benchmark: `${industry} buyers expect ${rigor} documentation rigor`,
    impact: 'Documented, shared know-how typically reduces transition risk for buyers',
  });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentions(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase.toLowerCase())}s?\\b`).test(text);
}

export const MAX_VALUE_DRIVER_BONUS = 4.0;

export function scoreGrowthValue({ responses, profile, valuePhrases }: ScorerInput): CategoryScore {
  const builder = new ScoreBuilder('GROWTH_VALUE');
  const answer = responses.q9.toLowerCase();

  const industryHits = profile.valueDrivers.filter((driver) => mentions(answer, driver));
  const genericHits = valuePhrases.filter(
    (p) => !profile.valueDrivers.includes(p.phrase) && mentions(answer, p.phrase),
  );

  const bonus = Math.min(
    MAX_VALUE_DRIVER_BONUS,
    industryHits.length * 1.0 + genericHits.reduce((sum, p) => sum + p.weight, 0),
  );

  if (bonus > 0) {
    const drivers = [...industryHits, ...genericHits.map((p) => p.label.toLowerCase())];
    builder.adjust(bonus, `Value drivers: ${drivers.join(', ')}`);
    for (const hit of industryHits) builder.strength(`Industry value driver: ${hit}`);
    for (const hit of genericHits) builder.strength(hit.label);
  } else if (NEGATIVE_ANSWER_PATTERN.test(answer)) {
    builder.adjust(-1.0, 'No competitive advantage identified').gap('No clear competitive advantages identified');
  } else {
    builder.gap('Value proposition needs strengthening');
  }

  const growth = parseScale(responses.q10);
  if (growth === null) {
    builder.gap('Growth potential was not reported');
  } else {
    builder.adjust(0.3 * growth, `Growth potential ${growth}/10`);
    if (growth >= 8) builder.strength('High growth confidence');
    else if (growth <= 3) builder.gap('Limited growth expectations');
  }

  return builder.build({
    benchmark: 'Premium valuations require clear competitive moats',
    impact: 'Strong, documented value drivers typically lift multiples',
  });
}

export const CATEGORY_SCORERS: Readonly<Record<ScoringCategory, CategoryScorer>> = {
  OWNER_DEPENDENCE: scoreOwnerDependence,
  REVENUE_QUALITY: scoreRevenueQuality,
  FINANCIAL_READINESS: scoreFinancialReadiness,
  OPERATIONAL_RESILIENCE: scoreOperationalResilience,
  GROWTH_VALUE: scoreGrowthValue,
};
