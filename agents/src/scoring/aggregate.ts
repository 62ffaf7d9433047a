/**
 * Aggregation: overall score, readiness tier, focus areas, strengths and gaps.
 */

import type { ReadinessTier, ScoringCategory, Urgency } from '@exitready/schemas';
import { round1 } from '../shared/text.js';
import { CATEGORY_ORDER, CATEGORY_TABLE } from './categories.js';
import type { CategoryScore, CategoryScores, CriticalGap, FocusArea, FocusAreas } from './types.js';

export const TIER_THRESHOLDS: ReadonlyArray<readonly [number, ReadinessTier]> = [
  [8.1, 'Exit Ready'],
  [6.6, 'Approaching Ready'],
  [4.1, 'Needs Work'],
];

function inTableOrder(scores: CategoryScores): CategoryScore[] {
  return CATEGORY_ORDER.map((category) => scores[category]);
}

/** Weighted mean of category scores at one decimal. */
export function calculateOverallScore(scores: CategoryScores): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const { score, weight } of inTableOrder(scores)) {
    weighted += score * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? round1(weighted / totalWeight) : 5.0;
}

export function readinessTier(overall: number): ReadinessTier {
  for (const [minimum, tier] of TIER_THRESHOLDS) {
    if (overall >= minimum) return tier;
  }
  return 'Not Ready';
}

const CRITICAL_TIMELINE =
  /\balready\b|\bactively (selling|marketing|looking|seeking|in)\b|\b6 months|less than (1|one|a) year|within (1|one|a) year|0-6|6-12 months/i;
const HIGH_TIMELINE = /1\s*-\s*2 years|12-24 months|18 months/i;
/** "Not actively considering", "No plans to sell" */
export const NO_EXIT_PLANS = /^\s*(not|no)\b/i;

export function timelineUrgency(exitTimeline: string): Urgency {
  if (NO_EXIT_PLANS.test(exitTimeline)) return 'MODERATE';
  if (CRITICAL_TIMELINE.test(exitTimeline)) return 'CRITICAL';
  if (HIGH_TIMELINE.test(exitTimeline)) return 'HIGH';
  return 'MODERATE';
}

/**
 * Value improvement range for raising a category toward 8.0, e.g. "10-21%".
 */
export function improvementRange(category: ScoringCategory, score: number): string {
  const raw = ((8.0 - score) / 10.0) * CATEGORY_TABLE[category].impactMultiplier * 100;
  // Absorb float noise such as 20.999999999999996 before flooring.
  const high = Math.max(0, Math.floor(Math.round(raw * 1000) / 1000));
  const low = Math.floor(high / 2);
  return `${low}-${high}%`;
}

/** Categories from weakest to strongest; ties keep table order. */
export function rankCategories(scores: CategoryScores): CategoryScore[] {
  return inTableOrder(scores).sort((a, b) => a.score - b.score);
}

function toFocusArea(score: CategoryScore): FocusArea {
  return {
    category: score.category,
    title: CATEGORY_TABLE[score.category].title,
    score: score.score,
    gaps: [...score.gaps],
    improvementRange: improvementRange(score.category, score.score),
  };
}

export function identifyFocusAreas(scores: CategoryScores, exitTimeline: string): FocusAreas {
  const [primary, secondary] = rankCategories(scores);
  return {
    primary: toFocusArea(primary),
    secondary: toFocusArea(secondary),
    urgency: timelineUrgency(exitTimeline),
  };
}

/** First two strengths per category, at most five overall. */
export function topStrengths(scores: CategoryScores): string[] {
  return inTableOrder(scores)
    .flatMap((s) => s.strengths.slice(0, 2))
    .slice(0, 5);
}

/** Categories below 5.0, weakest first, at most three. */
export function criticalGaps(scores: CategoryScores): CriticalGap[] {
  return rankCategories(scores)
    .filter((s) => s.score < 5.0)
    .slice(0, 3)
    .map((s) => ({ category: s.category, score: s.score, gaps: s.gaps.slice(0, 3) }));
}
