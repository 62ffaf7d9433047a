import { round1 } from '../shared/text.js';
import { CATEGORY_ORDER } from './categories.js';
import type { CategoryScores, ConsistencyReport } from './types.js';

/**
 * Cross-check category scores against the overall score and their own gap lists.
 */
export function validateScoringConsistency(scores: CategoryScores, overall: number): ConsistencyReport {
  const issues: string[] = [];
  const warnings: string[] = [];
  const values = CATEGORY_ORDER.map((c) => scores[c].score);

  let weighted = 0;
  let totalWeight = 0;
  for (const category of CATEGORY_ORDER) {
    weighted += scores[category].score * scores[category].weight;
    totalWeight += scores[category].weight;
  }
  const expectedOverall = totalWeight > 0 ? round1(weighted / totalWeight) : 0;

  if (Math.abs(overall - expectedOverall) > 1.5) {
    issues.push(`Overall score (${overall}) doesn't match weighted average (${expectedOverall})`);
  }

  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max - min > 5) {
    warnings.push(`Large score variance (${round1(max - min)}) between categories`);
  }

  for (const category of CATEGORY_ORDER) {
    const { score, gaps } = scores[category];
    if (score < 4 && gaps.length === 0) {
      issues.push(`Low score (${score}) in ${category} lacks gap identification`);
    }
  }

  return { isConsistent: issues.length === 0, issues, warnings, expectedOverall, scoreRange: [min, max] };
}
