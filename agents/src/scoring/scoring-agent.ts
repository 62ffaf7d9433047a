/**
 * Scoring stage: five deterministic category scorers plus aggregation.
 *
 * LLM Usage: None (pure code logic)
 */

import type { QuestionnaireResponses, ScoringCategory } from '@exitready/schemas';
import type { Benchmarks } from '../research/types.js';
import type { StageDefinition } from '../shared/run-context.js';
import {
  calculateOverallScore,
  criticalGaps,
  identifyFocusAreas,
  readinessTier,
  topStrengths,
} from './aggregate.js';
import { CATEGORY_ORDER } from './categories.js';
import { CATEGORY_SCORERS, type ScorerInput } from './category-scorers.js';
import { validateScoringConsistency } from './consistency.js';
import { getIndustryProfile, loadIndustryProfiles } from './industry-profiles.js';
import {
  categoryScoreSchema,
  type CategoryScore,
  type CategoryScores,
  type ScoringResult,
} from './types.js';

export interface ScoreAssessmentInput {
  responses: QuestionnaireResponses;
  benchmarks: Benchmarks;
  industry: string;
  exitTimeline: string;
}

export function scoreCategories(input: Omit<ScoreAssessmentInput, 'exitTimeline'>): CategoryScores {
  const scorerInput: ScorerInput = {
    ...input,
    profile: getIndustryProfile(input.industry),
    valuePhrases: loadIndustryProfiles().genericValuePhrases,
  };

  const run = (category: ScoringCategory): CategoryScore =>
    Object.freeze(categoryScoreSchema.parse(CATEGORY_SCORERS[category](scorerInput)));

  return {
    OWNER_DEPENDENCE: run('OWNER_DEPENDENCE'),
    REVENUE_QUALITY: run('REVENUE_QUALITY'),
    FINANCIAL_READINESS: run('FINANCIAL_READINESS'),
    OPERATIONAL_RESILIENCE: run('OPERATIONAL_RESILIENCE'),
    GROWTH_VALUE: run('GROWTH_VALUE'),
  };
}

/**
 * Score an assessment end to end. Deterministic for identical input.
 */
export function scoreAssessment(input: ScoreAssessmentInput): ScoringResult {
  const categoryScores = scoreCategories(input);
  const overallScore = calculateOverallScore(categoryScores);

  return {
    categoryScores,
    overallScore,
    readinessTier: readinessTier(overallScore),
    focusAreas: identifyFocusAreas(categoryScores, input.exitTimeline),
    topStrengths: topStrengths(categoryScores),
    criticalGaps: criticalGaps(categoryScores),
    consistency: validateScoringConsistency(categoryScores, overallScore),
  };
}

export const scoringStage: StageDefinition<'scoring', 'intake' | 'research'> = {
  name: 'scoring',
  requires: ['intake', 'research'],

  async run(context, env) {
    const { anonymized } = context.results.intake;
    const result = scoreAssessment({
      responses: anonymized.responses,
      benchmarks: context.results.research.benchmarks,
      industry: anonymized.industry,
      exitTimeline: anonymized.exitTimeline,
    });

    for (const category of CATEGORY_ORDER) {
      env.logger.debug(`${category}: ${result.categoryScores[category].score}`, result.categoryScores[category].adjustments);
    }
    if (!result.consistency.isConsistent) {
      env.logger.warn('Scoring consistency issues', result.consistency.issues);
    }

    return {
      ok: true,
      result,
      status: `Scoring complete: overall ${result.overallScore}/10 (${result.readinessTier}), primary focus ${result.focusAreas.primary.title}`,
      warnings: result.consistency.issues,
    };
  },
};
