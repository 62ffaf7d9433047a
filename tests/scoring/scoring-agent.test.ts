import { describe, it, expect } from 'vitest';
import {
  CATEGORY_TABLE,
  calculateOverallScore,
  extractBenchmarks,
  getIndustryProfile,
  improvementRange,
  loadFallbackResearch,
  readinessTier,
  scoreAssessment,
  timelineUrgency,
  validateScoringConsistency,
} from '@exitready/agents';
import type { QuestionnaireResponses } from '@exitready/schemas';

const ownerCentric: QuestionnaireResponses = {
  q1: 'I do everything myself. I handle sales, I do the books and I manage every client.',
  q2: "None - it can't run without me",
  q3: 'Project consulting',
  q4: '60-80%',
  q5: '2',
  q6: 'Declined significantly',
  q7: 'Only I know how the key processes work',
  q8: '2',
  q9: 'Nothing really',
  q10: '3',
};

const teamRun: QuestionnaireResponses = {
  q1: 'Our management team runs daily operations while the owner focuses on strategy and key partnerships.',
  q2: 'More than a month',
  q3: 'SaaS subscriptions, annual support contracts, implementation services, training',
  q4: '0-20%',
  q5: '9',
  q6: 'Improved slightly',
  q7: 'Knowledge is shared across the team and documented in our wiki',
  q8: '8',
  q9: 'Our intellectual property and development team are hard to replicate',
  q10: '8',
};

function score(responses: QuestionnaireResponses, industry: string, exitTimeline = '1-2 years') {
  return scoreAssessment({
    responses,
    benchmarks: extractBenchmarks(loadFallbackResearch(), industry),
    industry,
    exitTimeline,
  });
}

describe('scoreAssessment', () => {
  it('scores an owner-centric landscaping business as not ready', () => {
    const result = score(ownerCentric, 'Landscaping');
    const { categoryScores } = result;

    expect(categoryScores.OWNER_DEPENDENCE.score).toBe(1.0);
    expect(categoryScores.REVENUE_QUALITY.score).toBe(1.5);
    expect(categoryScores.FINANCIAL_READINESS.score).toBe(2.0);
    expect(categoryScores.OPERATIONAL_RESILIENCE.score).toBe(1.0);
    expect(categoryScores.GROWTH_VALUE.score).toBe(2.9);
    expect(result.overallScore).toBe(1.6);
    expect(result.readinessTier).toBe('Not Ready');
  });

  it('records gaps for the owner-centric answers', () => {
    const { categoryScores, criticalGaps } = score(ownerCentric, 'Landscaping');

    expect(categoryScores.OWNER_DEPENDENCE.gaps).toContain('Business cannot operate without the owner');
    expect(categoryScores.FINANCIAL_READINESS.gaps).toContain('Critical: financial records are not buyer-ready');
    expect(categoryScores.GROWTH_VALUE.gaps).toEqual([
      'No clear competitive advantages identified',
      'Limited growth expectations',
    ]);
    expect(criticalGaps.map((g) => g.category)).toEqual(['OWNER_DEPENDENCE', 'OPERATIONAL_RESILIENCE', 'REVENUE_QUALITY']);
  });

  it('picks the weakest categories as focus areas, ties in table order', () => {
    const { focusAreas } = score(ownerCentric, 'Landscaping', '6 months');

    expect(focusAreas.primary.category).toBe('OWNER_DEPENDENCE');
    expect(focusAreas.primary.improvementRange).toBe('10-21%');
    expect(focusAreas.secondary.category).toBe('OPERATIONAL_RESILIENCE');
    expect(focusAreas.urgency).toBe('CRITICAL');
  });

  it('scores a team-run technology business as exit ready', () => {
    const result = score(teamRun, 'Technology');
    const { categoryScores } = result;

    expect(categoryScores.OWNER_DEPENDENCE.score).toBe(10.0);
    expect(categoryScores.REVENUE_QUALITY.score).toBe(10.0);
    expect(categoryScores.FINANCIAL_READINESS.score).toBe(7.5);
    expect(categoryScores.OPERATIONAL_RESILIENCE.score).toBe(8.5);
    expect(categoryScores.GROWTH_VALUE.score).toBe(7.4);
    expect(result.overallScore).toBe(8.9);
    expect(result.readinessTier).toBe('Exit Ready');
    expect(result.criticalGaps).toEqual([]);
  });

  it('credits industry value drivers', () => {
    const { categoryScores } = score(teamRun, 'Technology');
    expect(categoryScores.GROWTH_VALUE.strengths).toEqual([
      'Industry value driver: intellectual property',
      'Industry value driver: development team',
      'High growth confidence',
    ]);
  });

  it('labels the margin trend in plain words', () => {
    const financial = score(teamRun, 'Technology').categoryScores.FINANCIAL_READINESS;
    expect(financial.strengths).toContain('Profit margins improved slightly');
    expect(financial.adjustments.map((a) => a.reason).filter((r) => r.includes('_'))).toEqual([]);
  });

  it('keeps every category within 1-10 and the weights summing to one', () => {
    const total = Object.values(CATEGORY_TABLE).reduce((sum, c) => sum + c.weight, 0);
    expect(total).toBeCloseTo(1.0, 10);

    for (const responses of [ownerCentric, teamRun]) {
      for (const category of Object.values(score(responses, 'Technology').categoryScores)) {
        expect(category.score).toBeGreaterThanOrEqual(1);
        expect(category.score).toBeLessThanOrEqual(10);
      }
    }
  });

  it('stays within 1-10 on empty answers and extreme scales', () => {
    const blank: QuestionnaireResponses = {
      q1: '', q2: '', q3: '', q4: '', q5: '0', q6: '', q7: '', q8: '0', q9: '', q10: '0',
    };
    const maxed: QuestionnaireResponses = {
      ...teamRun,
      q3: '',
      q5: '10',
      q8: '10',
      q10: '10',
    };

    for (const responses of [blank, maxed]) {
      const result = score(responses, 'Landscaping');
      for (const category of Object.values(result.categoryScores)) {
        expect(category.score).toBeGreaterThanOrEqual(1);
        expect(category.score).toBeLessThanOrEqual(10);
      }
      expect(result.overallScore).toBeGreaterThanOrEqual(1);
      expect(result.overallScore).toBeLessThanOrEqual(10);
    }
  });

  it('is deterministic for identical input', () => {
    expect(score(ownerCentric, 'Landscaping')).toEqual(score(ownerCentric, 'Landscaping'));
  });

  it('reports consistent scores', () => {
    const result = score(ownerCentric, 'Landscaping');
    expect(result.consistency.isConsistent).toBe(true);
    expect(result.consistency.expectedOverall).toBe(1.6);
  });
});

describe('aggregation helpers', () => {
  it('maps overall scores to tiers at the thresholds', () => {
    expect(readinessTier(8.1)).toBe('Exit Ready');
    expect(readinessTier(8.0)).toBe('Approaching Ready');
    expect(readinessTier(6.6)).toBe('Approaching Ready');
    expect(readinessTier(4.1)).toBe('Needs Work');
    expect(readinessTier(4.0)).toBe('Not Ready');
  });

  it('derives urgency from the exit timeline', () => {
    expect(timelineUrgency('Already in discussions')).toBe('CRITICAL');
    expect(timelineUrgency('Within 1 year')).toBe('CRITICAL');
    expect(timelineUrgency('1-2 years')).toBe('HIGH');
    expect(timelineUrgency('3-5 years')).toBe('MODERATE');
    expect(timelineUrgency('Within 6 months')).toBe('CRITICAL');
    expect(timelineUrgency('Actively marketing the business')).toBe('CRITICAL');
  });

  it('keeps owners without exit plans at moderate urgency', () => {
    expect(timelineUrgency('Not actively considering')).toBe('MODERATE');
    expect(timelineUrgency('Exploring options')).toBe('MODERATE');
    expect(timelineUrgency('No plans to sell')).toBe('MODERATE');
  });

  it('scales improvement ranges by category impact', () => {
    expect(improvementRange('OWNER_DEPENDENCE', 1.0)).toBe('10-21%');
    expect(improvementRange('REVENUE_QUALITY', 1.5)).toBe('8-16%');
    expect(improvementRange('GROWTH_VALUE', 9.0)).toBe('0-0%');
  });

  it('flags an overall score far from the weighted mean', () => {
    const { categoryScores } = score(ownerCentric, 'Landscaping');
    expect(calculateOverallScore(categoryScores)).toBe(1.6);

    const report = validateScoringConsistency(categoryScores, 5.0);
    expect(report.isConsistent).toBe(false);
    expect(report.issues).toEqual(["Overall score (5) doesn't match weighted average (1.6)"]);
  });
});

describe('getIndustryProfile', () => {
  it('matches exactly, then by contained name, else the default', () => {
    expect(getIndustryProfile('technology').documentationRigor).toBe('HIGH');
    expect(getIndustryProfile('Healthcare Services')).toEqual(getIndustryProfile('Healthcare'));
    expect(getIndustryProfile('Landscaping').documentationRigor).toBe('STANDARD');
  });
});
