import type { QuestionId, ScoringCategory } from '@exitready/schemas';

export interface CategoryDefinition {
  title: string;
  weight: number;
  /** Scales the improvement range offered for this category. */
  impactMultiplier: number;
  questions: readonly [QuestionId, QuestionId];
  baseScore: number;
}

export const CATEGORY_TABLE: Readonly<Record<ScoringCategory, CategoryDefinition>> = Object.freeze({
  OWNER_DEPENDENCE: {
    title: 'Owner Dependence',
    weight: 0.25,
    impactMultiplier: 0.3,
    questions: ['q1', 'q2'],
    baseScore: 5.0,
  },
  REVENUE_QUALITY: {
    title: 'Revenue Quality & Stability',
    weight: 0.25,
    impactMultiplier: 0.25,
    questions: ['q3', 'q4'],
    baseScore: 5.0,
  },
  FINANCIAL_READINESS: {
    title: 'Financial Readiness',
    weight: 0.2,
    impactMultiplier: 0.2,
    questions: ['q5', 'q6'],
    baseScore: 5.0,
  },
  OPERATIONAL_RESILIENCE: {
    title: 'Operational Resilience',
    weight: 0.15,
    impactMultiplier: 0.2,
    questions: ['q7', 'q8'],
    baseScore: 5.0,
  },
  GROWTH_VALUE: {
    title: 'Growth & Value Potential',
    weight: 0.15,
    impactMultiplier: 0.35,
    questions: ['q9', 'q10'],
    baseScore: 3.0,
  },
});

/** Table order; breaks ties when ranking categories. */
export const CATEGORY_ORDER: readonly ScoringCategory[] = [
  'OWNER_DEPENDENCE',
  'REVENUE_QUALITY',
  'FINANCIAL_READINESS',
  'OPERATIONAL_RESILIENCE',
  'GROWTH_VALUE',
];
