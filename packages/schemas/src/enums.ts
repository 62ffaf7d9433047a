import { z } from 'zod';

export const scoringCategoryEnum = z.enum([
  'OWNER_DEPENDENCE',
  'REVENUE_QUALITY',
  'FINANCIAL_READINESS',
  'OPERATIONAL_RESILIENCE',
  'GROWTH_VALUE',
]);
export type ScoringCategory = z.infer<typeof scoringCategoryEnum>;

export const readinessTierEnum = z.enum([
  'Exit Ready',
  'Approaching Ready',
  'Needs Work',
  'Not Ready',
]);
export type ReadinessTier = z.infer<typeof readinessTierEnum>;

export const urgencyEnum = z.enum(['CRITICAL', 'HIGH', 'MODERATE']);
export type Urgency = z.infer<typeof urgencyEnum>;

export const stageNameEnum = z.enum(['intake', 'research', 'scoring', 'summary', 'qa', 'finalize']);
export type StageName = z.infer<typeof stageNameEnum>;

export const documentationRigorEnum = z.enum(['STANDARD', 'HIGH', 'VERY_HIGH']);
export type DocumentationRigor = z.infer<typeof documentationRigorEnum>;

export const researchDataSourceEnum = z.enum(['live', 'fallback']);
export type ResearchDataSource = z.infer<typeof researchDataSourceEnum>;

export const marginTrendEnum = z.enum([
  'DECLINED_SIGNIFICANTLY',
  'DECLINED_SLIGHTLY',
  'FLAT',
  'IMPROVED_SLIGHTLY',
  'IMPROVED_SIGNIFICANTLY',
  'UNKNOWN',
]);
export type MarginTrend = z.infer<typeof marginTrendEnum>;

export const runStatusEnum = z.enum(['completed', 'error']);
export type RunStatus = z.infer<typeof runStatusEnum>;
