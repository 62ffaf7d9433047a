import { z } from 'zod';
import {
  documentationRigorEnum,
  readinessTierEnum,
  scoringCategoryEnum,
  urgencyEnum,
} from '@exitready/schemas';

export const scoreAdjustmentSchema = z.object({
  delta: z.number(),
  reason: z.string(),
});
export type ScoreAdjustment = z.infer<typeof scoreAdjustmentSchema>;

export const categoryScoreSchema = z.object({
  category: scoringCategoryEnum,
  score: z.number().min(1).max(10),
  weight: z.number().positive(),
  baseScore: z.number(),
  strengths: z.array(z.string()),
  gaps: z.array(z.string()),
  adjustments: z.array(scoreAdjustmentSchema),
  industryContext: z.object({
    benchmark: z.string(),
    impact: z.string(),
  }),
});
export type CategoryScore = z.infer<typeof categoryScoreSchema>;

export const focusAreaSchema = z.object({
  category: scoringCategoryEnum,
  title: z.string(),
  score: z.number(),
  gaps: z.array(z.string()),
  improvementRange: z.string(),
});
export type FocusArea = z.infer<typeof focusAreaSchema>;

export const focusAreasSchema = z.object({
  primary: focusAreaSchema,
  secondary: focusAreaSchema,
  urgency: urgencyEnum,
});
export type FocusAreas = z.infer<typeof focusAreasSchema>;

export const valuePhraseSchema = z.object({
  phrase: z.string().min(1),
  weight: z.number().min(0.5).max(2),
  label: z.string(),
});
export type ValuePhrase = z.infer<typeof valuePhraseSchema>;

export const industryProfileSchema = z.object({
  valueDrivers: z.array(z.string().min(1)),
  documentationRigor: documentationRigorEnum,
});
export type IndustryProfile = z.infer<typeof industryProfileSchema>;

export const industryProfilesFileSchema = z.object({
  genericValuePhrases: z.array(valuePhraseSchema),
  defaultProfile: industryProfileSchema,
  industries: z.record(industryProfileSchema),
});
export type IndustryProfilesFile = z.infer<typeof industryProfilesFileSchema>;

export interface ConsistencyReport {
  isConsistent: boolean;
  issues: string[];
  warnings: string[];
  expectedOverall: number;
  scoreRange: [number, number];
}

export interface CriticalGap {
  category: CategoryScore['category'];
  score: number;
  gaps: string[];
}

export type CategoryScores = Record<CategoryScore['category'], CategoryScore>;

export interface ScoringResult {
  categoryScores: CategoryScores;
  overallScore: number;
  readinessTier: z.infer<typeof readinessTierEnum>;
  focusAreas: FocusAreas;
  topStrengths: string[];
  criticalGaps: CriticalGap[];
  consistency: ConsistencyReport;
}
