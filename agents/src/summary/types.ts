import type { ScoringCategory } from '@exitready/schemas';

export type TimelineLevel = 'CRITICAL' | 'URGENT' | 'HIGH' | 'MODERATE' | 'LOW';

export interface TimelineProfile {
  level: TimelineLevel;
  monthsRemaining: string;
  focus: string;
  header: string;
}

export interface ReportSections {
  executiveSummary: string;
  categorySummaries: Record<ScoringCategory, string>;
  recommendations: string;
  industryContext: string;
  nextSteps: string;
}

export interface SummaryResult {
  sections: ReportSections;
  /** Assembled plain-text report, still anonymised. */
  report: string;
  timeline: TimelineProfile;
  usedFallback: boolean;
  fallbackReason?: string;
  wordCount: number;
}
