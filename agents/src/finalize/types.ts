import type { ReadinessTier, ResearchDataSource, ScoringCategory } from '@exitready/schemas';
import type { ReportSections } from '../summary/types.js';

export interface ReinsertionReport {
  isComplete: boolean;
  remainingPlaceholders: string[];
}

export type FinalScores = Record<ScoringCategory, number> & { overall: number };

export interface FinalOutput {
  ownerName: string;
  email: string;
  companyName?: string;
  /** Personalised plain-text report. */
  report: string;
  sections: ReportSections;
  scores: FinalScores;
  readinessTier: ReadinessTier;
  metadata: {
    piiEntriesReinserted: number;
    reinsertion: ReinsertionReport;
    qaApproved: boolean;
    readyForDelivery: boolean;
    qualityScore: number;
    researchDataSource: ResearchDataSource;
    usedTemplateSummary: boolean;
    reportDate: string;
  };
}
