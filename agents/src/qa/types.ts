import type { ReportSections } from '../summary/types.js';

export type QaCheckName =
  | 'scoringConsistency'
  | 'contentQuality'
  | 'piiCompliance'
  | 'structure'
  | 'redundancy'
  | 'tone'
  | 'citations'
  | 'outcomeFraming';

/** Where a check's score came from. */
export type QaCheckSource = 'mechanical' | 'generated' | 'default' | 'regex';

export interface QaCheckResult {
  name: QaCheckName;
  /** 0-10 */
  score: number;
  issues: string[];
  warnings: string[];
  source: QaCheckSource;
}

export type QaChecks = Record<QaCheckName, QaCheckResult>;

export interface FramingViolation {
  text: string;
  issue: string;
}

export interface FramingReport {
  framingScore: number;
  violations: FramingViolation[];
  promiseLanguage: string[];
  nonRangeNumbers: string[];
}

export interface QaResult {
  approved: boolean;
  /** Approved and no PII found in the anonymised report. */
  readyForDelivery: boolean;
  qualityScore: number;
  checks: QaChecks;
  criticalIssues: string[];
  issues: string[];
  warnings: string[];
  sections: ReportSections;
  report: string;
  repairAttempts: number;
  polished: boolean;
}
