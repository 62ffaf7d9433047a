import type { StageName } from '@exitready/schemas';
import type { FinalScores } from '../finalize/types.js';
import type { RunContext, RunError } from '../shared/run-context.js';
import type { ReportSections } from '../summary/types.js';

interface ResponseBase {
  runId: string;
  durations: Partial<Record<StageName, number>>;
  log: string[];
}

export interface CompletedAssessmentResponse extends ResponseBase {
  status: 'completed';
  ownerName: string;
  email: string;
  companyName?: string;
  industry: string;
  location: string;
  scores: FinalScores;
  readinessTier: string;
  sections: ReportSections;
  report: string;
  qaApproved: boolean;
  qualityScore: number;
}

export interface FailedAssessmentResponse extends ResponseBase {
  status: 'error';
  error: RunError;
}

export type AssessmentResponse = CompletedAssessmentResponse | FailedAssessmentResponse;

/**
 * API-shaped view of a finished run. A run without a finalize result is
 * always reported as an error, never as a partial report.
 */
export function toAssessmentResponse(context: RunContext): AssessmentResponse {
  const base: ResponseBase = {
    runId: context.runId,
    durations: { ...context.durations },
    log: [...context.log],
  };
  const final = context.results.finalize;

  if (context.error || !final) {
    return {
      ...base,
      status: 'error',
      error: context.error ?? {
        kind: 'MissingContextError',
        stage: context.currentStage === 'pending' ? 'intake' : context.currentStage,
        message: 'Run ended without a final report',
      },
    };
  }

  return {
    ...base,
    status: 'completed',
    ownerName: final.ownerName,
    email: final.email,
    companyName: final.companyName,
    industry: context.industry ?? '',
    location: context.region ?? '',
    scores: { ...final.scores },
    readinessTier: final.readinessTier,
    sections: final.sections,
    report: final.report,
    qaApproved: final.metadata.qaApproved,
    qualityScore: final.metadata.qualityScore,
  };
}
