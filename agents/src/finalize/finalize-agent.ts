/**
 * Finalize stage: personalise the approved report with the stored PII and
 * release the mapping.
 */

import { EMAIL_TOKEN, OWNER_NAME_TOKEN, COMPANY_NAME_TOKEN } from '../intake/pii-redactor.js';
import { MissingContextError } from '../shared/errors.js';
import type { StageDefinition } from '../shared/run-context.js';
import { findRemainingPlaceholders, reinsertIntoSections, reinsertPii } from './pii-reinsertion.js';

export const finalizeStage: StageDefinition<'finalize', 'research' | 'scoring' | 'summary' | 'qa'> = {
  name: 'finalize',
  requires: ['research', 'scoring', 'summary', 'qa'],

  async run(context, env) {
    const { research, scoring, summary, qa } = context.results;

    const mapping = await env.deps.piiStore.get(context.runId);
    if (!mapping) {
      const error = new MissingContextError('finalize', [`PII mapping for run ${context.runId}`]);
      env.logger.error(error.message);
      return { ok: false, failure: { kind: error.kind, message: error.message } };
    }

    if (!qa.readyForDelivery) {
      env.logger.warn('Report not approved for delivery, personalising anyway');
    }

    const report = reinsertPii(qa.report, mapping);
    const sections = reinsertIntoSections(qa.sections, mapping);
    const reinsertion = findRemainingPlaceholders(report);
    if (!reinsertion.isComplete) {
      env.logger.warn('Placeholders remain after reinsertion', reinsertion.remainingPlaceholders);
    }

    const scores = scoring.categoryScores;
    const ownerName = mapping[OWNER_NAME_TOKEN] ?? 'Business Owner';

    await env.deps.piiStore.delete(context.runId);
    env.logger.info('PII mapping released', { runId: context.runId });

    return {
      ok: true,
      result: {
        ownerName,
        email: mapping[EMAIL_TOKEN] ?? '',
        companyName: mapping[COMPANY_NAME_TOKEN],
        report,
        sections,
        scores: {
          overall: scoring.overallScore,
          OWNER_DEPENDENCE: scores.OWNER_DEPENDENCE.score,
          REVENUE_QUALITY: scores.REVENUE_QUALITY.score,
          FINANCIAL_READINESS: scores.FINANCIAL_READINESS.score,
          OPERATIONAL_RESILIENCE: scores.OPERATIONAL_RESILIENCE.score,
          GROWTH_VALUE: scores.GROWTH_VALUE.score,
        },
        readinessTier: scoring.readinessTier,
        metadata: {
          piiEntriesReinserted: Object.keys(mapping).length,
          reinsertion,
          qaApproved: qa.approved,
          readyForDelivery: qa.readyForDelivery,
          qualityScore: qa.qualityScore,
          researchDataSource: research.dataSource,
          usedTemplateSummary: summary.usedFallback,
          reportDate: env.now().toISOString(),
        },
      },
      status: `Finalize complete: report personalised, ${
        reinsertion.isComplete ? 'no placeholders remain' : `${reinsertion.remainingPlaceholders.length} placeholder(s) remain`
      }`,
      warnings: reinsertion.isComplete
        ? []
        : [`Placeholders left after reinsertion: ${reinsertion.remainingPlaceholders.join(', ')}`],
    };
  },
};
