import { describe, it, expect } from 'vitest';
import {
  COMPANY_NAME_FALLBACK,
  InMemoryPiiStore,
  finalizeStage,
  findRemainingPlaceholders,
  reinsertPii,
  type QaResult,
  type ResearchClient,
} from '@exitready/agents';
import { unusableGenerator } from '../helpers/generators.js';
import { COMPANY_NAME, FIXED_NOW, OWNER_EMAIL, OWNER_NAME, emptyContext, preparedRun, stageEnv } from '../helpers/submissions.js';

const idleResearch: ResearchClient = {
  search: async () => ({ status: 'unavailable', reason: 'not used' }),
};

describe('reinsertPii', () => {
  it('replaces longer tokens first', () => {
    const text = 'Contact [EMAIL] or [EMAIL_1], [OWNER_NAME].';
    expect(
      reinsertPii(text, {
        '[EMAIL]': OWNER_EMAIL,
        '[EMAIL_1]': 'ops@example.org',
        '[OWNER_NAME]': OWNER_NAME,
      }),
    ).toBe(`Contact ${OWNER_EMAIL} or ops@example.org, ${OWNER_NAME}.`);
  });

  it('falls back to a generic company name', () => {
    expect(reinsertPii('Thanks from [COMPANY_NAME].', { '[OWNER_NAME]': OWNER_NAME })).toBe(
      `Thanks from ${COMPANY_NAME_FALLBACK}.`,
    );
  });
});

describe('findRemainingPlaceholders', () => {
  it('lists each leftover token once', () => {
    expect(findRemainingPlaceholders('[PHONE_2] and [PHONE_2], [OWNER_NAME]')).toEqual({
      isComplete: false,
      remainingPlaceholders: ['[PHONE_2]', '[OWNER_NAME]'],
    });
    expect(findRemainingPlaceholders('All done.').isComplete).toBe(true);
  });
});

function finalizeContext(runId: string) {
  const run = preparedRun();
  const qa: QaResult = {
    approved: true,
    readyForDelivery: true,
    qualityScore: 9.2,
    checks: {
      scoringConsistency: { name: 'scoringConsistency', score: 10, issues: [], warnings: [], source: 'mechanical' },
      contentQuality: { name: 'contentQuality', score: 9, issues: [], warnings: [], source: 'mechanical' },
      piiCompliance: { name: 'piiCompliance', score: 10, issues: [], warnings: [], source: 'mechanical' },
      structure: { name: 'structure', score: 10, issues: [], warnings: [], source: 'mechanical' },
      redundancy: { name: 'redundancy', score: 8, issues: [], warnings: [], source: 'default' },
      tone: { name: 'tone', score: 8, issues: [], warnings: [], source: 'default' },
      citations: { name: 'citations', score: 8, issues: [], warnings: [], source: 'default' },
      outcomeFraming: { name: 'outcomeFraming', score: 10, issues: [], warnings: [], source: 'regex' },
    },
    criticalIssues: [],
    issues: [],
    warnings: [],
    sections: run.summary.sections,
    report: run.summary.report,
    repairAttempts: 0,
    polished: false,
  };
  return {
    mapping: run.mapping,
    context: {
      ...emptyContext({}, runId),
      results: { research: run.research, scoring: run.scoring, summary: run.summary, qa },
    },
  };
}

describe('finalizeStage', () => {
  it('personalises the report and releases the mapping', async () => {
    const piiStore = new InMemoryPiiStore();
    const { context, mapping } = finalizeContext('run-final');
    await piiStore.put('run-final', mapping);

    const outcome = await finalizeStage.run(
      context,
      stageEnv({ generator: unusableGenerator().generator, research: idleResearch, piiStore }),
    );
    if (!outcome.ok) throw new Error(outcome.failure.message);
    const final = outcome.result;

    expect(final.ownerName).toBe(OWNER_NAME);
    expect(final.email).toBe(OWNER_EMAIL);
    expect(final.companyName).toBe(COMPANY_NAME);
    expect(final.sections.executiveSummary.startsWith(`${OWNER_NAME}, thank you`)).toBe(true);
    expect(final.report).not.toContain('[OWNER_NAME]');
    expect(final.scores).toEqual({
      overall: 1.6,
      OWNER_DEPENDENCE: 1.0,
      REVENUE_QUALITY: 1.5,
      FINANCIAL_READINESS: 2.0,
      OPERATIONAL_RESILIENCE: 1.0,
      GROWTH_VALUE: 2.9,
    });
    expect(final.metadata).toMatchObject({
      piiEntriesReinserted: 3,
      reinsertion: { isComplete: true, remainingPlaceholders: [] },
      researchDataSource: 'fallback',
      usedTemplateSummary: true,
      reportDate: FIXED_NOW.toISOString(),
    });
    expect(outcome.status).toBe('Finalize complete: report personalised, no placeholders remain');
    expect(await piiStore.get('run-final')).toBeUndefined();
  });

  it('fails with missing context when the mapping is gone', async () => {
    const { context } = finalizeContext('run-expired');
    const outcome = await finalizeStage.run(
      context,
      stageEnv({ generator: unusableGenerator().generator, research: idleResearch, piiStore: new InMemoryPiiStore() }),
    );

    expect(outcome).toEqual({
      ok: false,
      failure: {
        kind: 'MissingContextError',
        message: 'finalize is missing required context: PII mapping for run run-expired',
      },
    });
  });
});
