import { describe, it, expect } from 'vitest';
import {
  calculateQualityScore,
  checkContentQuality,
  checkPiiCompliance,
  checkStructure,
  detectPromiseLanguage,
  findPlaceholders,
  isCriticalIssue,
  keepsPlaceholders,
  scanForPii,
  type QaCheckResult,
  type ReportSections,
} from '@exitready/agents';

const filler = (n: number) => Array.from({ length: n }, (_, i) => `word${i}`).join(' ');

function sections(overrides: Partial<ReportSections> = {}): ReportSections {
  return {
    executiveSummary: `[OWNER_NAME], ${filler(160)}`,
    categorySummaries: {
      OWNER_DEPENDENCE: filler(30),
      REVENUE_QUALITY: filler(30),
      FINANCIAL_READINESS: filler(30),
      OPERATIONAL_RESILIENCE: filler(30),
      GROWTH_VALUE: filler(30),
    },
    recommendations: 'Delegate key client relationships over 6-12 months.',
    industryContext: 'Buyers in this market typically look for recurring revenue.',
    nextSteps: 'Review the owner dependence gaps with your team this week.',
    ...overrides,
  };
}

function check(name: QaCheckResult['name'], score: number): QaCheckResult {
  return { name, score, issues: [], warnings: [], source: 'mechanical' };
}

describe('findPlaceholders', () => {
  it('skips PII tokens and reports other placeholder text', () => {
    expect(findPlaceholders('Hello [OWNER_NAME] of [COMPANY_NAME], see [INSERT DATA] and TODO')).toEqual([
      '[INSERT DATA]',
      'TODO',
    ]);
  });
});

describe('checkContentQuality', () => {
  it('scores complete sections at 10', () => {
    const result = checkContentQuality(sections());
    expect(result.score).toBe(10);
    expect(result.issues).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('deducts for a missing summary, missing categories and casual language', () => {
    const result = checkContentQuality(
      sections({
        executiveSummary: '',
        categorySummaries: {
          OWNER_DEPENDENCE: filler(30),
          REVENUE_QUALITY: '',
          FINANCIAL_READINESS: filler(30),
          OPERATIONAL_RESILIENCE: filler(30),
          GROWTH_VALUE: 'Too short.',
        },
        nextSteps: 'Sort out the stuff this week.',
      }),
    );

    expect(result.issues).toEqual(['Missing executive summary', 'Missing category summaries (4/5)']);
    expect(result.warnings).toEqual(['Growth & Value Potential summary too brief', "Unprofessional language: 'stuff'"]);
    expect(result.score).toBe(4);
  });

  it('flags placeholders in the executive summary', () => {
    const result = checkContentQuality(sections({ executiveSummary: `[OWNER_NAME], [INSERT SCORE] ${filler(160)}` }));
    expect(result.issues).toEqual(['Placeholder text found in executive summary: [INSERT SCORE]']);
    expect(result.score).toBe(8);
  });
});

describe('PII scanning', () => {
  it('counts contact data by type', () => {
    expect(scanForPii('Call 555-123-4567 or jane@example.com; ssn 123-45-6789')).toEqual([
      { type: 'email', count: 1 },
      { type: 'phone', count: 1 },
      { type: 'ssn', count: 1 },
    ]);
  });

  it('fails compliance with a critical issue', () => {
    const result = checkPiiCompliance('Reach the owner at jane@example.com');
    expect(result.score).toBe(0);
    expect(result.issues).toEqual(['PII detected: email (1x)']);
    expect(isCriticalIssue(result.issues[0])).toBe(true);
  });

  it('passes a report with placeholders only', () => {
    expect(checkPiiCompliance('[OWNER_NAME] at [EMAIL]').score).toBe(10);
  });
});

describe('checkStructure', () => {
  it('treats missing category scores as incomplete', () => {
    const result = checkStructure(sections(), {
      OWNER_DEPENDENCE: {
        category: 'OWNER_DEPENDENCE',
        score: 4,
        weight: 0.25,
        baseScore: 5,
        strengths: [],
        gaps: ['Owner is central to daily operations'],
        adjustments: [],
        industryContext: { benchmark: 'b', impact: 'i' },
      },
    });

    expect(result.score).toBe(9);
    expect(result.issues).toEqual([]);
    expect(result.warnings).toEqual([
      'Incomplete sections: Missing categories: REVENUE_QUALITY, FINANCIAL_READINESS, OPERATIONAL_RESILIENCE, GROWTH_VALUE',
    ]);
  });

  it('reports missing sections', () => {
    const result = checkStructure(sections({ recommendations: ' ', nextSteps: 'Soon.' }), {});
    expect(result.issues).toEqual(['Missing sections: Recommendations, Category Scores']);
    expect(result.warnings).toEqual(['Incomplete sections: Next Steps']);
    expect(result.score).toBe(5);
  });
});

describe('detectPromiseLanguage', () => {
  it('counts promises and single-number outcomes', () => {
    const report = detectPromiseLanguage(
      'This will increase value. Results are guaranteed and we ensure a 30% increase, typically 10-20% growth.',
    );

    expect(report.promiseLanguage).toEqual(['will increase', 'guaranteed', 'ensure']);
    expect(report.nonRangeNumbers).toEqual(['30%']);
    expect(report.framingScore).toBe(8.2);
    expect(report.violations.map((v) => v.text)).toEqual(['will increase', 'guaranteed', 'ensure']);
  });

  it('accepts ranged, qualified outcomes', () => {
    const report = detectPromiseLanguage('Owners typically see a 15-25% value improvement over 6-12 months.');
    expect(report.framingScore).toBe(10);
    expect(report.violations).toEqual([]);
  });
});

describe('calculateQualityScore', () => {
  it('weights whichever checks are present', () => {
    expect(calculateQualityScore({ contentQuality: check('contentQuality', 5), piiCompliance: check('piiCompliance', 10) })).toBe(7.1);
    expect(calculateQualityScore({})).toBe(5);
  });
});

describe('keepsPlaceholders', () => {
  it('requires every original token and no new contact data', () => {
    expect(keepsPlaceholders('[OWNER_NAME], hello', 'Hello [OWNER_NAME].')).toBe(true);
    expect(keepsPlaceholders('[OWNER_NAME], hello', 'Hello there.')).toBe(false);
    expect(keepsPlaceholders('[OWNER_NAME], hello', 'Hello [OWNER_NAME] (jane@example.com).')).toBe(false);
  });
});
