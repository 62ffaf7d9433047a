import { describe, it, expect } from 'vitest';
import {
  assembleReport,
  buildDefaultSections,
  extractBenchmarks,
  loadFallbackResearch,
  narrativeSchema,
  scoreAssessment,
  sectionTitles,
  timelineProfile,
  type ResearchResult,
} from '@exitready/agents';
import { questionnaireSchema } from '@exitready/schemas';
import { buildSubmission } from '../helpers/submissions.js';

function fixture() {
  const questionnaire = questionnaireSchema.parse(buildSubmission());
  const data = loadFallbackResearch();
  const research: ResearchResult = {
    query: 'landscaping exit benchmarks',
    dataSource: 'fallback',
    data,
    benchmarks: extractBenchmarks(data, questionnaire.industry),
    citations: [],
  };
  const scoring = scoreAssessment({
    responses: questionnaire.responses,
    benchmarks: research.benchmarks,
    industry: questionnaire.industry,
    exitTimeline: questionnaire.exitTimeline,
  });
  return { questionnaire, research, scoring };
}

describe('timelineProfile', () => {
  it('maps exit timelines to narrative profiles', () => {
    expect(timelineProfile('6 months').header).toBe('CRITICAL TIMELINE: 0-6 MONTHS');
    expect(timelineProfile('Within 1 year').level).toBe('URGENT');
    expect(timelineProfile('1-2 years').header).toBe('FOCUSED TIMELINE: 1-2 YEARS');
    expect(timelineProfile('3-5 years').monthsRemaining).toBe('36-60');
    expect(timelineProfile('5-10 years').level).toBe('LOW');
    expect(timelineProfile('Just exploring').header).toBe('EXPLORATION PHASE');
  });

  it('treats owners without exit plans as exploring', () => {
    expect(timelineProfile('Not actively considering')).toMatchObject({ level: 'LOW', header: 'EXPLORATION PHASE' });
    expect(timelineProfile('Exploring options').header).toBe('EXPLORATION PHASE');
    expect(sectionTitles(timelineProfile('Not actively considering')).quickWins).toBe('QUICK WINS (Next 30 Days)');
  });

  it('uses deal-focused titles on a critical timeline', () => {
    expect(sectionTitles(timelineProfile('Already in talks')).quickWins).toBe('DEAL SAVERS (Must Fix Now)');
    expect(sectionTitles(timelineProfile('3-5 years')).quickWins).toBe('QUICK WINS (Next 30 Days)');
  });
});

describe('buildDefaultSections', () => {
  it('addresses the owner by placeholder and reports the score', () => {
    const { questionnaire, research, scoring } = fixture();
    const sections = buildDefaultSections(questionnaire, scoring, research, timelineProfile(questionnaire.exitTimeline));

    expect(sections.executiveSummary.startsWith(
      '[OWNER_NAME], thank you for completing the Exit Ready Snapshot for your Landscaping business. ',
    )).toBe(true);
    expect(sections.executiveSummary).toContain(
      'Your overall exit readiness score is 1.6/10, which places the business at "Not Ready".',
    );
    expect(sections.executiveSummary).toContain('typically see a 10-21% improvement in value');
    expect(sections.recommendations.split('\n')[0]).toBe('YOUR CRITICAL FOCUS AREA: Owner Dependence');
  });

  it('summarises each category with its gaps and benchmark', () => {
    const { questionnaire, research, scoring } = fixture();
    const sections = buildDefaultSections(questionnaire, scoring, research, timelineProfile(questionnaire.exitTimeline));

    expect(sections.categorySummaries.OWNER_DEPENDENCE).toBe(
      'Owner Dependence scored 1/10. Strengths: none identified. ' +
        'Gaps: Owner is central to daily operations; Owner handles too many critical functions; ' +
        'Business cannot operate without the owner. ' +
        'Benchmark: Buyers expect Landscaping businesses to run 14+ days without the owner. ' +
        'Owner-dependent businesses typically face lower multiples or earn-out structures.',
    );
  });

  it('opens the next steps with the timeline titles', () => {
    const { questionnaire, research, scoring } = fixture();
    const sections = buildDefaultSections(questionnaire, scoring, research, timelineProfile('Within 1 year'));
    const lines = sections.nextSteps.split('\n');

    expect(lines[0]).toBe('IMMEDIATE ACTIONS (This Week)');
    expect(lines).toContain('30-DAY SPRINT');
    expect(lines).toContain('90-DAY VALUE MAXIMIZATION');
  });
});

describe('assembleReport', () => {
  it('lays out the sections in a fixed order', () => {
    const { questionnaire, research, scoring } = fixture();
    const sections = buildDefaultSections(questionnaire, scoring, research, timelineProfile('1-2 years'));
    const report = assembleReport(sections, { overallScore: 1.6, readinessTier: 'Not Ready' });

    const headings = [
      'EXIT READY SNAPSHOT',
      'YOUR EXIT READINESS SCORE: 1.6/10 (Not Ready)',
      'EXECUTIVE SUMMARY',
      'OWNER DEPENDENCE',
      'REVENUE QUALITY & STABILITY',
      'FINANCIAL READINESS',
      'OPERATIONAL RESILIENCE',
      'GROWTH & VALUE POTENTIAL',
      'RECOMMENDATIONS',
      'INDUSTRY & MARKET CONTEXT',
      'YOUR NEXT STEPS',
      'EXIT READY SNAPSHOT - Confidential Assessment',
    ];
    const positions = headings.map((h) => report.indexOf(h));
    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    expect(report.endsWith('EXIT READY SNAPSHOT - Confidential Assessment')).toBe(true);
  });
});

describe('narrativeSchema', () => {
  it('maps snake_case sections and joins list answers', () => {
    const parsed = narrativeSchema.parse({
      executive_summary: '  [OWNER_NAME], here is your snapshot.  ',
      category_summaries: {
        owner_dependence: 'a',
        revenue_quality: 'b',
        financial_readiness: 'c',
        operational_resilience: 'd',
        growth_value: 'e',
      },
      recommendations: ['• first', '• second'],
      industry_context: 'context',
      next_steps: 'steps',
    });

    expect(parsed.executiveSummary).toBe('[OWNER_NAME], here is your snapshot.');
    expect(parsed.recommendations).toBe('• first\n• second');
    expect(parsed.categorySummaries.GROWTH_VALUE).toBe('e');
  });

  it('rejects an empty section', () => {
    const result = narrativeSchema.safeParse({
      executive_summary: '   ',
      category_summaries: {
        owner_dependence: 'a',
        revenue_quality: 'b',
        financial_readiness: 'c',
        operational_resilience: 'd',
        growth_value: 'e',
      },
      recommendations: 'r',
      industry_context: 'i',
      next_steps: 'n',
    });
    expect(result.success).toBe(false);
  });
});
