import type { ReadinessTier } from '@exitready/schemas';
import { CATEGORY_ORDER } from '../scoring/categories.js';
import type { ReportSections } from './types.js';

export const REPORT_TITLE = 'EXIT READY SNAPSHOT';
export const SEPARATOR = '='.repeat(60);

export const CATEGORY_HEADINGS = {
  OWNER_DEPENDENCE: 'OWNER DEPENDENCE',
  REVENUE_QUALITY: 'REVENUE QUALITY & STABILITY',
  FINANCIAL_READINESS: 'FINANCIAL READINESS',
  OPERATIONAL_RESILIENCE: 'OPERATIONAL RESILIENCE',
  GROWTH_VALUE: 'GROWTH & VALUE POTENTIAL',
} as const;

export interface ReportHeader {
  overallScore: number;
  readinessTier: ReadinessTier;
}

/**
 * Plain-text report in fixed section order.
 */
export function assembleReport(sections: ReportSections, header: ReportHeader): string {
  const categories = CATEGORY_ORDER.map(
    (category) => `${CATEGORY_HEADINGS[category]}\n${sections.categorySummaries[category]}`,
  ).join('\n\n');

  return [
    REPORT_TITLE,
    `YOUR EXIT READINESS SCORE: ${header.overallScore}/10 (${header.readinessTier})`,
    SEPARATOR,
    `EXECUTIVE SUMMARY\n\n${sections.executiveSummary}`,
    SEPARATOR,
    `DETAILED ANALYSIS BY CATEGORY\n\n${categories}`,
    SEPARATOR,
    `RECOMMENDATIONS\n\n${sections.recommendations}`,
    SEPARATOR,
    `INDUSTRY & MARKET CONTEXT\n\n${sections.industryContext}`,
    SEPARATOR,
    `YOUR NEXT STEPS\n\n${sections.nextSteps}`,
    SEPARATOR,
    `${REPORT_TITLE} - Confidential Assessment`,
  ].join('\n\n');
}

/** Apply a text transform to every section. */
export function mapSections(sections: ReportSections, fn: (text: string) => string): ReportSections {
  return {
    executiveSummary: fn(sections.executiveSummary),
    categorySummaries: {
      OWNER_DEPENDENCE: fn(sections.categorySummaries.OWNER_DEPENDENCE),
      REVENUE_QUALITY: fn(sections.categorySummaries.REVENUE_QUALITY),
      FINANCIAL_READINESS: fn(sections.categorySummaries.FINANCIAL_READINESS),
      OPERATIONAL_RESILIENCE: fn(sections.categorySummaries.OPERATIONAL_RESILIENCE),
      GROWTH_VALUE: fn(sections.categorySummaries.GROWTH_VALUE),
    },
    recommendations: fn(sections.recommendations),
    industryContext: fn(sections.industryContext),
    nextSteps: fn(sections.nextSteps),
  };
}
