/**
 * Benchmark extraction: typed thresholds from loosely structured research data.
 * Total and deterministic; anything missing or unusable takes its default.
 */

import { firstInteger } from '../shared/text.js';
import type { BenchmarkField, BenchmarkSource, Benchmarks, ResearchData } from './types.js';

export const DEFAULT_BENCHMARKS: Readonly<Omit<Benchmarks, 'fieldSources'>> = Object.freeze({
  ownerIndependenceDays: 14,
  customerConcentrationThreshold: 25,
  concentrationDiscount: '15-20%',
  recurringRevenueThreshold: 70,
  recurringRevenuePremium: '1.5-2.0x higher multiples',
  expectedMarginRange: '15-20%',
});

type Dict = Record<string, unknown>;

function isRecord(value: unknown): value is Dict {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First present value among the candidate keys. */
function pick(source: Dict | undefined, keys: readonly string[]): unknown {
  if (!source) return undefined;
  for (const key of keys) {
    if (source[key] !== undefined && source[key] !== null) return source[key];
  }
  return undefined;
}

function pickRecord(source: Dict | undefined, keys: readonly string[]): Dict | undefined {
  const value = pick(source, keys);
  return isRecord(value) ? value : undefined;
}

/** Positive integer from a number or the first integer in a string. */
function toPositiveInt(value: unknown): number | null {
  let n: number | null = null;
  if (typeof value === 'number' && Number.isFinite(value)) n = Math.round(value);
  else if (typeof value === 'string') n = firstInteger(value);
  return n !== null && n > 0 ? n : null;
}

function toText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed && /\d/.test(trimmed) ? trimmed : null;
}

function matchIndustryValue(table: Dict | undefined, industry: string): unknown {
  if (!table) return undefined;
  const wanted = industry.trim().toLowerCase();
  if (!wanted) return undefined;
  const key = Object.keys(table)
    .sort()
    .find((k) => k.trim().toLowerCase() === wanted);
  return key === undefined ? undefined : table[key];
}

interface Resolved<T> {
  value: T;
  source: BenchmarkSource;
}

function resolve<T>(
  industryValue: T | null,
  extractedValue: T | null,
  fallback: T,
): Resolved<T> {
  if (industryValue !== null) return { value: industryValue, source: 'industry' };
  if (extractedValue !== null) return { value: extractedValue, source: 'extracted' };
  return { value: fallback, source: 'default' };
}

/**
 * Extract benchmarks from research data. An `industry_specific_thresholds`
 * entry matching `industry` (case-insensitive) overrides the generic value
 * field by field.
 */
export function extractBenchmarks(researchData: ResearchData | null | undefined, industry: string): Benchmarks {
  const data: Dict = isRecord(researchData) ? researchData : {};
  const valuation = pickRecord(data, ['valuation_benchmarks', 'valuationBenchmarks']);

  const owner = pickRecord(valuation, ['owner_dependence', 'ownerDependence']);
  const concentration = pickRecord(valuation, ['customer_concentration', 'customerConcentration']);
  const recurring = pickRecord(valuation, ['recurring_revenue', 'recurringRevenue']);
  const margins = pickRecord(valuation, ['profit_margins', 'profitMargins']);

  const industryEntry = matchIndustryValue(
    pickRecord(data, ['industry_specific_thresholds', 'industrySpecificThresholds']),
    industry,
  );
  const industryTable = isRecord(industryEntry) ? industryEntry : undefined;
  const marginByIndustry = matchIndustryValue(pickRecord(margins, ['by_industry', 'byIndustry']), industry);

  const ownerDays = resolve(
    toPositiveInt(pick(industryTable, ['owner_independence', 'ownerIndependence'])),
    toPositiveInt(pick(owner, ['days_threshold', 'daysThreshold', 'threshold'])),
    DEFAULT_BENCHMARKS.ownerIndependenceDays,
  );
  const concentrationThreshold = resolve(
    toPositiveInt(pick(industryTable, ['customer_concentration', 'customerConcentration'])),
    toPositiveInt(pick(concentration, ['threshold'])),
    DEFAULT_BENCHMARKS.customerConcentrationThreshold,
  );
  const concentrationDiscount = resolve(
    null,
    toText(pick(concentration, ['discount'])),
    DEFAULT_BENCHMARKS.concentrationDiscount,
  );
  const recurringThreshold = resolve(
    toPositiveInt(pick(industryTable, ['recurring_revenue', 'recurringRevenue'])),
    toPositiveInt(pick(recurring, ['threshold'])),
    DEFAULT_BENCHMARKS.recurringRevenueThreshold,
  );
  const recurringPremium = resolve(
    null,
    toText(pick(recurring, ['premium'])),
    DEFAULT_BENCHMARKS.recurringRevenuePremium,
  );
  const marginRange = resolve(
    toText(pick(industryTable, ['profit_margin', 'profitMargin'])) ?? toText(marginByIndustry),
    toText(pick(margins, ['expected_EBITDA', 'expectedEbitda', 'expected_ebitda'])),
    DEFAULT_BENCHMARKS.expectedMarginRange,
  );

  const fieldSources: Record<BenchmarkField, BenchmarkSource> = {
    ownerIndependenceDays: ownerDays.source,
    customerConcentrationThreshold: concentrationThreshold.source,
    concentrationDiscount: concentrationDiscount.source,
    recurringRevenueThreshold: recurringThreshold.source,
    recurringRevenuePremium: recurringPremium.source,
    expectedMarginRange: marginRange.source,
  };

  return {
    ownerIndependenceDays: ownerDays.value,
    customerConcentrationThreshold: concentrationThreshold.value,
    concentrationDiscount: concentrationDiscount.value,
    recurringRevenueThreshold: recurringThreshold.value,
    recurringRevenuePremium: recurringPremium.value,
    expectedMarginRange: marginRange.value,
    fieldSources,
  };
}
