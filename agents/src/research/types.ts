import type { ResearchDataSource } from '@exitready/schemas';

/** Research payload as returned by search extraction or the fallback file. */
export type ResearchData = Record<string, unknown>;

export interface Citation {
  source: string;
  year?: string;
  url?: string;
  type?: string;
}

export type SearchOutcome =
  | { status: 'ok'; content: string; citations: Citation[] }
  | { status: 'unavailable'; reason: string };

export interface ResearchClient {
  search(query: string, options?: { signal?: AbortSignal }): Promise<SearchOutcome>;
}

export type BenchmarkField =
  | 'ownerIndependenceDays'
  | 'customerConcentrationThreshold'
  | 'concentrationDiscount'
  | 'recurringRevenueThreshold'
  | 'recurringRevenuePremium'
  | 'expectedMarginRange';

/** Where a benchmark value came from. */
export type BenchmarkSource = 'industry' | 'extracted' | 'default';

export interface Benchmarks {
  ownerIndependenceDays: number;
  customerConcentrationThreshold: number;
  concentrationDiscount: string;
  recurringRevenueThreshold: number;
  recurringRevenuePremium: string;
  expectedMarginRange: string;
  fieldSources: Record<BenchmarkField, BenchmarkSource>;
}

export interface ResearchResult {
  query: string;
  dataSource: ResearchDataSource;
  data: ResearchData;
  benchmarks: Benchmarks;
  citations: Citation[];
  /** Why live research was not used, when `dataSource` is `fallback`. */
  fallbackReason?: string;
}
