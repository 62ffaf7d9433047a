import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Citation, ResearchData } from './types.js';

const citationSchema = z
  .object({
    source: z.string(),
    year: z.string().optional(),
    type: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export const researchPayloadSchema = z
  .object({
    valuation_benchmarks: z.record(z.unknown()),
    improvement_strategies: z.record(z.unknown()).optional(),
    market_conditions: z.record(z.unknown()).optional(),
    industry_specific_thresholds: z.record(z.unknown()).optional(),
    citations: z.array(citationSchema).optional(),
  })
  .passthrough();

let cached: ResearchData | undefined;

/**
 * Complete research payload used whenever live research is unavailable.
 * Each call returns a fresh copy.
 */
export function loadFallbackResearch(): ResearchData {
  if (!cached) {
    const raw = readFileSync(new URL('./fallback-research.json', import.meta.url), 'utf8');
    cached = researchPayloadSchema.parse(JSON.parse(raw));
  }
  return structuredClone(cached);
}

export function citationsOf(data: ResearchData): Citation[] {
  const parsed = z.array(citationSchema).safeParse(data.citations);
  if (!parsed.success) return [];
  return parsed.data.map(({ source, year, type, url }) => ({ source, year, type, url }));
}
