/**
 * Research stage: live market research with a complete fallback payload,
 * reduced to typed benchmarks.
 */

import { buildPrompt, requestStructured, truncateForPrompt } from '@exitready/llm';
import type { StageDefinition, StageEnv } from '../shared/run-context.js';
import { CollaboratorUnavailable, errorMessage } from '../shared/errors.js';
import { extractBenchmarks } from './benchmark-extractor.js';
import { citationsOf, loadFallbackResearch, researchPayloadSchema } from './fallback-research.js';
import type { Citation, ResearchData, SearchOutcome } from './types.js';

const RESEARCH_QUERY_TEMPLATE = `Research M&A exit readiness data for {industry} businesses in {location} with annual revenue {revenue}.

Every figure needs a source organisation and year. Cover:
1. Valuation benchmarks for {industry}: EBITDA and revenue multiples, the recurring revenue share that earns a premium, the customer concentration level that worries buyers, how many days the business should run without its owner, and the expected EBITDA margin.
2. Proven improvement strategies for {industry}: reducing owner dependence, systematising operations, improving revenue quality, each with timeline and measured value impact.
3. Current market conditions for {industry} in {location}: buyer priorities with percentages and typical time to sell.`;

const EXTRACTION_SYSTEM_PROMPT = `You convert M&A research notes into structured JSON.
Use only figures present in the notes; omit anything not stated. Keep values as short strings such as "14 days", "25%" or "15-20%".`;

const EXTRACTION_TEMPLATE = `Research notes:
{content}

Return a JSON object with these keys:
- "valuation_benchmarks": {"owner_dependence": {"days_threshold", "discount", "source", "year"}, "customer_concentration": {"threshold", "discount", "source", "year"}, "recurring_revenue": {"threshold", "premium", "source", "year"}, "profit_margins": {"expected_EBITDA", "source", "year"}}
- "improvement_strategies": {"owner_dependence" | "operations" | "revenue_quality": {"strategy", "timeline", "value_impact", "source", "year"}}
- "market_conditions": {"buyer_priorities": [{"priority", "percentage", "source"}], "average_sale_time": {"duration", "source", "year"}}
- "citations": [{"source", "year", "url"}]`;

export function buildResearchQuery(industry: string, location: string, revenue?: string): string {
  return buildPrompt(RESEARCH_QUERY_TEMPLATE, {
    industry,
    location,
    revenue: revenue ?? 'not disclosed',
  });
}

function mergeCitations(...lists: Citation[][]): Citation[] {
  const seen = new Set<string>();
  const merged: Citation[] = [];
  for (const citation of lists.flat()) {
    const key = `${citation.source.toLowerCase()}|${citation.url ?? ''}`;
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(citation);
  }
  return merged;
}

async function search(query: string, env: StageEnv): Promise<SearchOutcome> {
  try {
    return await env.deps.research.search(query, { signal: env.signal });
  } catch (err) {
    if (env.signal?.aborted) throw err;
    const error = new CollaboratorUnavailable('research', errorMessage(err));
    env.logger.warn(error.message);
    return { status: 'unavailable', reason: error.message };
  }
}

type LiveResearch =
  | { ok: true; data: ResearchData; citations: Citation[] }
  | { ok: false; reason: string };

async function structureLiveResearch(
  outcome: Extract<SearchOutcome, { status: 'ok' }>,
  env: StageEnv,
): Promise<LiveResearch> {
  const extraction = await requestStructured({
    generator: env.deps.generator,
    systemPrompt: EXTRACTION_SYSTEM_PROMPT,
    userPrompt: buildPrompt(EXTRACTION_TEMPLATE, {
      content: truncateForPrompt(outcome.content, 6000),
    }),
    requiredKeys: ['valuation_benchmarks'],
    knownKeys: ['improvement_strategies', 'market_conditions', 'citations'],
    schema: researchPayloadSchema,
    maxRetries: env.maxRetries,
    temperature: 0.1,
    signal: env.signal,
    onAttempt: (a) => env.logger.debug('Research extraction attempt', a),
  });

  if (!extraction.ok) {
    return { ok: false, reason: `extraction failed: ${extraction.error.reason}` };
  }
  return {
    ok: true,
    data: extraction.data,
    citations: mergeCitations(outcome.citations, citationsOf(extraction.data)),
  };
}

export const researchStage: StageDefinition<'research', 'intake'> = {
  name: 'research',
  requires: ['intake'],

  async run(context, env) {
    const { anonymized } = context.results.intake;
    const query = buildResearchQuery(anonymized.industry, anonymized.location, anonymized.revenueRange);

    const outcome = await search(query, env);
    const live = outcome.status === 'ok' ? await structureLiveResearch(outcome, env) : null;

    let data: ResearchData;
    let citations: Citation[];
    let fallbackReason: string | undefined;

    if (live?.ok) {
      data = live.data;
      citations = live.citations;
    } else {
      fallbackReason = live ? live.reason : outcome.status === 'unavailable' ? outcome.reason : 'unknown';
      env.logger.warn('Using fallback research data', { reason: fallbackReason });
      data = loadFallbackResearch();
      citations = citationsOf(data);
    }

    const benchmarks = extractBenchmarks(data, anonymized.industry);
    const dataSource = live?.ok ? 'live' : 'fallback';
    env.logger.info('Benchmarks extracted', benchmarks);

    return {
      ok: true,
      result: { query, dataSource, data, benchmarks, citations, fallbackReason },
      status:
        `Research complete (${dataSource}): owner independence ${benchmarks.ownerIndependenceDays} days, ` +
        `concentration ${benchmarks.customerConcentrationThreshold}%, recurring ${benchmarks.recurringRevenueThreshold}%`,
      warnings: fallbackReason ? [`Research fell back to stored benchmarks: ${fallbackReason}`] : [],
    };
  },
};
