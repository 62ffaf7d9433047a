/**
 * @exitready/agents - pipeline stages and engines
 *
 * - intake/    : submission validation, PII redaction, intake sinks
 * - research/  : market research with fallback data, benchmark extraction
 * - scoring/   : category scorers and aggregation
 * - summary/   : narrative report sections
 * - qa/        : report checks, repair and polish
 * - finalize/  : PII reinsertion and final output
 * - pipeline/  : stage registry and orchestrator
 * - shared/    : run context, errors, logging
 */

export * from './shared/index.js';
export * from './intake/index.js';
export * from './research/index.js';
export * from './scoring/index.js';
export * from './summary/index.js';
export * from './qa/index.js';
export * from './finalize/index.js';
export * from './pipeline/index.js';
