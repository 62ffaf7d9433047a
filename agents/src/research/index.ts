export * from './types.js';
export * from './benchmark-extractor.js';
export * from './fallback-research.js';
export * from './search-client.js';
export * from './research-agent.js';
