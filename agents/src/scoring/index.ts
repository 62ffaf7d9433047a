export * from './types.js';
export * from './categories.js';
export * from './industry-profiles.js';
export * from './signals.js';
export * from './score-builder.js';
export * from './category-scorers.js';
export * from './aggregate.js';
export * from './consistency.js';
export * from './scoring-agent.js';
