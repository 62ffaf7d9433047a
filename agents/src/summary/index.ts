export * from './types.js';
export * from './timeline.js';
export * from './report.js';
export * from './default-sections.js';
export * from './summary-agent.js';
