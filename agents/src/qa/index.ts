export * from './types.js';
export * from './checks.js';
export * from './qa-agent.js';
