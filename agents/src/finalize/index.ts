export * from './types.js';
export * from './pii-reinsertion.js';
export * from './finalize-agent.js';
