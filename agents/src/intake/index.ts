export * from './types.js';
export * from './form-validator.js';
export * from './pii-redactor.js';
export * from './pii-store.js';
export * from './sinks.js';
export * from './intake-agent.js';
