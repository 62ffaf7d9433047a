export * from './registry.js';
export * from './run.js';
export * from './response.js';
