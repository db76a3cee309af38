export * from './orchestrator.js';
export * from './selector.js';
export * from './enrichment.js';
export * from './tools.js';
