export const name = '@dirdigest/core';

export * from './config/loader';
export * from './summarize/orchestrator';
export * from './digest/aggregator';
export * from './digest/renderer';
export * from './pipeline';
