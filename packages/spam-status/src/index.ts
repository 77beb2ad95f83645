export * from './bootstrap.js';
export * from './config/app-config.schema.js';
export * from './config/load-config.js';
export * from './contract-status/contract-status-service.js';
export * from './contract-status/merge-outcomes.js';
export * from './errors.js';
export type * from './events.js';
export * from './health/health-aggregator.js';
export * from './metrics/pipeline-metrics.js';
