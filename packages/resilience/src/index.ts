export * from './abort/deadline.js';
export * from './cache/lru-ttl-cache.js';
export * from './concurrency/semaphore.js';
export * from './health/dependency-health.js';
export * from './provider-stats/provider-call-stats.js';
