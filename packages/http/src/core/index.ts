// Pure helpers and effect types for the HTTP client
export * from './http-utils.js';
export * from './types.js';
