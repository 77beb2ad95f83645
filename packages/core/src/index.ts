export * from './address/contract-address.js';
export * from './contract/contract-metadata.js';
export * from './contract/contract-status.js';
export * from './errors/index.js';
export * from './utils/type-guard-utils.js';
