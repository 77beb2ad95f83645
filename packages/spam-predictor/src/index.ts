export * from './cache/prediction-cache.js';
export { ClassifierConfigSchema, DEFAULT_OPENAI_BASE_URL } from './config.schema.js';
export type { ClassifierConfig, ClassifierConfigInput } from './config.schema.js';
export * from './errors.js';
export type { SpamPredictorEvent } from './events.js';
export * from './fingerprint.js';
export * from './openai/completion-client.js';
export type { ChatMessage } from './openai/openai.schemas.js';
export * from './registry/model-registry.js';
export * from './registry/prompt-registry.js';
export { parseVerdict } from './response-parser.js';
export * from './spam-classifier.js';
