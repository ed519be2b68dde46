/**
 * Configuration exports.
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  LLM_PROVIDERS,
  isLlmProvider,
  resolvePath,
  validateConfig,
} from './retrieval-config.js';
export type { LlmProvider, RetrievalConfig } from './retrieval-config.js';

export {
  EXTERNAL_DEFAULTS,
  loadConfig,
  loadRuntimeConfig,
  toRuntimeConfig,
  validateExternalConfig,
} from './loader.js';
export type { ExternalConfig, LoadConfigOptions } from './loader.js';
