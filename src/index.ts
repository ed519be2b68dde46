/**
 * Note Recall
 *
 * Hybrid keyword and vector retrieval over a local notes index, with LLM
 * query expansion and reranking.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Text generation and embeddings
export * from './llm/index.js';
export { OllamaEmbeddingProvider } from './models/embedding-provider.js';
export type { EmbeddingProvider, EmbedOptions } from './models/embedding-provider.js';

// Retrieval
export * from './retrieval/index.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
