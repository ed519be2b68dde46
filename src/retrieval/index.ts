/**
 * Retrieval system exports.
 */

// Types
export { RETRIEVAL_MODES, BACKENDS } from './types.js';
export type {
  RetrievalMode,
  BackendName,
  QueryFilters,
  Query,
  QueryVariant,
  HitMetadata,
  RetrievalHit,
  RankedResult,
  BackendStatus,
  BackendDiagnostics,
  ExpansionStatus,
  RerankStats,
  StageTimings,
  RetrievalDiagnostics,
  RetrievalResponse,
  RetrieveOptions,
} from './types.js';

// Queries
export { createQuery, validateQuery, DEFAULT_LIMIT, DEFAULT_MODE } from './query.js';
export type { QueryInput } from './query.js';

// Backends
export { StoreKeywordSearch, StoreVectorSearch, rankHits } from './backends.js';
export type { KeywordSearch, VectorSearch, SearchCallOptions } from './backends.js';

// Reciprocal Rank Fusion
export { fuseRRF, normalizeScores, DEFAULT_K } from './rrf.js';
export type { FuseOptions } from './rrf.js';

// Query expansion
export { QueryExpander, parseExpansion, buildExpansionPrompt } from './query-expander.js';
export type { QueryExpanderOptions, ExpansionResult } from './query-expander.js';

// Reranking
export { Reranker, parseJudgment, blendScore, blendWeights } from './reranker.js';
export type { RerankerOptions, RerankOptions, RerankResult } from './reranker.js';

// Orchestration
export { RetrievalOrchestrator } from './orchestrator.js';
export type { OrchestratorSettings, RetrievalOrchestratorDeps } from './orchestrator.js';

// Answer context
export { assembleAnswerContext, formatSource } from './context-assembler.js';
export type { AnswerContext, AnswerSource, AssembleOptions } from './context-assembler.js';

// Meeting prep
export { getPersonContext, getActionItems } from './person-context.js';
export type { Retriever, PersonContext, ActionItem, MeetingSummary } from './person-context.js';

// Service
export { RetrievalService, createRetrievalService } from './service.js';
export type { RetrievalServiceOptions, IndexStats } from './service.js';
