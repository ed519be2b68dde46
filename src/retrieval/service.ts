/**
 * Wires configuration, storage and model providers into a ready retrieval
 * service.
 */

import type Database from 'better-sqlite3';
import { loadRuntimeConfig } from '../config/loader.js';
import type { RetrievalConfig } from '../config/retrieval-config.js';
import { createTextGenerator } from '../llm/index.js';
import type { TextGenerator } from '../llm/text-generator.js';
import { OllamaEmbeddingProvider, type EmbeddingProvider } from '../models/embedding-provider.js';
import { getIndexStats, hasIndexTables, openDatabase } from '../storage/db.js';
import { KeywordStore } from '../storage/keyword-store.js';
import { VectorStore } from '../storage/vector-store.js';
import { StoreKeywordSearch, StoreVectorSearch } from './backends.js';
import { assembleAnswerContext, type AnswerContext } from './context-assembler.js';
import {
  getActionItems,
  getPersonContext,
  type ActionItem,
  type PersonContext,
} from './person-context.js';
import { RetrievalOrchestrator } from './orchestrator.js';
import type { QueryInput } from './query.js';
import { QueryExpander } from './query-expander.js';
import { Reranker } from './reranker.js';
import type { RetrievalResponse, RetrieveOptions } from './types.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('service');

export interface RetrievalServiceOptions {
  /** Loaded from files and environment when omitted */
  config?: RetrievalConfig;
  /** Opened read-only at `config.dbPath` when omitted */
  db?: Database.Database;
  embedder?: EmbeddingProvider;
  /** Generator for expansion and judgments; null disables both */
  generator?: TextGenerator | null;
}

export interface IndexStats {
  chunks: number;
  vectors: number;
  files: number;
  /** Vectors loaded for the configured embedding model */
  loadedVectors: number;
}

export class RetrievalService {
  readonly orchestrator: RetrievalOrchestrator;
  private readonly vectorStore: VectorStore;
  private readonly ownsDb: boolean;

  constructor(
    readonly config: RetrievalConfig,
    private readonly db: Database.Database,
    deps: { embedder: EmbeddingProvider; generator: TextGenerator | null; ownsDb: boolean },
  ) {
    this.ownsDb = deps.ownsDb;
    this.vectorStore = new VectorStore(db, { model: config.embeddingModel });

    const generator = deps.generator;
    this.orchestrator = new RetrievalOrchestrator({
      keyword: new StoreKeywordSearch(new KeywordStore(db)),
      vector: new StoreVectorSearch(this.vectorStore, deps.embedder),
      expander: generator
        ? new QueryExpander({
            generator,
            model: config.expansionModel,
            timeoutMs: config.timeouts.expansionMs,
            expandedWeight: config.expandedVariantWeight,
          })
        : undefined,
      reranker: generator
        ? new Reranker({
            generator,
            model: config.rerankModel,
            timeoutMs: config.timeouts.judgmentMs,
            concurrency: config.rerank.concurrency,
            maxDocumentChars: config.rerank.maxDocumentChars,
          })
        : undefined,
      settings: config,
    });
  }

  retrieve(input: QueryInput, options?: RetrieveOptions): Promise<RetrievalResponse> {
    return this.orchestrator.retrieve(input, options);
  }

  /**
   * Retrieve and assemble the context for an answering step.
   */
  async answerContext(
    input: QueryInput,
    options?: RetrieveOptions,
  ): Promise<{ response: RetrievalResponse; context: AnswerContext }> {
    const response = await this.retrieve(input, options);
    const context = assembleAnswerContext(response.results, {
      maxTokens: this.config.context.maxTokens,
      excludedFolders: this.config.context.excludedFolders,
    });
    return { response, context };
  }

  personContext(person: string, options?: RetrieveOptions): Promise<PersonContext> {
    return getPersonContext(this.orchestrator, person, options);
  }

  actionItems(params: { person?: string; limit?: number } = {}, options?: RetrieveOptions): Promise<ActionItem[]> {
    return getActionItems(this.orchestrator, params, options);
  }

  /**
   * Drop the vector snapshot so the next search sees the indexer's writes.
   */
  refreshIndex(): void {
    this.vectorStore.invalidate();
    log.info('Vector snapshot invalidated');
  }

  stats(): IndexStats {
    return { ...getIndexStats(this.db), loadedVectors: this.vectorStore.count() };
  }

  close(): void {
    if (this.ownsDb) {
      this.db.close();
    }
  }
}

/**
 * Create a retrieval service from configuration.
 *
 * @throws ConfigError when the loaded configuration is invalid
 * @throws StorageError when the index database cannot be opened or has no
 *   index tables (code INDEX_MISSING)
 */
export function createRetrievalService(options: RetrievalServiceOptions = {}): RetrievalService {
  const config = options.config ?? loadRuntimeConfig();
  const db = options.db ?? openDatabase(config.dbPath);
  if (!hasIndexTables(db)) {
    if (!options.db) db.close();
    throw new StorageError(`No index tables in ${config.dbPath}`, 'INDEX_MISSING');
  }

  const embedder =
    options.embedder ??
    new OllamaEmbeddingProvider({ baseUrl: config.ollamaUrl, model: config.embeddingModel });
  const generator = options.generator === undefined ? createTextGenerator(config) : options.generator;

  log.debug('Retrieval service created', {
    dbPath: config.dbPath,
    provider: generator?.provider ?? 'none',
    embeddingModel: config.embeddingModel,
  });

  return new RetrievalService(config, db, { embedder, generator, ownsDb: !options.db });
}
