/**
 * Runtime configuration for the retrieval pipeline.
 */

/** Supported text-generation providers. */
export const LLM_PROVIDERS = ['ollama', 'anthropic'] as const;

/** Text-generation provider used for expansion and reranking. */
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export function isLlmProvider(value: string): value is LlmProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

/**
 * Complete retrieval configuration.
 */
export interface RetrievalConfig {
  // Storage
  /** Path to the SQLite database holding the FTS5 and vector indexes */
  dbPath: string;

  // Collaborators
  /** Base URL of the Ollama server (embeddings, and generation when provider is ollama) */
  ollamaUrl: string;
  /** Embedding model used to embed query text */
  embeddingModel: string;
  /** Provider for expansion and rerank calls */
  llmProvider: LlmProvider;
  /** Model used for query expansion */
  expansionModel: string;
  /** Model used for relevance judgments */
  rerankModel: string;

  // Fusion
  fusion: {
    /** RRF constant (default: 60) */
    k: number;
    /** Add +0.05 / +0.02 for rank 0 / ranks 1-2 appearances */
    topRankBonus: boolean;
  };

  // Retrieval
  /** Hits requested from each backend in fused modes */
  candidateLimit: number;
  /** Paraphrases requested from the expander in `query` mode */
  variantCount: number;
  /** Weight given to expanded variants (original is always 1.0) */
  expandedVariantWeight: number;
  /** Times the original variant's lists are counted in `query` mode */
  originalQueryMultiplicity: number;
  /** Min-max normalize fused scores before blending with rerank scores */
  normalizeBeforeRerank: boolean;

  // Rerank
  rerank: {
    /** Candidates sent for judgment (default: 30) */
    budget: number;
    /** Judgments in flight at once */
    concurrency: number;
    /** Document characters included in a judgment prompt */
    maxDocumentChars: number;
  };

  // Timeouts (per call)
  timeouts: {
    keywordMs: number;
    /** Covers query embedding plus vector search */
    vectorMs: number;
    expansionMs: number;
    judgmentMs: number;
  };

  // Answer context
  context: {
    /** Token budget for the context handed to the answering step */
    maxTokens: number;
    /** File path fragments never handed to the answering step */
    excludedFolders: string[];
  };
}

/** Default generation model per provider. */
export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  ollama: 'qwen2.5:0.5b',
  anthropic: 'claude-3-haiku-20240307',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RetrievalConfig = {
  dbPath: '~/.note-recall/index.db',

  ollamaUrl: 'http://localhost:11434',
  embeddingModel: 'nomic-embed-text',
  llmProvider: 'ollama',
  expansionModel: DEFAULT_MODELS.ollama,
  rerankModel: DEFAULT_MODELS.ollama,

  fusion: {
    k: 60,
    topRankBonus: true,
  },

  candidateLimit: 30,
  variantCount: 2,
  expandedVariantWeight: 0.5,
  originalQueryMultiplicity: 2,
  normalizeBeforeRerank: true,

  rerank: {
    budget: 30,
    concurrency: 5,
    maxDocumentChars: 2000,
  },

  timeouts: {
    keywordMs: 2_000,
    vectorMs: 30_000,
    expansionMs: 10_000,
    judgmentMs: 10_000,
  },

  context: {
    maxTokens: 4000,
    excludedFolders: [],
  },
};

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: RetrievalConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.fusion.k) || config.fusion.k < 1) {
    errors.push('fusion.k must be a positive integer');
  }
  if (!Number.isInteger(config.candidateLimit) || config.candidateLimit < 1) {
    errors.push('candidateLimit must be a positive integer');
  }
  if (!Number.isInteger(config.variantCount) || config.variantCount < 0) {
    errors.push('variantCount must be a non-negative integer');
  }
  if (config.expandedVariantWeight <= 0 || config.expandedVariantWeight >= 1) {
    errors.push('expandedVariantWeight must be between 0 and 1 (exclusive)');
  }
  if (!Number.isInteger(config.originalQueryMultiplicity) || config.originalQueryMultiplicity < 1) {
    errors.push('originalQueryMultiplicity must be a positive integer');
  }
  if (!Number.isInteger(config.rerank.budget) || config.rerank.budget < 1) {
    errors.push('rerank.budget must be a positive integer');
  }
  if (!Number.isInteger(config.rerank.concurrency) || config.rerank.concurrency < 1) {
    errors.push('rerank.concurrency must be a positive integer');
  }
  if (!Number.isInteger(config.rerank.maxDocumentChars) || config.rerank.maxDocumentChars < 1) {
    errors.push('rerank.maxDocumentChars must be a positive integer');
  }
  for (const [name, value] of Object.entries(config.timeouts)) {
    if (!(value > 0)) {
      errors.push(`timeouts.${name} must be positive`);
    }
  }
  if (config.context.maxTokens < 100) {
    errors.push('context.maxTokens should be at least 100');
  }

  return errors;
}
