/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides (passed directly)
 * 2. Environment variables (NOTE_RECALL_*)
 * 3. Project config file (./note-recall.config.json)
 * 4. User config file (~/.note-recall/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  resolvePath,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  LLM_PROVIDERS,
  isLlmProvider,
  type LlmProvider,
  type RetrievalConfig,
} from './retrieval-config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  storage?: {
    dbPath?: string;
  };
  ollama?: {
    url?: string;
  };
  embedding?: {
    model?: string;
  };
  llm?: {
    /** `ollama` or `anthropic`; checked by validateExternalConfig() */
    provider?: string;
    /** Defaults to the provider's model when unset */
    expansionModel?: string;
    /** Defaults to the provider's model when unset */
    rerankModel?: string;
  };
  fusion?: {
    k?: number;
    topRankBonus?: boolean;
  };
  retrieval?: {
    candidateLimit?: number;
    variantCount?: number;
    expandedVariantWeight?: number;
    originalQueryMultiplicity?: number;
    normalizeBeforeRerank?: boolean;
  };
  rerank?: {
    budget?: number;
    concurrency?: number;
    maxDocumentChars?: number;
  };
  timeouts?: {
    keywordMs?: number;
    vectorMs?: number;
    expansionMs?: number;
    judgmentMs?: number;
  };
  context?: {
    maxTokens?: number;
    excludedFolders?: string[];
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
  },
  ollama: {
    url: DEFAULT_CONFIG.ollamaUrl,
  },
  embedding: {
    model: DEFAULT_CONFIG.embeddingModel,
  },
  llm: {
    provider: DEFAULT_CONFIG.llmProvider,
  },
  fusion: { ...DEFAULT_CONFIG.fusion },
  retrieval: {
    candidateLimit: DEFAULT_CONFIG.candidateLimit,
    variantCount: DEFAULT_CONFIG.variantCount,
    expandedVariantWeight: DEFAULT_CONFIG.expandedVariantWeight,
    originalQueryMultiplicity: DEFAULT_CONFIG.originalQueryMultiplicity,
    normalizeBeforeRerank: DEFAULT_CONFIG.normalizeBeforeRerank,
  },
  rerank: { ...DEFAULT_CONFIG.rerank },
  timeouts: { ...DEFAULT_CONFIG.timeouts },
  context: {
    maxTokens: DEFAULT_CONFIG.context.maxTokens,
    excludedFolders: [...DEFAULT_CONFIG.context.excludedFolders],
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const SECTIONS: ReadonlyArray<keyof ExternalConfig> = [
  'storage',
  'ollama',
  'embedding',
  'llm',
  'fusion',
  'retrieval',
  'rerank',
  'timeouts',
  'context',
];

/**
 * Shape check for parsed config files: an object whose known sections are objects.
 * Value ranges are checked separately by validateExternalConfig().
 */
export function isExternalConfig(value: unknown): value is ExternalConfig {
  if (!isPlainObject(value)) return false;
  return SECTIONS.every((section) => value[section] === undefined || isPlainObject(value[section]));
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (!isExternalConfig(parsed)) {
      log.warn(`Ignoring config file ${path}: not a config object`);
      return null;
    }
    return parsed;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function parseProvider(value: string): LlmProvider | undefined {
  if (isLlmProvider(value)) return value;
  log.warn(`Ignoring unknown LLM provider "${value}"`);
  return undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with NOTE_RECALL_ and use underscores for nesting.
 * Examples:
 *   NOTE_RECALL_STORAGE_DB_PATH=~/notes/index.db
 *   NOTE_RECALL_FUSION_K=60
 *   NOTE_RECALL_CONTEXT_EXCLUDED_FOLDERS=Archive,Templates
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};
  const env = process.env;

  // Storage
  if (env.NOTE_RECALL_STORAGE_DB_PATH) {
    config.storage = { dbPath: env.NOTE_RECALL_STORAGE_DB_PATH };
  }

  // Collaborators
  if (env.NOTE_RECALL_OLLAMA_URL) {
    config.ollama = { url: env.NOTE_RECALL_OLLAMA_URL };
  }
  if (env.NOTE_RECALL_EMBEDDING_MODEL) {
    config.embedding = { model: env.NOTE_RECALL_EMBEDDING_MODEL };
  }
  if (env.NOTE_RECALL_LLM_PROVIDER) {
    const provider = parseProvider(env.NOTE_RECALL_LLM_PROVIDER);
    if (provider) {
      config.llm = config.llm ?? {};
      config.llm.provider = provider;
    }
  }
  if (env.NOTE_RECALL_LLM_EXPANSION_MODEL) {
    config.llm = config.llm ?? {};
    config.llm.expansionModel = env.NOTE_RECALL_LLM_EXPANSION_MODEL;
  }
  if (env.NOTE_RECALL_LLM_RERANK_MODEL) {
    config.llm = config.llm ?? {};
    config.llm.rerankModel = env.NOTE_RECALL_LLM_RERANK_MODEL;
  }

  // Fusion
  if (env.NOTE_RECALL_FUSION_K) {
    config.fusion = config.fusion ?? {};
    config.fusion.k = parseInt(env.NOTE_RECALL_FUSION_K, 10);
  }
  if (env.NOTE_RECALL_FUSION_TOP_RANK_BONUS) {
    config.fusion = config.fusion ?? {};
    config.fusion.topRankBonus = env.NOTE_RECALL_FUSION_TOP_RANK_BONUS === 'true';
  }

  // Retrieval
  if (env.NOTE_RECALL_RETRIEVAL_CANDIDATE_LIMIT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.candidateLimit = parseInt(env.NOTE_RECALL_RETRIEVAL_CANDIDATE_LIMIT, 10);
  }
  if (env.NOTE_RECALL_RETRIEVAL_VARIANT_COUNT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.variantCount = parseInt(env.NOTE_RECALL_RETRIEVAL_VARIANT_COUNT, 10);
  }
  if (env.NOTE_RECALL_RETRIEVAL_EXPANDED_VARIANT_WEIGHT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.expandedVariantWeight = parseFloat(
      env.NOTE_RECALL_RETRIEVAL_EXPANDED_VARIANT_WEIGHT,
    );
  }
  if (env.NOTE_RECALL_RETRIEVAL_ORIGINAL_QUERY_MULTIPLICITY) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.originalQueryMultiplicity = parseInt(
      env.NOTE_RECALL_RETRIEVAL_ORIGINAL_QUERY_MULTIPLICITY,
      10,
    );
  }
  if (env.NOTE_RECALL_RETRIEVAL_NORMALIZE_BEFORE_RERANK) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.normalizeBeforeRerank =
      env.NOTE_RECALL_RETRIEVAL_NORMALIZE_BEFORE_RERANK === 'true';
  }

  // Rerank
  if (env.NOTE_RECALL_RERANK_BUDGET) {
    config.rerank = config.rerank ?? {};
    config.rerank.budget = parseInt(env.NOTE_RECALL_RERANK_BUDGET, 10);
  }
  if (env.NOTE_RECALL_RERANK_CONCURRENCY) {
    config.rerank = config.rerank ?? {};
    config.rerank.concurrency = parseInt(env.NOTE_RECALL_RERANK_CONCURRENCY, 10);
  }
  if (env.NOTE_RECALL_RERANK_MAX_DOCUMENT_CHARS) {
    config.rerank = config.rerank ?? {};
    config.rerank.maxDocumentChars = parseInt(env.NOTE_RECALL_RERANK_MAX_DOCUMENT_CHARS, 10);
  }

  // Timeouts
  if (env.NOTE_RECALL_TIMEOUTS_KEYWORD_MS) {
    config.timeouts = config.timeouts ?? {};
    config.timeouts.keywordMs = parseInt(env.NOTE_RECALL_TIMEOUTS_KEYWORD_MS, 10);
  }
  if (env.NOTE_RECALL_TIMEOUTS_VECTOR_MS) {
    config.timeouts = config.timeouts ?? {};
    config.timeouts.vectorMs = parseInt(env.NOTE_RECALL_TIMEOUTS_VECTOR_MS, 10);
  }
  if (env.NOTE_RECALL_TIMEOUTS_EXPANSION_MS) {
    config.timeouts = config.timeouts ?? {};
    config.timeouts.expansionMs = parseInt(env.NOTE_RECALL_TIMEOUTS_EXPANSION_MS, 10);
  }
  if (env.NOTE_RECALL_TIMEOUTS_JUDGMENT_MS) {
    config.timeouts = config.timeouts ?? {};
    config.timeouts.judgmentMs = parseInt(env.NOTE_RECALL_TIMEOUTS_JUDGMENT_MS, 10);
  }

  // Answer context
  if (env.NOTE_RECALL_CONTEXT_MAX_TOKENS) {
    config.context = config.context ?? {};
    config.context.maxTokens = parseInt(env.NOTE_RECALL_CONTEXT_MAX_TOKENS, 10);
  }
  if (env.NOTE_RECALL_CONTEXT_EXCLUDED_FOLDERS) {
    config.context = config.context ?? {};
    config.context.excludedFolders = env.NOTE_RECALL_CONTEXT_EXCLUDED_FOLDERS.split(',')
      .map((f) => f.trim())
      .filter(Boolean);
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
function mergeConfig(
  target: Required<ExternalConfig>,
  source: ExternalConfig,
): Required<ExternalConfig> {
  return {
    storage: { ...target.storage, ...source.storage },
    ollama: { ...target.ollama, ...source.ollama },
    embedding: { ...target.embedding, ...source.embedding },
    llm: { ...target.llm, ...source.llm },
    fusion: { ...target.fusion, ...source.fusion },
    retrieval: { ...target.retrieval, ...source.retrieval },
    rerank: { ...target.rerank, ...source.rerank },
    timeouts: { ...target.timeouts, ...source.timeouts },
    context: { ...target.context, ...source.context },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // LLM
  if (config.llm?.provider !== undefined && !isLlmProvider(config.llm.provider)) {
    errors.push(`llm.provider must be one of ${LLM_PROVIDERS.join(', ')}`);
  }

  // Fusion
  if (config.fusion?.k !== undefined) {
    if (!Number.isInteger(config.fusion.k) || config.fusion.k < 1) {
      errors.push('fusion.k must be a positive integer');
    }
  }

  // Retrieval
  if (config.retrieval?.candidateLimit !== undefined) {
    if (!Number.isInteger(config.retrieval.candidateLimit) || config.retrieval.candidateLimit < 1) {
      errors.push('retrieval.candidateLimit must be a positive integer');
    }
  }
  if (config.retrieval?.variantCount !== undefined) {
    if (!Number.isInteger(config.retrieval.variantCount) || config.retrieval.variantCount < 0) {
      errors.push('retrieval.variantCount must be a non-negative integer');
    }
  }
  if (config.retrieval?.expandedVariantWeight !== undefined) {
    const weight = config.retrieval.expandedVariantWeight;
    if (!(weight > 0 && weight < 1)) {
      errors.push('retrieval.expandedVariantWeight must be between 0 and 1 (exclusive)');
    }
  }
  if (config.retrieval?.originalQueryMultiplicity !== undefined) {
    const multiplicity = config.retrieval.originalQueryMultiplicity;
    if (!Number.isInteger(multiplicity) || multiplicity < 1) {
      errors.push('retrieval.originalQueryMultiplicity must be a positive integer');
    }
  }

  // Rerank
  if (config.rerank?.budget !== undefined) {
    if (!Number.isInteger(config.rerank.budget) || config.rerank.budget < 1) {
      errors.push('rerank.budget must be a positive integer');
    }
  }
  if (config.rerank?.concurrency !== undefined) {
    if (!Number.isInteger(config.rerank.concurrency) || config.rerank.concurrency < 1) {
      errors.push('rerank.concurrency must be a positive integer');
    }
  }
  if (config.rerank?.maxDocumentChars !== undefined) {
    const chars = config.rerank.maxDocumentChars;
    if (!Number.isInteger(chars) || chars < 1) {
      errors.push('rerank.maxDocumentChars must be a positive integer');
    }
  }

  // Timeouts
  if (config.timeouts) {
    for (const [name, value] of Object.entries(config.timeouts)) {
      if (value !== undefined && !(value > 0)) {
        errors.push(`timeouts.${name} must be positive`);
      }
    }
  }

  // Context
  if (config.context?.maxTokens !== undefined) {
    if (config.context.maxTokens < 100) {
      errors.push('context.maxTokens should be at least 100');
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Programmatic overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides
 * 2. Environment variables (NOTE_RECALL_*)
 * 3. Project config file (./note-recall.config.json)
 * 4. User config file (~/.note-recall/config.json)
 * 5. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config = mergeConfig(EXTERNAL_DEFAULTS, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.note-recall/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'note-recall.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  // 1. Overrides
  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  return config;
}

function resolveProvider(value: string | undefined): LlmProvider {
  if (value === undefined) return DEFAULT_CONFIG.llmProvider;
  if (isLlmProvider(value)) return value;
  throw invalidConfig([`llm.provider must be one of ${LLM_PROVIDERS.join(', ')}`]);
}

/**
 * Convert ExternalConfig to RetrievalConfig (the runtime format).
 *
 * Generation models default to the selected provider's model.
 *
 * @throws ConfigError when `llm.provider` is not a supported provider
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): RetrievalConfig {
  const provider = resolveProvider(external.llm.provider);
  const providerModel = DEFAULT_MODELS[provider];

  return {
    dbPath: resolvePath(external.storage.dbPath ?? DEFAULT_CONFIG.dbPath),

    ollamaUrl: external.ollama.url ?? DEFAULT_CONFIG.ollamaUrl,
    embeddingModel: external.embedding.model ?? DEFAULT_CONFIG.embeddingModel,
    llmProvider: provider,
    expansionModel: external.llm.expansionModel ?? providerModel,
    rerankModel: external.llm.rerankModel ?? providerModel,

    fusion: {
      k: external.fusion.k ?? DEFAULT_CONFIG.fusion.k,
      topRankBonus: external.fusion.topRankBonus ?? DEFAULT_CONFIG.fusion.topRankBonus,
    },

    candidateLimit: external.retrieval.candidateLimit ?? DEFAULT_CONFIG.candidateLimit,
    variantCount: external.retrieval.variantCount ?? DEFAULT_CONFIG.variantCount,
    expandedVariantWeight:
      external.retrieval.expandedVariantWeight ?? DEFAULT_CONFIG.expandedVariantWeight,
    originalQueryMultiplicity:
      external.retrieval.originalQueryMultiplicity ?? DEFAULT_CONFIG.originalQueryMultiplicity,
    normalizeBeforeRerank:
      external.retrieval.normalizeBeforeRerank ?? DEFAULT_CONFIG.normalizeBeforeRerank,

    rerank: {
      budget: external.rerank.budget ?? DEFAULT_CONFIG.rerank.budget,
      concurrency: external.rerank.concurrency ?? DEFAULT_CONFIG.rerank.concurrency,
      maxDocumentChars: external.rerank.maxDocumentChars ?? DEFAULT_CONFIG.rerank.maxDocumentChars,
    },

    timeouts: {
      keywordMs: external.timeouts.keywordMs ?? DEFAULT_CONFIG.timeouts.keywordMs,
      vectorMs: external.timeouts.vectorMs ?? DEFAULT_CONFIG.timeouts.vectorMs,
      expansionMs: external.timeouts.expansionMs ?? DEFAULT_CONFIG.timeouts.expansionMs,
      judgmentMs: external.timeouts.judgmentMs ?? DEFAULT_CONFIG.timeouts.judgmentMs,
    },

    context: {
      maxTokens: external.context.maxTokens ?? DEFAULT_CONFIG.context.maxTokens,
      excludedFolders: external.context.excludedFolders ?? DEFAULT_CONFIG.context.excludedFolders,
    },
  };
}

function invalidConfig(errors: string[]): ConfigError {
  return new ConfigError(`Invalid configuration: ${[...new Set(errors)].join('; ')}`, 'CONFIG_INVALID');
}

/**
 * Load, validate, and convert configuration in one step.
 *
 * @throws ConfigError when any source produces an invalid value
 */
export function loadRuntimeConfig(options: LoadConfigOptions = {}): RetrievalConfig {
  const external = loadConfig(options);

  const externalErrors = validateExternalConfig(external);
  if (externalErrors.length > 0) throw invalidConfig(externalErrors);

  const runtime = toRuntimeConfig(external);
  const runtimeErrors = validateConfig(runtime);
  if (runtimeErrors.length > 0) throw invalidConfig(runtimeErrors);

  return runtime;
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
