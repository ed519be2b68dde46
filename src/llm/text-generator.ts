/**
 * Opaque text-generation interface used by query expansion and reranking.
 */

export interface GenerateOptions {
  /** Provider model identifier */
  model: string;
  /** Per-call timeout */
  timeoutMs: number;
  /** Aborts the call (caller cancellation or an outer deadline) */
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Generates a completion for a single prompt.
 *
 * Implementations throw `LlmError` with code `LLM_TIMEOUT` or
 * `LLM_UNAVAILABLE`; they never return partial text.
 */
export interface TextGenerator {
  /** Provider name for diagnostics */
  readonly provider: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
