/**
 * LLM query expansion.
 *
 * Asks a text generator for alternative phrasings of a query and turns them
 * into weighted QueryVariants. The original query is always the first
 * variant. Expansion never fails a request: a failed or unparseable model
 * call leaves the original alone.
 */

import type { TextGenerator } from '../llm/text-generator.js';
import type { ExpansionStatus, QueryVariant } from './types.js';
import { settle } from '../utils/async.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('query-expander');

/** Default weight of an expanded variant. */
export const DEFAULT_EXPANDED_WEIGHT = 0.5;

const EXPANSION_TEMPERATURE = 0.7;

/**
 * Instruction template. `{count}` and `{query}` are substituted.
 */
export const EXPANSION_PROMPT = `Generate {count} alternative search queries for: "{query}"

Rules:
- Keep the same meaning/intent
- Use different words or phrasings
- Vary how specific each one is
- Keep each under 10 words

Output exactly {count} lines, one query per line:`;

/** Numbering or bullet at the start of a line: `1.`, `2)`, `3:`, `-`, `•`, `*`. */
const LINE_PREFIX = /^(?:\d+\s*[.):]|[-•*])\s*/;

/** Quotes wrapping a whole phrase. */
const WRAPPING_QUOTES = /^["'“‘](.*)["'”’]$/;

/**
 * Parse outcome of a model response.
 */
export type ExpansionParse =
  | { kind: 'parsed'; phrases: string[] }
  | { kind: 'unparseable'; reason: string };

/**
 * Render the expansion prompt for a query.
 */
export function buildExpansionPrompt(query: string, count: number): string {
  return EXPANSION_PROMPT.replaceAll('{count}', String(count)).replace('{query}', query);
}

/**
 * Parse a model response into at most `count` distinct phrasings.
 *
 * One phrase per line. Numbering, bullets and wrapping quotes are stripped;
 * header lines ending in `:` are skipped. Phrases equal to the original or
 * to an earlier phrase (case-insensitive) are dropped.
 */
export function parseExpansion(response: string, original: string, count: number): ExpansionParse {
  const seen = new Set([original.trim().toLowerCase()]);
  const phrases: string[] = [];

  for (const rawLine of response.split('\n')) {
    if (phrases.length >= count) break;

    let line = rawLine.trim();
    if (!line || line.endsWith(':')) continue;

    line = line.replace(LINE_PREFIX, '').trim();
    const quoted = WRAPPING_QUOTES.exec(line);
    if (quoted) line = quoted[1].trim();
    if (!line) continue;

    const key = line.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    phrases.push(line);
  }

  if (phrases.length === 0) {
    return { kind: 'unparseable', reason: 'no usable phrases in model response' };
  }
  return { kind: 'parsed', phrases };
}

export interface QueryExpanderOptions {
  generator: TextGenerator;
  model: string;
  /** Timeout of the model call */
  timeoutMs: number;
  /** Weight of each expanded variant, in (0, 1) */
  expandedWeight?: number;
}

export interface ExpandOptions {
  signal?: AbortSignal;
}

export interface ExpansionResult {
  variants: QueryVariant[];
  status: ExpansionStatus;
  /** Why expansion degraded */
  reason?: string;
}

export class QueryExpander {
  private readonly expandedWeight: number;

  constructor(private readonly options: QueryExpanderOptions) {
    this.expandedWeight = options.expandedWeight ?? DEFAULT_EXPANDED_WEIGHT;
    if (!(this.expandedWeight > 0 && this.expandedWeight < 1)) {
      throw new RangeError(`expandedWeight must be in (0, 1), got ${this.expandedWeight}`);
    }
  }

  /**
   * Expand a query into ordered variants, original first.
   */
  async expand(query: string, variantCount: number, options: ExpandOptions = {}): Promise<QueryVariant[]> {
    const result = await this.expandDetailed(query, variantCount, options);
    return result.variants;
  }

  /**
   * Expand a query and report how expansion went.
   *
   * @throws RetrievalError with code CANCELLED when `signal` aborts
   */
  async expandDetailed(
    query: string,
    variantCount: number,
    options: ExpandOptions = {},
  ): Promise<ExpansionResult> {
    const original: QueryVariant = { text: query, weight: 1.0, origin: 'original', index: 0 };

    if (variantCount <= 0) {
      return { variants: [original], status: 'skipped' };
    }

    const { generator, model, timeoutMs } = this.options;
    const outcome = await settle(
      (signal) =>
        generator.generate(buildExpansionPrompt(query, variantCount), {
          model,
          timeoutMs,
          signal,
          temperature: EXPANSION_TEMPERATURE,
          maxTokens: Math.max(50, variantCount * 25),
        }),
      timeoutMs,
      options.signal,
    );

    const degrade = (reason: string): ExpansionResult => {
      log.warn('Query expansion degraded to original query', { reason });
      return { variants: [original], status: 'degraded', reason };
    };

    if (outcome.status === 'cancelled') {
      throw new RetrievalError('Request cancelled during query expansion', 'CANCELLED');
    }
    if (outcome.status === 'timeout') {
      return degrade(`expansion timed out after ${timeoutMs}ms`);
    }
    if (outcome.status === 'rejected') {
      return degrade(outcome.error.message);
    }

    const parsed = parseExpansion(outcome.value, query, variantCount);
    if (parsed.kind === 'unparseable') {
      return degrade(parsed.reason);
    }

    if (parsed.phrases.length < variantCount) {
      log.debug('Expansion returned fewer phrases than requested', {
        requested: variantCount,
        parsed: parsed.phrases.length,
      });
    }

    const expanded = parsed.phrases.map(
      (text, i): QueryVariant => ({
        text,
        weight: this.expandedWeight,
        origin: 'expanded',
        index: i + 1,
      }),
    );

    log.debug('Query expanded', { variants: expanded.length + 1, durationMs: outcome.durationMs });
    return { variants: [original, ...expanded], status: 'ok' };
  }
}
