/**
 * Context handed to an external answering step.
 *
 * Numbers the retrieved sources, skips excluded folders, and stops at a
 * token budget. Prompt wording around the context belongs to the answering
 * step.
 */

import type { RankedResult } from './types.js';
import { approximateTokens, CHARS_PER_TOKEN } from '../utils/token-counter.js';

export const DEFAULT_CONTEXT_TOKENS = 4000;

/** Characters of a source excerpt kept in the source list. */
const SOURCE_EXCERPT_CHARS = 100;

export interface AnswerSource {
  /** 1-based, matches `[Source n: …]` in the text */
  index: number;
  docRef: string;
  filePath: string;
  title: string;
  date: string | null;
  /** Short excerpt for citation lists */
  excerpt: string;
}

export interface AnswerContext {
  text: string;
  sources: AnswerSource[];
  tokenCount: number;
  /** True when a source was dropped for the budget */
  truncated: boolean;
}

export interface AssembleOptions {
  /** Token budget of `text` (default: 4000) */
  maxTokens?: number;
  /** Results whose file path contains any of these are skipped */
  excludedFolders?: readonly string[];
}

/**
 * Format one source block.
 */
export function formatSource(index: number, title: string, date: string | null, body: string): string {
  return `[Source ${index}: ${title} (${date || 'undated'})]\n${body}`;
}

/**
 * Assemble the answer context from final results, best first.
 *
 * A source that does not fit the remaining budget ends the context; the
 * first source is always included, cut to the budget if needed.
 */
export function assembleAnswerContext(
  results: readonly RankedResult[],
  options: AssembleOptions = {},
): AnswerContext {
  const maxTokens = options.maxTokens ?? DEFAULT_CONTEXT_TOKENS;
  const excluded = options.excludedFolders ?? [];

  const parts: string[] = [];
  const sources: AnswerSource[] = [];
  let tokenCount = 0;
  let truncated = false;

  for (const result of results) {
    const filePath = result.metadata?.filePath ?? result.docRef;
    if (excluded.some((folder) => folder && filePath.includes(folder))) continue;

    const index = sources.length + 1;
    const title = result.metadata?.title || filePath;
    const date = result.metadata?.date ?? null;
    const body = result.snippet ?? result.content ?? '';

    let block = formatSource(index, title, date, body);
    let blockTokens = approximateTokens(block);

    if (tokenCount + blockTokens > maxTokens) {
      if (sources.length > 0) {
        truncated = true;
        break;
      }
      // First source alone exceeds the budget
      block = block.slice(0, Math.floor(maxTokens * CHARS_PER_TOKEN));
      blockTokens = approximateTokens(block);
      truncated = true;
    }

    parts.push(block);
    tokenCount += blockTokens;
    sources.push({
      index,
      docRef: result.docRef,
      filePath,
      title,
      date,
      excerpt: body.slice(0, SOURCE_EXCERPT_CHARS) + '...',
    });

    if (truncated) break;
  }

  return { text: parts.join('\n\n'), sources, tokenCount, truncated };
}
