/**
 * Text generation through the Anthropic Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions, TextGenerator } from './text-generator.js';
import { createDeadline } from '../utils/async.js';
import { LlmError } from '../utils/errors.js';

/** Completion cap when the caller does not set one. */
const DEFAULT_MAX_TOKENS = 256;

export interface AnthropicGeneratorOptions {
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
}

export class AnthropicGenerator implements TextGenerator {
  readonly provider = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly options: AnthropicGeneratorOptions = {}) {}

  /**
   * Initialize the Anthropic client.
   */
  private getClient(): Anthropic {
    if (this.client) return this.client;

    const apiKey = this.options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new LlmError(
        'No Anthropic API key found. Set ANTHROPIC_API_KEY or pass apiKey.',
        'LLM_UNAVAILABLE',
      );
    }

    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const client = this.getClient();
    const deadline = createDeadline(options.timeoutMs, options.signal);

    try {
      const response = await client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: deadline.signal, timeout: options.timeoutMs },
      );

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') text += block.text;
      }
      return text;
    } catch (error) {
      if (deadline.timedOut()) {
        throw new LlmError(`Generation timed out after ${options.timeoutMs}ms`, 'LLM_TIMEOUT', error);
      }
      if (options.signal?.aborted) {
        throw new LlmError('Generation aborted', 'LLM_TIMEOUT', error);
      }
      throw new LlmError('Anthropic request failed', 'LLM_UNAVAILABLE', error);
    } finally {
      deadline.dispose();
    }
  }
}
