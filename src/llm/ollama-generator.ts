/**
 * Text generation through a local Ollama server.
 */

import type { GenerateOptions, TextGenerator } from './text-generator.js';
import { getJson, isRecord, postJson } from './ollama-http.js';
import { createDeadline } from '../utils/async.js';
import { LlmError, errorMessage, isLlmError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ollama');

export class OllamaGenerator implements TextGenerator {
  readonly provider = 'ollama';

  constructor(private readonly baseUrl: string) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const deadline = createDeadline(options.timeoutMs, options.signal);
    const ollamaOptions: Record<string, number> = {};
    if (options.temperature !== undefined) ollamaOptions.temperature = options.temperature;
    if (options.maxTokens !== undefined) ollamaOptions.num_predict = options.maxTokens;

    try {
      const body = await postJson(
        this.baseUrl,
        '/api/generate',
        { model: options.model, prompt, stream: false, options: ollamaOptions },
        deadline.signal,
      );

      if (!isRecord(body) || typeof body.response !== 'string') {
        throw new LlmError('Ollama /api/generate returned no response text', 'LLM_BAD_RESPONSE');
      }
      return body.response;
    } catch (error) {
      if (deadline.timedOut()) {
        throw new LlmError(`Generation timed out after ${options.timeoutMs}ms`, 'LLM_TIMEOUT', error);
      }
      throw isLlmError(error) ? error : new LlmError('Generation failed', 'LLM_UNAVAILABLE', error);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Names of the models the server has pulled.
   */
  async listModels(signal?: AbortSignal): Promise<string[]> {
    const body = await getJson(this.baseUrl, '/api/tags', signal);
    if (!isRecord(body) || !Array.isArray(body.models)) {
      throw new LlmError('Ollama /api/tags returned no model list', 'LLM_BAD_RESPONSE');
    }
    const names: string[] = [];
    for (const entry of body.models) {
      if (isRecord(entry) && typeof entry.name === 'string') names.push(entry.name);
    }
    return names;
  }

  /**
   * Check whether `model` is available, comparing names without their tag.
   *
   * Returns false when the server is unreachable.
   */
  async checkModel(model: string, signal?: AbortSignal): Promise<boolean> {
    const baseName = (name: string): string => name.split(':')[0];
    try {
      const names = await this.listModels(signal);
      return names.some((name) => baseName(name) === baseName(model));
    } catch (error) {
      log.warn(`Model check failed for ${model}`, { error: errorMessage(error) });
      return false;
    }
  }
}
