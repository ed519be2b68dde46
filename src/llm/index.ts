/**
 * Text-generation providers.
 */

import type { RetrievalConfig } from '../config/retrieval-config.js';
import { AnthropicGenerator } from './anthropic-generator.js';
import { OllamaGenerator } from './ollama-generator.js';
import type { TextGenerator } from './text-generator.js';
import { ConfigError } from '../utils/errors.js';

export type { GenerateOptions, TextGenerator } from './text-generator.js';
export { OllamaGenerator } from './ollama-generator.js';
export { AnthropicGenerator, type AnthropicGeneratorOptions } from './anthropic-generator.js';

/**
 * Create the generator for the configured provider.
 *
 * @throws ConfigError for a provider that is not supported
 */
export function createTextGenerator(
  config: Pick<RetrievalConfig, 'llmProvider' | 'ollamaUrl'>,
): TextGenerator {
  switch (config.llmProvider) {
    case 'anthropic':
      return new AnthropicGenerator();
    case 'ollama':
      return new OllamaGenerator(config.ollamaUrl);
    default: {
      const provider: never = config.llmProvider;
      throw new ConfigError(`Unknown LLM provider "${String(provider)}"`, 'CONFIG_INVALID');
    }
  }
}
