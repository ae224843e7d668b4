/**
 * Extraction Providers
 */

import { registerProvider } from './registry';
import { OpenAiProvider } from './openai';
import { AnthropicProvider } from './anthropic';

export type {
  ExtractionProvider,
  ProviderFactory,
  ProviderOptions,
  ProviderResponse,
} from './types';

export { BaseExtractionProvider, PROMPT_VERSION } from './base-extractor';

export {
  registerProvider,
  getRegisteredProviders,
  clearRegistry,
  providerOptionsFrom,
  createProvider,
} from './registry';

export {
  formatPageText,
  formatPageTextWithLimit,
  pruneNulls,
  parseJsonContent,
  schemaNameFor,
  toDataUrl,
} from './llm-extraction';

export { OpenAiProvider, AnthropicProvider };
export { EXTRACTION_TOOL_NAME } from './anthropic';

/**
 * Register the built-in providers
 */
export function registerAllProviders(): void {
  registerProvider('openai', (options) => new OpenAiProvider(options));
  registerProvider('anthropic', (options) => new AnthropicProvider(options));
}
