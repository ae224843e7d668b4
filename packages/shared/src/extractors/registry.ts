/**
 * Provider Registry
 *
 * Maps provider names to factories. The CLI registers the built-in
 * providers once at start-up, then builds the configured one.
 */

import type { Config } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import type { ExtractionTemplate } from '../templates/types';
import type { ProviderName } from '../types';
import type { ExtractionProvider, ProviderFactory, ProviderOptions } from './types';

const providerRegistry = new Map<ProviderName, ProviderFactory>();

/**
 * Register a factory for a provider name.
 * Overwrites any existing factory for that name.
 */
export function registerProvider(name: ProviderName, factory: ProviderFactory): void {
  providerRegistry.set(name, factory);
  logger.debug('Registered provider', { provider: name });
}

export function getRegisteredProviders(): ProviderName[] {
  return Array.from(providerRegistry.keys());
}

/**
 * Clear all registered providers (useful for testing)
 */
export function clearRegistry(): void {
  providerRegistry.clear();
}

/**
 * Provider options derived from the run configuration
 */
export function providerOptionsFrom(config: Config, template?: ExtractionTemplate): ProviderOptions {
  return {
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    maxTokens: config.maxTokens,
    maxExtractionChars: config.maxExtractionChars,
    template,
  };
}

/**
 * Build the provider selected by the configuration
 *
 * @throws ConfigurationError if no factory is registered for config.provider
 */
export function createProvider(config: Config, template?: ExtractionTemplate): ExtractionProvider {
  const factory = providerRegistry.get(config.provider);
  if (!factory) {
    throw new ConfigurationError(
      `No extraction provider registered for "${config.provider}" (registered: ${
        getRegisteredProviders().join(', ') || 'none'
      })`
    );
  }
  return factory(providerOptionsFrom(config, template));
}
