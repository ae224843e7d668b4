/**
 * Extraction Provider Types
 *
 * The provider is an injectable capability: the pipeline only ever sees
 * ExtractionProvider.extract(document, schema), so the concrete LLM vendor
 * can be swapped, or replaced by a fake in tests.
 */

import type {
  ExtractionOutcome,
  ExtractionSchema,
  LoadedDocument,
  ProviderName,
} from '../types';
import type { ExtractionTemplate } from '../templates/types';

/**
 * Options shared by every provider implementation
 */
export interface ProviderOptions {
  /** API key for the provider */
  apiKey: string;
  /** Model identifier */
  model: string;
  /** Alternative API endpoint (proxies, compatible gateways) */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Retries performed by the SDK on connection errors, 408/409/429 and 5xx */
  maxRetries: number;
  /** Upper bound on generated tokens */
  maxTokens: number;
  /** Upper bound on document text characters sent in text mode */
  maxExtractionChars: number;
  /** Prompt template (defaults to the invoice template) */
  template?: ExtractionTemplate;
}

/**
 * What a concrete provider hands back before validation
 */
export interface ProviderResponse {
  /** The structured object produced by the model, not yet validated */
  raw: unknown;
  /** Request ID reported by the provider */
  requestId: string;
  /** Total tokens billed, when reported */
  tokensUsed?: number;
}

export interface ExtractionProvider {
  readonly name: ProviderName;
  readonly model: string;

  /**
   * Extract one record from a document.
   *
   * @returns The record, validated against the schema, plus request metadata
   * @throws ExtractionError on network failure, provider rejection,
   *   malformed output or schema mismatch
   */
  extract(document: LoadedDocument, schema: ExtractionSchema): Promise<ExtractionOutcome>;
}

export type ProviderFactory = (options: ProviderOptions) => ExtractionProvider;
