/**
 * Base Extraction Provider
 *
 * Template method around a single provider request: prompt building, timing,
 * metrics, error mapping and validation of the returned record against the
 * extraction schema. Subclasses only speak their vendor's API.
 */

import { ExtractionError } from '../errors';
import { logger, serializeError } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import { isRecord, validateAgainst } from '../schemas';
import { INVOICE_TEMPLATE, renderPrompt } from '../templates';
import type { ExtractionTemplate } from '../templates/types';
import type {
  ExtractionOutcome,
  ExtractionSchema,
  LoadedDocument,
  ProviderName,
} from '../types';
import { formatPageTextWithLimit, pruneNulls } from './llm-extraction';
import type { ExtractionProvider, ProviderOptions, ProviderResponse } from './types';

export const PROMPT_VERSION = '1.0.0';

export abstract class BaseExtractionProvider implements ExtractionProvider {
  abstract readonly name: ProviderName;

  protected readonly template: ExtractionTemplate;

  constructor(protected readonly options: ProviderOptions) {
    this.template = options.template ?? INVOICE_TEMPLATE;
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * Send one document to the provider and return its raw structured output.
   * Errors thrown here are passed through toExtractionError.
   */
  protected abstract requestExtraction(
    document: LoadedDocument,
    schema: ExtractionSchema
  ): Promise<ProviderResponse>;

  /**
   * Map a vendor SDK error to an ExtractionError
   */
  protected abstract toExtractionError(error: unknown): ExtractionError;

  async extract(document: LoadedDocument, schema: ExtractionSchema): Promise<ExtractionOutcome> {
    const labels = { provider: this.name, model: this.model };
    const startTime = Date.now();

    logger.info('Requesting extraction', {
      ...labels,
      document_id: document.ref.id,
      mode: document.mode,
    });

    let response: ProviderResponse;
    try {
      response = await this.requestExtraction(document, schema);
    } catch (error) {
      const failure = error instanceof ExtractionError ? error : this.toExtractionError(error);
      llmRequestDurationHistogram.observe(labels, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ ...labels, status: 'error' });

      logger.debug('Provider extraction failed', {
        ...labels,
        document_id: document.ref.id,
        reason: failure.reason,
        error: serializeError(failure),
      });
      throw failure;
    }

    const durationMs = Date.now() - startTime;
    llmRequestDurationHistogram.observe(labels, durationMs / 1000);
    llmRequestsCounter.inc({ ...labels, status: 'success' });

    logger.info('Provider extraction complete', {
      ...labels,
      request_id: response.requestId,
      duration_ms: durationMs,
      tokens_used: response.tokensUsed,
    });

    const record = pruneNulls(response.raw);
    if (!isRecord(record)) {
      throw new ExtractionError('malformed_response', 'Provider returned a non-object record', {
        details: { requestId: response.requestId },
      });
    }

    const validation = validateAgainst(schema, record);
    if (!validation.valid) {
      throw new ExtractionError(
        'schema_mismatch',
        `Extracted record does not match the schema: ${(validation.errors ?? []).join('; ')}`,
        { details: { errors: validation.errors, requestId: response.requestId } }
      );
    }

    return {
      record,
      metadata: {
        provider: this.name,
        model: this.model,
        requestId: response.requestId,
        promptVersion: PROMPT_VERSION,
        mode: document.mode,
        durationMs,
        tokensUsed: response.tokensUsed,
      },
    };
  }

  /**
   * User prompt for a document, with page text inlined in text mode
   */
  protected buildUserPrompt(document: LoadedDocument, schema: ExtractionSchema): string {
    const values = {
      sourceFilename: document.ref.id,
      schemaTitle: schema.title ?? this.template.name,
    };

    if (document.mode === 'text') {
      return renderPrompt(this.template.textPromptTemplate, {
        ...values,
        pageText: formatPageTextWithLimit(document.pages, this.options.maxExtractionChars),
      });
    }
    return renderPrompt(this.template.visualPromptTemplate, values);
  }
}
