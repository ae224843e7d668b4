/**
 * Anthropic Extraction Provider
 *
 * Messages API with one forced tool whose input_schema is the extraction
 * schema, so the tool call arguments are the record.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ExtractionError } from '../../errors';
import type { ExtractionSchema, LoadedDocument } from '../../types';
import { BaseExtractionProvider } from '../base-extractor';
import type { ProviderOptions, ProviderResponse } from '../types';

export const EXTRACTION_TOOL_NAME = 'record_extraction';

type UserContent = Anthropic.Messages.MessageParam['content'];

export class AnthropicProvider extends BaseExtractionProvider {
  readonly name = 'anthropic';

  private readonly client: Anthropic;

  constructor(options: ProviderOptions) {
    super(options);
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  protected async requestExtraction(
    document: LoadedDocument,
    schema: ExtractionSchema
  ): Promise<ProviderResponse> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.options.maxTokens,
      temperature: 0,
      system: this.template.systemPrompt,
      messages: [{ role: 'user', content: this.buildUserContent(document, schema) }],
      tools: [
        {
          name: EXTRACTION_TOOL_NAME,
          description: `Record the ${schema.title ?? this.template.name} data extracted from the document`,
          input_schema: schema,
        },
      ],
      tool_choice: { type: 'tool', name: EXTRACTION_TOOL_NAME },
    });

    const tokensUsed = response.usage.input_tokens + response.usage.output_tokens;

    if (response.stop_reason === 'max_tokens') {
      throw new ExtractionError('malformed_response', 'Anthropic response truncated at max_tokens', {
        details: { requestId: response.id, maxTokens: this.options.maxTokens },
      });
    }

    for (const block of response.content) {
      if (block.type === 'tool_use' && block.name === EXTRACTION_TOOL_NAME) {
        return { raw: block.input, requestId: response.id, tokensUsed };
      }
    }

    throw new ExtractionError('malformed_response', `Model did not call ${EXTRACTION_TOOL_NAME}`, {
      details: { requestId: response.id, stopReason: response.stop_reason },
    });
  }

  private buildUserContent(document: LoadedDocument, schema: ExtractionSchema): UserContent {
    const prompt = this.buildUserPrompt(document, schema);

    switch (document.mode) {
      case 'text':
        return prompt;

      case 'image':
        return [
          {
            type: 'image',
            source: { type: 'base64', media_type: document.mimeType, data: document.data },
          },
          { type: 'text', text: prompt },
        ];

      case 'file':
        return [
          {
            type: 'document',
            source: { type: 'base64', media_type: document.mimeType, data: document.data },
          },
          { type: 'text', text: prompt },
        ];
    }
  }

  protected toExtractionError(error: unknown): ExtractionError {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof Anthropic.APIConnectionError) {
      return new ExtractionError('network', `Anthropic request failed: ${message}`, { cause: error });
    }
    if (error instanceof Anthropic.RateLimitError) {
      return new ExtractionError('rate_limit', `Anthropic rate limit exceeded: ${message}`, {
        cause: error,
        details: { status: error.status },
      });
    }
    if (error instanceof Anthropic.APIError) {
      return new ExtractionError('provider_rejected', `Anthropic rejected the request: ${message}`, {
        cause: error,
        details: { status: error.status },
      });
    }
    return new ExtractionError('provider_rejected', `Anthropic extraction failed: ${message}`, {
      cause: error,
    });
  }
}
