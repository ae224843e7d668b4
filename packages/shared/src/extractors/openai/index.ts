/**
 * OpenAI Extraction Provider
 *
 * Chat Completions with a json_schema response format built from the
 * extraction schema. Text documents go inline in the prompt; images go as an
 * image_url part and scanned PDFs as a file part.
 */

import OpenAI from 'openai';
import { ExtractionError } from '../../errors';
import type { ExtractionSchema, LoadedDocument } from '../../types';
import { BaseExtractionProvider } from '../base-extractor';
import { parseJsonContent, schemaNameFor, toDataUrl } from '../llm-extraction';
import type { ProviderOptions, ProviderResponse } from '../types';

type UserContent = string | OpenAI.Chat.Completions.ChatCompletionContentPart[];

export class OpenAiProvider extends BaseExtractionProvider {
  readonly name = 'openai';

  private readonly client: OpenAI;

  constructor(options: ProviderOptions) {
    super(options);
    this.client = new OpenAI({
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
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: this.template.systemPrompt },
        { role: 'user', content: this.buildUserContent(document, schema) },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schemaNameFor(schema, this.template.name),
          description: schema.description,
          schema,
          // Strict mode needs every property required; invoice fields are optional
          strict: false,
        },
      },
      max_tokens: this.options.maxTokens,
      temperature: 0,
    });

    const requestId = response.id || `req_${Date.now()}`;
    const choice = response.choices[0];

    if (!choice) {
      throw new ExtractionError('malformed_response', 'Empty response from OpenAI', {
        details: { requestId },
      });
    }

    if (choice.message.refusal) {
      throw new ExtractionError('provider_rejected', `Model refused: ${choice.message.refusal}`, {
        details: { requestId },
      });
    }

    if (choice.finish_reason === 'length') {
      throw new ExtractionError('malformed_response', 'OpenAI response truncated at max_tokens', {
        details: { requestId, maxTokens: this.options.maxTokens },
      });
    }

    const content = choice.message.content;
    if (!content) {
      throw new ExtractionError('malformed_response', 'Empty response from OpenAI', {
        details: { requestId },
      });
    }

    return {
      raw: parseJsonContent(content),
      requestId,
      tokensUsed: response.usage?.total_tokens,
    };
  }

  private buildUserContent(document: LoadedDocument, schema: ExtractionSchema): UserContent {
    const prompt = this.buildUserPrompt(document, schema);

    switch (document.mode) {
      case 'text':
        return prompt;

      case 'image':
        return [
          { type: 'text', text: prompt },
          {
            type: 'image_url',
            image_url: { url: toDataUrl(document.mimeType, document.data), detail: 'high' },
          },
        ];

      case 'file':
        return [
          {
            type: 'file',
            file: {
              filename: document.ref.id,
              file_data: toDataUrl(document.mimeType, document.data),
            },
          },
          { type: 'text', text: prompt },
        ];
    }
  }

  protected toExtractionError(error: unknown): ExtractionError {
    const message = error instanceof Error ? error.message : String(error);

    // APIConnectionError (and its timeout subclass) extends APIError; check it first
    if (error instanceof OpenAI.APIConnectionError) {
      return new ExtractionError('network', `OpenAI request failed: ${message}`, { cause: error });
    }
    if (error instanceof OpenAI.RateLimitError) {
      return new ExtractionError('rate_limit', `OpenAI rate limit exceeded: ${message}`, {
        cause: error,
        details: { status: error.status },
      });
    }
    if (error instanceof OpenAI.APIError) {
      return new ExtractionError('provider_rejected', `OpenAI rejected the request: ${message}`, {
        cause: error,
        details: { status: error.status },
      });
    }
    return new ExtractionError('provider_rejected', `OpenAI extraction failed: ${message}`, {
      cause: error,
    });
  }
}
