/**
 * Shared LLM Extraction Helpers
 *
 * Prompt text formatting and raw-output cleanup used by every provider.
 */

import { ExtractionError } from '../errors';
import type { ExtractionSchema, PageText } from '../types';

/**
 * Format page text for extraction
 */
export function formatPageText(pages: PageText[]): string {
  return pages.map((p) => `--- Page ${p.pageNumber} ---\n${p.text}`).join('\n\n');
}

/**
 * Format page text for extraction, truncating long documents.
 * The first page is always included, cut short if it alone exceeds the limit.
 */
export function formatPageTextWithLimit(pages: PageText[], maxChars: number): string {
  let result = '';
  let includedPages = 0;

  for (const page of pages) {
    const pageText = `--- Page ${page.pageNumber} ---\n${page.text}\n\n`;

    if (result.length + pageText.length <= maxChars) {
      result += pageText;
      includedPages++;
      continue;
    }

    if (includedPages === 0) {
      const kept = page.text.slice(0, Math.max(0, maxChars - 100));
      result += `--- Page ${page.pageNumber} ---\n${kept}\n[...truncated]\n\n`;
      includedPages++;
    }

    const remaining = pages.length - includedPages;
    if (remaining > 0) {
      result += `[Document truncated - ${remaining} additional pages not shown]\n`;
    }
    break;
  }

  return result.trimEnd();
}

/**
 * Drop null members from model output. Models often emit null for fields
 * the document lacks, which a plain "type": "string" schema rejects.
 */
export function pruneNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map((item) => pruneNulls(item));
  }
  if (typeof value === 'object' && value !== null) {
    const pruned: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      if (member !== null) {
        pruned[key] = pruneNulls(member);
      }
    }
    return pruned;
  }
  return value;
}

/**
 * Parse the JSON text of a model response. Tolerates a Markdown code fence,
 * which some OpenAI-compatible gateways add.
 */
export function parseJsonContent(content: string): unknown {
  const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/.exec(content);
  const body = fenced ? fenced[1] : content;
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ExtractionError('malformed_response', 'Provider response is not valid JSON', {
      cause: error,
      details: { preview: content.slice(0, 200) },
    });
  }
}

/**
 * Name for the structured-output schema: the schema title, restricted to
 * the characters providers accept
 */
export function schemaNameFor(schema: ExtractionSchema, fallback: string): string {
  const name = (schema.title ?? fallback).replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
  return name || fallback;
}

export function toDataUrl(mimeType: string, base64: string): string {
  return `data:${mimeType};base64,${base64}`;
}
