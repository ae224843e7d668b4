/**
 * Extraction Templates
 */

export type { ExtractionTemplate } from './types';

export { INVOICE_TEMPLATE } from './invoice.template';

export interface PromptValues {
  sourceFilename: string;
  schemaTitle: string;
  pageText?: string;
}

/**
 * Fill a template's placeholders. Values are inserted verbatim.
 */
export function renderPrompt(promptTemplate: string, values: PromptValues): string {
  return promptTemplate
    .replace(/\{\{source_filename\}\}/g, () => values.sourceFilename)
    .replace(/\{\{schema_title\}\}/g, () => values.schemaTitle)
    .replace(/\{\{page_text\}\}/g, () => values.pageText ?? '');
}

