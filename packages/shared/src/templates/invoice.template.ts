/**
 * Invoice Extraction Template
 *
 * Document semantics:
 * - One invoice per document; multi-page documents are a single invoice
 * - Amounts are numbers without currency symbols or thousands separators
 * - Fields absent from the document are omitted, never invented
 */

import type { ExtractionTemplate } from './types';

export const INVOICE_TEMPLATE: ExtractionTemplate = {
  name: 'invoice',

  systemPrompt: `# Instructions
You are an expert in extracting information from documents.
Your task is to extract the information specified in the schema from the provided invoice document.
Return only the requested information in JSON format, without any additional text or explanation.

EXTRACTION RULES:
1. Use only information printed on the document. Do not guess values that are not there.
2. Omit a field entirely when the document does not contain it.
3. Write amounts and quantities as plain numbers (1234.5, not "$1,234.50").
4. Keep identifiers (invoice numbers, reference numbers, item codes) exactly as printed.
5. Follow each field description in the schema, including any date format it asks for.`,

  textPromptTemplate: `Extract the {{schema_title}} data from this document.

DOCUMENT METADATA:
- source_filename: {{source_filename}}

DOCUMENT TEXT BY PAGE:
{{page_text}}`,

  visualPromptTemplate: `Extract the {{schema_title}} data from the attached document.

DOCUMENT METADATA:
- source_filename: {{source_filename}}

Read every page of the attachment before answering.`,
};
