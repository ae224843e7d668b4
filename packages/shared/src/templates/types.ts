/**
 * Extraction Template Types
 */

/**
 * Prompts used to ask a provider for a schema-conforming record.
 */
export interface ExtractionTemplate {
  /** Short identifier, also sent as the structured-output schema name fallback */
  name: string;

  /** System prompt shared by every document mode */
  systemPrompt: string;

  /**
   * User prompt for documents sent as text. Placeholders:
   * - {{source_filename}}: The original filename
   * - {{schema_title}}: The extraction schema's title
   * - {{page_text}}: The extracted text content
   */
  textPromptTemplate: string;

  /**
   * User prompt for documents sent as an attached image or PDF file.
   * Same placeholders as textPromptTemplate, except {{page_text}}.
   */
  visualPromptTemplate: string;
}
