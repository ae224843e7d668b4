/**
 * Core Types for the invoice digester
 */

// ============================================================================
// Providers & Policies
// ============================================================================

export const PROVIDER_NAMES = ['openai', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * What the pipeline does when a single document cannot be extracted:
 * - 'continue': record the failure and move on to the next document
 * - 'abort': stop the run at the failing document
 */
export type FailurePolicy = 'continue' | 'abort';

/**
 * Contents of the JSON settings file (schemas/settings.schema.json)
 */
export interface SettingsFile {
  provider?: ProviderName;
  model?: string;
  inputDir?: string;
  outputDir?: string;
  schemaPath?: string;
  failurePolicy?: FailurePolicy;
  requestTimeoutMs?: number;
  maxRetries?: number;
  maxTokens?: number;
  maxExtractionChars?: number;
  baseUrl?: string;
  debugTextDir?: string;
  metricsPath?: string;
}

// ============================================================================
// Extraction Schema
// ============================================================================

/**
 * JSON Schema describing the record the model must produce.
 * Only the top-level shape is constrained here; Ajv checks the rest.
 */
export type ExtractionSchema = {
  type: 'object';
  title?: string;
  description?: string;
  properties?: Record<string, unknown>;
  required?: string[];
  [keyword: string]: unknown;
};

/**
 * A record extracted from one document, conforming to the ExtractionSchema
 */
export type ExtractionRecord = Record<string, unknown>;

// ============================================================================
// Documents
// ============================================================================

export type DocumentKind = 'pdf' | 'image' | 'text' | 'unsupported';

/**
 * A file found in the input directory
 */
export interface DocumentRef {
  /** File name, unique within the input directory */
  id: string;
  /** Absolute path */
  path: string;
  /** File name without its extension */
  stem: string;
  /** Lower-cased extension including the dot, '' when absent */
  extension: string;
  kind: DocumentKind;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/webp' | 'image/gif';

/**
 * Document content in the form a provider sends it:
 * - 'text': extracted text by page (text PDFs, .txt, .md)
 * - 'image': a raster image, base64
 * - 'file': the raw PDF, base64 (scanned PDFs without a text layer)
 */
export type LoadedDocument =
  | { mode: 'text'; ref: DocumentRef; pages: PageText[] }
  | { mode: 'image'; ref: DocumentRef; mimeType: ImageMimeType; data: string }
  | { mode: 'file'; ref: DocumentRef; mimeType: 'application/pdf'; data: string };

export type ExtractionMode = LoadedDocument['mode'];

// ============================================================================
// Extraction Results
// ============================================================================

export interface ExtractionMetadata {
  provider: ProviderName;
  model: string;
  requestId: string;
  promptVersion: string;
  mode: ExtractionMode;
  durationMs: number;
  tokensUsed?: number;
}

/**
 * A validated record plus how it was obtained
 */
export interface ExtractionOutcome {
  record: ExtractionRecord;
  metadata: ExtractionMetadata;
}

// ============================================================================
// Run Summary
// ============================================================================

export interface DocumentSuccess {
  documentId: string;
  outputPath: string;
  mode: ExtractionMode;
  durationMs: number;
}

export interface DocumentFailure {
  documentId: string;
  category: string;
  reason?: string;
  message: string;
}

export interface DocumentSkip {
  documentId: string;
  reason: string;
}

export interface RunSummary {
  runId: string;
  inputDir: string;
  outputDir: string;
  total: number;
  succeeded: DocumentSuccess[];
  failed: DocumentFailure[];
  skipped: DocumentSkip[];
  durationMs: number;
}
