/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  runForDocument,
  type RunContext,
} from './context';

// Logger
export { logger, formatLog, serializeError, type LogContext, type LogLevel } from './logger';

// Errors
export {
  DigestError,
  ConfigurationError,
  IOError,
  ExtractionError,
  systemErrorCode,
  type ErrorCategory,
  type ExtractionFailureReason,
  type DigestErrorOptions,
} from './errors';

// Config
export {
  loadConfig,
  loadExtractionSchema,
  DEFAULT_MODELS,
  DEFAULT_SETTINGS_FILE,
  API_KEY_ENV,
  type Config,
  type LoadConfigOptions,
} from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  documentsProcessedCounter,
  extractionDurationHistogram,
  getMetrics,
  resetMetrics,
} from './metrics';

// Schemas
export {
  validateAgainst,
  parseSettings,
  compileSchema,
  isExtractionSchema,
  isRecord,
  formatValidationErrors,
  resolveBundledSchemaPath,
  type ValidationResult,
} from './schemas';

// Templates
export { INVOICE_TEMPLATE, renderPrompt, type ExtractionTemplate, type PromptValues } from './templates';

// Extraction providers
export {
  type ExtractionProvider,
  type ProviderFactory,
  type ProviderOptions,
  type ProviderResponse,
  BaseExtractionProvider,
  PROMPT_VERSION,
  OpenAiProvider,
  AnthropicProvider,
  EXTRACTION_TOOL_NAME,
  registerProvider,
  registerAllProviders,
  getRegisteredProviders,
  clearRegistry,
  providerOptionsFrom,
  createProvider,
  formatPageText,
  formatPageTextWithLimit,
  pruneNulls,
  parseJsonContent,
  schemaNameFor,
  toDataUrl,
} from './extractors';
