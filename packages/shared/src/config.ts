/**
 * Centralized Configuration
 *
 * Resolved once at start-up from three layers, later ones winning:
 * built-in defaults, the JSON settings file, environment variables.
 * Credentials only ever come from the environment.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationError, systemErrorCode } from './errors';
import { compileSchema, isExtractionSchema, parseSettings, resolveBundledSchemaPath } from './schemas';
import {
  PROVIDER_NAMES,
  type ExtractionSchema,
  type FailurePolicy,
  type ProviderName,
  type SettingsFile,
} from './types';

export interface Config {
  // Provider
  provider: ProviderName;
  model: string;
  apiKey: string;
  baseUrl?: string;

  // Filesystem
  inputDir: string;
  outputDir: string;
  debugTextDir?: string;
  metricsPath?: string;

  // Extraction schema
  schemaPath: string;
  schema: ExtractionSchema;

  // Run behavior
  failurePolicy: FailurePolicy;

  // LLM
  requestTimeoutMs: number;
  maxRetries: number;
  maxTokens: number;
  maxExtractionChars: number;
}

export const DEFAULT_SETTINGS_FILE = 'digest.config.json';

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
};

export const API_KEY_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const BASE_URL_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_BASE_URL',
  anthropic: 'ANTHROPIC_BASE_URL',
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

function isFailurePolicy(value: string): value is FailurePolicy {
  return value === 'continue' || value === 'abort';
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function readJsonFile(filePath: string, what: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${what} ${filePath} (${systemErrorCode(error) ?? 'unknown error'})`, {
      cause: error,
    });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${what} ${filePath} is not valid JSON`, { cause: error });
  }
}

function loadSettingsFile(env: NodeJS.ProcessEnv, cwd: string): SettingsFile {
  const explicit = nonEmpty(env.INVOICE_DIGEST_SETTINGS);
  if (explicit) {
    const settingsPath = path.resolve(cwd, explicit);
    if (!fs.existsSync(settingsPath)) {
      throw new ConfigurationError(`Settings file not found: ${settingsPath}`);
    }
    return parseSettings(readJsonFile(settingsPath, 'settings file'), settingsPath);
  }

  const defaultPath = path.join(cwd, DEFAULT_SETTINGS_FILE);
  if (fs.existsSync(defaultPath)) {
    return parseSettings(readJsonFile(defaultPath, 'settings file'), defaultPath);
  }
  return {};
}

/**
 * Read and check an extraction schema file
 */
export function loadExtractionSchema(schemaPath: string): ExtractionSchema {
  const parsed = readJsonFile(schemaPath, 'extraction schema');
  if (!isExtractionSchema(parsed)) {
    throw new ConfigurationError(
      `Extraction schema ${schemaPath} must be a JSON Schema object with "type": "object"`
    );
  }
  compileSchema(parsed, schemaPath);
  return parsed;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Resolve the run configuration. Throws ConfigurationError on any invalid
 * value and when the selected provider's API key is absent.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<Config> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const settings = loadSettingsFile(env, cwd);

  const providerRaw = nonEmpty(env.INVOICE_DIGEST_PROVIDER) ?? settings.provider ?? 'openai';
  if (!isProviderName(providerRaw)) {
    throw new ConfigurationError(
      `Unknown provider "${providerRaw}" (expected one of: ${PROVIDER_NAMES.join(', ')})`
    );
  }
  const provider = providerRaw;

  const failurePolicyRaw =
    nonEmpty(env.INVOICE_DIGEST_FAILURE_POLICY) ?? settings.failurePolicy ?? 'continue';
  if (!isFailurePolicy(failurePolicyRaw)) {
    throw new ConfigurationError(
      `Unknown failure policy "${failurePolicyRaw}" (expected continue or abort)`
    );
  }

  const apiKey = nonEmpty(env[API_KEY_ENV[provider]]);
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing credentials: set ${API_KEY_ENV[provider]} for provider "${provider}"`
    );
  }

  const resolvePath = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(cwd, value);

  const schemaSetting = nonEmpty(env.INVOICE_DIGEST_SCHEMA) ?? settings.schemaPath;
  const schemaPath = schemaSetting
    ? path.resolve(cwd, schemaSetting)
    : resolveBundledSchemaPath('invoice.schema.json');

  const config: Config = {
    provider,
    model: nonEmpty(env.INVOICE_DIGEST_MODEL) ?? settings.model ?? DEFAULT_MODELS[provider],
    apiKey,
    baseUrl: nonEmpty(env[BASE_URL_ENV[provider]]) ?? settings.baseUrl,

    inputDir: path.resolve(cwd, nonEmpty(env.INVOICE_DIGEST_INPUT_DIR) ?? settings.inputDir ?? 'invoices'),
    outputDir: path.resolve(cwd, nonEmpty(env.INVOICE_DIGEST_OUTPUT_DIR) ?? settings.outputDir ?? 'output'),
    debugTextDir: resolvePath(nonEmpty(env.DEBUG_TEXT_DIR) ?? settings.debugTextDir),
    metricsPath: resolvePath(nonEmpty(env.METRICS_PATH) ?? settings.metricsPath),

    schemaPath,
    schema: loadExtractionSchema(schemaPath),

    failurePolicy: failurePolicyRaw,

    requestTimeoutMs: parseInteger(
      'LLM_REQUEST_TIMEOUT_MS',
      env.LLM_REQUEST_TIMEOUT_MS,
      settings.requestTimeoutMs ?? 60000,
      1
    ),
    maxRetries: parseInteger('LLM_MAX_RETRIES', env.LLM_MAX_RETRIES, settings.maxRetries ?? 2, 0),
    maxTokens: parseInteger('LLM_MAX_TOKENS', env.LLM_MAX_TOKENS, settings.maxTokens ?? 4096, 1),
    maxExtractionChars: parseInteger(
      'MAX_EXTRACTION_CHARS',
      env.MAX_EXTRACTION_CHARS,
      settings.maxExtractionChars ?? 35000,
      1000
    ),
  };

  return deepFreeze(config);
}
