/**
 * JSON Schema Validation
 *
 * Ajv-based validation for extracted records and for the settings file.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from './errors';
import type { ExtractionSchema, SettingsFile } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Extraction schemas are user-written and may carry extra keywords
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const validators = new WeakMap<object, ValidateFunction>();

let settingsValidator: ValidateFunction<SettingsFile> | null = null;

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isExtractionSchema(value: unknown): value is ExtractionSchema {
  if (!isRecord(value) || value.type !== 'object') {
    return false;
  }
  const { properties, required } = value;
  if (properties !== undefined && !isRecord(properties)) {
    return false;
  }
  if (required !== undefined) {
    return Array.isArray(required) && required.every((key) => typeof key === 'string');
  }
  return true;
}

/**
 * Locate a file shipped in the repository's schemas/ directory.
 * Works from the TypeScript sources and from the compiled dist/ tree.
 */
export function resolveBundledSchemaPath(schemaName: string): string {
  const possiblePaths = [
    // packages/shared/src
    path.join(__dirname, '../../../schemas', schemaName),
    // dist/packages/shared/src
    path.join(__dirname, '../../../../schemas', schemaName),
    path.join(process.cwd(), 'schemas', schemaName),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigurationError(`Bundled schema not found: ${schemaName}`, {
      details: { searched: possiblePaths },
    });
  }
  return found;
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

function getValidator(schema: Record<string, unknown>): ValidateFunction {
  const cached = validators.get(schema);
  if (cached) {
    return cached;
  }
  // The draft is fixed by this Ajv instance; a foreign $schema URI would not resolve
  const { $schema: _ignored, ...body } = schema;
  const validate = ajv.compile(body);
  validators.set(schema, validate);
  return validate;
}

/**
 * Compile a schema up front so a broken schema fails at configuration time
 */
export function compileSchema(schema: Record<string, unknown>, source: string): void {
  try {
    getValidator(schema);
  } catch (error) {
    throw new ConfigurationError(`Schema in ${source} does not compile`, {
      cause: error,
      details: { error: error instanceof Error ? error.message : String(error) },
    });
  }
}

/**
 * Validate data against a schema
 */
export function validateAgainst(schema: Record<string, unknown>, data: unknown): ValidationResult {
  const validate = getValidator(schema);
  const valid = validate(data);

  if (!valid) {
    return { valid: false, errors: formatValidationErrors(validate.errors) };
  }

  return { valid: true };
}

function getSettingsValidator(): ValidateFunction<SettingsFile> {
  if (!settingsValidator) {
    const schemaPath = resolveBundledSchemaPath('settings.schema.json');
    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Settings schema is not a JSON object: ${schemaPath}`);
    }
    settingsValidator = ajv.compile<SettingsFile>(parsed);
  }
  return settingsValidator;
}

/**
 * Validate the parsed contents of a settings file, listing every violation
 */
export function parseSettings(data: unknown, source: string): SettingsFile {
  const validate = getSettingsValidator();
  if (validate(data)) {
    return data;
  }
  const errors = formatValidationErrors(validate.errors);
  throw new ConfigurationError(`Invalid settings in ${source}: ${errors.join('; ')}`, {
    details: { errors },
  });
}
