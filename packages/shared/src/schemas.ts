/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for parse results, field mappings and output
 * templates. Schemas live in docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { FieldMapping, OutputTemplate, PayrollParseResult } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});

// Relative to shared package sources or dist, then to the project root
const SCHEMA_DIRS = [
  path.join(__dirname, '../../../docs/contracts'),
  path.join(process.cwd(), 'docs/contracts'),
];

/**
 * Read a schema from the first directory that has it. Null when none does.
 */
export function loadSchema(schemaName: string, searchDirs: string[] = SCHEMA_DIRS): SchemaObject | null {
  for (const directory of searchDirs) {
    const schemaPath = path.join(directory, schemaName);
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  logger.warn(`Schema file not found: ${schemaName}, rejecting all values`, { searched: searchDirs });
  return null;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

export type Validator<T> = (data: unknown) => ValidationResult<T>;

/**
 * Build a validator that compiles its schema on first use. Without a schema
 * every value is rejected.
 */
export function createValidator<T>(
  schemaName: string,
  searchDirs: string[] = SCHEMA_DIRS
): Validator<T> {
  // undefined: not loaded yet, null: schema missing
  let validate: ValidateFunction<T> | null | undefined;

  return (data) => {
    if (validate === undefined) {
      const schema = loadSchema(schemaName, searchDirs);
      validate = schema ? ajv.compile<T>(schema) : null;
    }

    if (!validate) {
      return { valid: false, errors: [`/: schema ${schemaName} not found`] };
    }

    if (validate(data)) {
      return { valid: true, value: data };
    }

    const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.debug(`${schemaName} validation failed`, { errors });
    return { valid: false, errors };
  };
}

const parseResultValidator = createValidator<PayrollParseResult>('payroll_parse_result.schema.json');
const fieldMappingValidator = createValidator<FieldMapping>('field_mapping.schema.json');
const outputTemplateValidator = createValidator<OutputTemplate>('output_template.schema.json');

/**
 * Validate a parse result against payroll_parse_result.schema.json
 */
export function validateParseResult(data: unknown): ValidationResult<PayrollParseResult> {
  return parseResultValidator(data);
}

/**
 * Validate a field mapping against field_mapping.schema.json
 */
export function validateFieldMapping(data: unknown): ValidationResult<FieldMapping> {
  return fieldMappingValidator(data);
}

/**
 * Validate an output template against output_template.schema.json
 */
export function validateOutputTemplate(data: unknown): ValidationResult<OutputTemplate> {
  return outputTemplateValidator(data);
}
