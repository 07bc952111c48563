/**
 * Error hierarchy for the payroll extractor.
 *
 * Only hard failures live here. A page without employee data or a field that
 * does not match is a normal outcome and never raises.
 */

import type { ErrorEnvelope } from './types';

export type ErrorCode =
  | 'DOCUMENT_UNREADABLE'
  | 'MAPPING_NOT_FOUND'
  | 'INVALID_MAPPING'
  | 'USAGE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base error class for all extractor errors
 */
export class PayrollExtractorError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The input could not be opened or decoded as a PDF.
 */
export class DocumentUnreadableError extends PayrollExtractorError {
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Document could not be read as a PDF: ${filePath} (${reason})`, 'DOCUMENT_UNREADABLE', {
      filePath,
      reason,
    }, cause);
    this.filePath = filePath;
  }
}

export type StoredResourceKind = 'mapping' | 'template';

/**
 * A field mapping or output template requested by name does not exist.
 */
export class MappingNotFoundError extends PayrollExtractorError {
  public readonly kind: StoredResourceKind;
  public readonly resourceName: string;

  constructor(kind: StoredResourceKind, resourceName: string, location: string) {
    super(`No ${kind} named '${resourceName}' in ${location}`, 'MAPPING_NOT_FOUND', {
      kind,
      name: resourceName,
      location,
    });
    this.kind = kind;
    this.resourceName = resourceName;
  }
}

/**
 * A stored mapping or template exists but is not valid JSON or fails its schema.
 */
export class InvalidMappingError extends PayrollExtractorError {
  public readonly errors: string[];

  constructor(kind: StoredResourceKind, resourceName: string, errors: string[]) {
    super(`Invalid ${kind} '${resourceName}': ${errors.join('; ')}`, 'INVALID_MAPPING', {
      kind,
      name: resourceName,
      errors,
    });
    this.errors = errors;
  }
}

/**
 * The command line was malformed: a missing file argument or an unknown option.
 */
export class UsageError extends PayrollExtractorError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
  }
}

export function isPayrollExtractorError(error: unknown): error is PayrollExtractorError {
  return error instanceof PayrollExtractorError;
}

/**
 * Render any thrown value as the JSON error envelope callers print or return.
 */
export function toErrorEnvelope(error: unknown, correlationId: string): ErrorEnvelope {
  if (isPayrollExtractorError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        correlation_id: correlationId,
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : 'Unknown error',
      correlation_id: correlationId,
    },
  };
}
