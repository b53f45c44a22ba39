/**
 * @coltype/core - Type-safe JSON parsing
 *
 * Schema-checked JSON parsing for configuration files. Schemas are accepted
 * structurally (anything with zod's safeParse/parse shape), so this package
 * does not depend on zod at run time; @coltype/config supplies zod schemas.
 *
 * @module validation
 */

import { ErrorCode, ValidationError, captureStackTrace } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result type for safe JSON parsing operations
 */
export type SafeParseJSONResult<T> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: ZodErrorLike };

/**
 * ZodError-like shape for parse and validation failures
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * Interface for a Zod-compatible schema
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
  parse(data: unknown): T;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown when a JSON document cannot be parsed at all.
 *
 * @example
 * ```typescript
 * try {
 *   parseConfigJSON(text);
 * } catch (e) {
 *   if (e instanceof JSONParseError) {
 *     logger.error('Config is not JSON', e);
 *   }
 * }
 * ```
 */
export class JSONParseError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      ErrorCode.JSON_PARSE_ERROR,
      { cause: cause instanceof Error ? cause.message : String(cause) },
      'Ensure the JSON string is valid.'
    );
    this.name = 'JSONParseError';
    this.cause = cause;
    captureStackTrace(this, JSONParseError);
  }
}

/**
 * Error thrown when parsed JSON does not match its schema.
 */
export class JSONValidationError extends ValidationError {
  public readonly zodError: ZodErrorLike;

  constructor(message: string, zodError: ZodErrorLike) {
    super(
      message,
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      { issues: zodError.issues.map(i => ({ path: i.path, message: i.message })) },
      'Ensure the JSON data matches the expected schema.'
    );
    this.name = 'JSONValidationError';
    this.zodError = zodError;
    captureStackTrace(this, JSONValidationError);
  }
}

function describeIssues(error: ZodErrorLike): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a JSON string and validate it against a schema.
 *
 * @throws {JSONParseError} If JSON parsing fails
 * @throws {JSONValidationError} If schema validation fails
 */
export function parseJSON<T>(json: string, schema: ZodSchemaLike<T>): T {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    throw new JSONParseError(
      `Failed to parse JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
  }

  return validate(parsed, schema);
}

/**
 * Like parseJSON, but reports failure in the result instead of throwing.
 */
export function safeParseJSON<T>(json: string, schema: ZodSchemaLike<T>): SafeParseJSONResult<T> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch {
    return {
      success: false,
      error: {
        issues: [{ code: 'custom', path: [], message: 'Invalid JSON syntax' }],
        message: 'Invalid JSON syntax',
      },
    };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: result.data };
}

/**
 * Validate an already-parsed value against a schema.
 *
 * @throws {JSONValidationError} If validation fails
 */
export function validate<T>(value: unknown, schema: ZodSchemaLike<T>): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new JSONValidationError(`Validation failed: ${describeIssues(result.error)}`, result.error);
  }

  return result.data;
}
