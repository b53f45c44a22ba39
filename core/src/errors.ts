/**
 * Typed exception classes for coltype
 *
 * Error hierarchy:
 * - ColTypeError: Base error class for all coltype errors
 *   - UnsupportedTypeError: No decider is registered for a scalar's kind
 *   - MixedTypingError: Strings and hard-typed values mixed on one guesser
 *   - IncompatibleTypesError: Two types cannot be combined and String fallback was refused
 *   - ParseFailureError: parse() was given text the current type cannot read
 *   - InvalidDeciderConfigurationError: A decider registry was assembled incorrectly
 *   - ValidationError: Invalid configuration or API input
 *
 * Use error codes for fine-grained programmatic error handling:
 * - ErrorCode.MIXED_TYPING_INTEGER_AFTER_STRING, ErrorCode.MIXED_TYPING_BOOLEAN_AFTER_STRING, etc.
 * - ErrorCode.UNSUPPORTED_TYPE, ErrorCode.PARSE_FAILURE, etc.
 *
 * Every error is raised synchronously by the offending call, and the guesser
 * that raised it is left exactly as it was before the call.
 *
 * @example
 * ```typescript
 * import { Guesser, MixedTypingError, ErrorCode } from '@coltype/core';
 *
 * const guesser = new Guesser();
 * guesser.adjustToCompensateForValue(42);
 * try {
 *   guesser.adjustToCompensateForValue('43');
 * } catch (error) {
 *   if (error instanceof MixedTypingError) {
 *     logger.warn(error.message, { code: error.code });
 *   }
 * }
 * ```
 */

// =============================================================================
// Stack Traces
// =============================================================================

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8ErrorConstructor {
  return typeof (errorConstructor as unknown as V8ErrorConstructor).captureStackTrace === 'function';
}

/**
 * Trim constructor frames from an error's stack where the engine supports it.
 * Elsewhere the Error constructor has already filled in `stack`.
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 *
 * @example
 * ```typescript
 * if (error.code === ErrorCode.MIXED_TYPING_STRING_AFTER_HARD_TYPED) {
 *   // Re-ingest the column as text on a fresh guesser
 * }
 * ```
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Decider lookup / registration
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  INVALID_DECIDER_CONFIGURATION = 'INVALID_DECIDER_CONFIGURATION',

  // Input regime violations
  MIXED_TYPING = 'MIXED_TYPING',
  MIXED_TYPING_INTEGER_AFTER_STRING = 'MIXED_TYPING_INTEGER_AFTER_STRING',
  MIXED_TYPING_DECIMAL_AFTER_STRING = 'MIXED_TYPING_DECIMAL_AFTER_STRING',
  MIXED_TYPING_BOOLEAN_AFTER_STRING = 'MIXED_TYPING_BOOLEAN_AFTER_STRING',
  MIXED_TYPING_STRING_AFTER_HARD_TYPED = 'MIXED_TYPING_STRING_AFTER_HARD_TYPED',
  MIXED_TYPING_INCOMPATIBLE_HARD_TYPES = 'MIXED_TYPING_INCOMPATIBLE_HARD_TYPES',

  // Type combination
  INCOMPATIBLE_TYPES = 'INCOMPATIBLE_TYPES',

  // Parsing
  PARSE_FAILURE = 'PARSE_FAILURE',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_FORMAT = 'INVALID_FORMAT',
  JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
  SCHEMA_VALIDATION_ERROR = 'SCHEMA_VALIDATION_ERROR',
}

const ERROR_CODES: ReadonlySet<string> = new Set<string>(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all coltype errors
 *
 * All coltype-specific errors extend this class, allowing for:
 * - Catching all coltype errors with a single catch block
 * - Programmatic error identification via the `code` property
 * - Optional details object for structured debugging info
 * - Helpful suggestions for common misuse
 */
export class ColTypeError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (value kind, current type, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'ColTypeError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, ColTypeError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Unsupported Type
// =============================================================================

/**
 * Error thrown when no decider is registered for a value's kind.
 *
 * Signals a configuration or programming gap (NaN, a plain object, a
 * registry missing a decider) rather than a data issue.
 *
 * @example
 * ```typescript
 * throw UnsupportedTypeError.forValue(Symbol('x'));
 * throw UnsupportedTypeError.forTypeTag('Duration');
 * ```
 */
export class UnsupportedTypeError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.UNSUPPORTED_TYPE,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'UnsupportedTypeError';
    captureStackTrace(this, UnsupportedTypeError);
  }

  static forValue(value: unknown): UnsupportedTypeError {
    const description = describeValueType(value);
    return new UnsupportedTypeError(
      `No type decider exists for values of type ${description}`,
      ErrorCode.UNSUPPORTED_TYPE,
      { valueType: description },
      'Pass strings, booleans, finite numbers, bigints, valid Dates or Durations'
    );
  }

  static forOversizedDecimal(value: number, maxDigits: number): UnsupportedTypeError {
    return new UnsupportedTypeError(
      `Value ${value} needs more than ${maxDigits} decimal digits`,
      ErrorCode.UNSUPPORTED_TYPE,
      { value, maxDigits },
      'Pass such values as text so the column falls back to String'
    );
  }

  static forTypeTag(typeTag: string): UnsupportedTypeError {
    return new UnsupportedTypeError(
      `No type decider is registered for type ${typeTag}`,
      ErrorCode.UNSUPPORTED_TYPE,
      { typeTag },
      'Register a decider for this type or use the default registry'
    );
  }
}

// =============================================================================
// Mixed Typing
// =============================================================================

const MIXED_TYPING_SUGGESTION =
  'Use one guesser per input regime: either only strings or only hard-typed values, or reset() between streams';

/**
 * Error thrown when a guesser receives strings and hard-typed values, or two
 * hard-typed families that cannot be merged.
 *
 * The specialised factories give each offending family its own code so
 * callers can tell integer-after-string from boolean-after-string.
 */
export class MixedTypingError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.MIXED_TYPING,
    details?: Record<string, unknown>,
    suggestion: string = MIXED_TYPING_SUGGESTION
  ) {
    super(message, code, details, suggestion);
    this.name = 'MixedTypingError';
    captureStackTrace(this, MixedTypingError);
  }

  static integerAfterString(value: number | bigint): MixedTypingError {
    return new MixedTypingError(
      'Cannot process a hard-typed integer value after processing string values',
      ErrorCode.MIXED_TYPING_INTEGER_AFTER_STRING,
      { value: String(value), previousRegime: 'string' }
    );
  }

  static decimalAfterString(value: number): MixedTypingError {
    return new MixedTypingError(
      'Cannot process a hard-typed decimal value after processing string values',
      ErrorCode.MIXED_TYPING_DECIMAL_AFTER_STRING,
      { value, previousRegime: 'string' }
    );
  }

  static booleanAfterString(value: boolean): MixedTypingError {
    return new MixedTypingError(
      'Cannot process a hard-typed boolean value after processing string values',
      ErrorCode.MIXED_TYPING_BOOLEAN_AFTER_STRING,
      { value, previousRegime: 'string' }
    );
  }

  static genericAfterString(kind: string): MixedTypingError {
    return new MixedTypingError(
      `Cannot process a hard-typed ${kind} value after processing string values`,
      ErrorCode.MIXED_TYPING,
      { kind, previousRegime: 'string' }
    );
  }

  static stringAfterHardTyped(value: string, currentType: string): MixedTypingError {
    return new MixedTypingError(
      `Cannot process string value '${value}' after processing hard-typed ${currentType} values`,
      ErrorCode.MIXED_TYPING_STRING_AFTER_HARD_TYPED,
      { value, currentType, previousRegime: 'hard-typed' }
    );
  }

  static incompatibleHardTypes(kind: string, incomingType: string, currentType: string): MixedTypingError {
    return new MixedTypingError(
      `Cannot process hard-typed ${kind} value (${incomingType}) after hard-typed ${currentType} values`,
      ErrorCode.MIXED_TYPING_INCOMPATIBLE_HARD_TYPES,
      { kind, incomingType, currentType },
      "Set hardTypedConflict to 'fallback' to widen such columns to String instead"
    );
  }
}

// =============================================================================
// Incompatible Types
// =============================================================================

/**
 * Error thrown when two types share no compatibility group and the caller
 * did not accept a String fallback.
 */
export class IncompatibleTypesError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.INCOMPATIBLE_TYPES,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'IncompatibleTypesError';
    captureStackTrace(this, IncompatibleTypesError);
  }

  static between(first: string, second: string): IncompatibleTypesError {
    return new IncompatibleTypesError(
      `Could not combine types '${first}' and '${second}': they share no compatibility group`,
      ErrorCode.INCOMPATIBLE_TYPES,
      { first, second },
      'Pass { allowStringFallback: true } to widen the result to String'
    );
  }
}

// =============================================================================
// Parse Failure
// =============================================================================

/**
 * Error thrown when parse() receives text the current type cannot read.
 *
 * Indicates caller misuse (text never ingested) rather than a data condition.
 */
export class ParseFailureError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.PARSE_FAILURE,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ParseFailureError';
    captureStackTrace(this, ParseFailureError);
  }

  static forValue(value: string, typeTag: string): ParseFailureError {
    return new ParseFailureError(
      `Could not parse '${value}' as ${typeTag}`,
      ErrorCode.PARSE_FAILURE,
      { value, typeTag },
      'Only parse values that were first passed to adjustToCompensateForValue'
    );
  }
}

// =============================================================================
// Invalid Decider Configuration
// =============================================================================

export class InvalidDeciderConfigurationError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.INVALID_DECIDER_CONFIGURATION,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'InvalidDeciderConfigurationError';
    captureStackTrace(this, InvalidDeciderConfigurationError);
  }

  static noSupportedKinds(typeTag: string): InvalidDeciderConfigurationError {
    return new InvalidDeciderConfigurationError(
      `Decider for ${typeTag} was not given any supported value kinds`,
      ErrorCode.INVALID_DECIDER_CONFIGURATION,
      { typeTag }
    );
  }

  static duplicate(typeTag: string): InvalidDeciderConfigurationError {
    return new InvalidDeciderConfigurationError(
      `More than one decider is registered for ${typeTag}`,
      ErrorCode.INVALID_DECIDER_CONFIGURATION,
      { typeTag }
    );
  }

  static missingFallback(): InvalidDeciderConfigurationError {
    return new InvalidDeciderConfigurationError(
      'A decider registry must include the String decider',
      ErrorCode.INVALID_DECIDER_CONFIGURATION,
      undefined,
      'Include StringDecider as the last entry of the registry'
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when configuration or API input fails validation
 *
 * @example
 * ```typescript
 * throw new ValidationError('pool.maxRetained must be a positive integer');
 * throw ValidationError.invalidFormat('explicitDateFormats[0]', 'a date format string', '');
 * ```
 */
export class ValidationError extends ColTypeError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  /**
   * Create an invalid format error
   */
  static invalidFormat(field: string, expectedFormat: string, actualValue?: string): ValidationError {
    return new ValidationError(
      `Invalid format for "${field}": expected ${expectedFormat}`,
      ErrorCode.INVALID_FORMAT,
      { field, expectedFormat, actualValue },
      `Provide a value in ${expectedFormat} format`
    );
  }
}

// =============================================================================
// Error Factory Utilities
// =============================================================================

function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return 'Infinity';
    return 'number';
  }
  if (value instanceof Date) return 'Invalid Date';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Wrap an unknown error as a ColTypeError.
 *
 * @param error - The error to wrap
 * @param operation - The operation that failed (for context)
 * @returns The original error if already a ColTypeError, otherwise a wrapped one
 */
export function wrapError(error: unknown, operation?: string): ColTypeError {
  if (error instanceof ColTypeError) {
    return error;
  }

  if (error instanceof Error) {
    return new ColTypeError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      { operation, originalError: error.name }
    );
  }

  return new ColTypeError(
    String(error),
    ErrorCode.INTERNAL_ERROR,
    { operation }
  );
}

/**
 * Check if an error is a ColTypeError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof ColTypeError && error.code === code;
}

/**
 * Type guard for any coltype error.
 */
export function isColTypeError(error: unknown): error is ColTypeError {
  return error instanceof ColTypeError;
}

/**
 * Check whether an error is one of the mixed-typing family.
 */
export function isMixedTypingError(error: unknown): error is MixedTypingError {
  return error instanceof MixedTypingError;
}
