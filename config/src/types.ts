/**
 * @coltype/config - Type Definitions
 *
 * Configuration schema for guessers, pools and logging.
 *
 * Naming Conventions:
 * - Counts and limits: max*, *PerX
 * - Culture is referenced by preset name ('invariant', 'en-GB', ...)
 *
 * @packageDocumentation
 * @module @coltype/config
 */

import type { HardTypedConflictPolicy, LogLevel } from '@coltype/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 * Arrays are replaced whole, never merged element by element.
 */
export type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [P in keyof T]?: DeepPartial<T[P]> }
    : T;

// =============================================================================
// Guess Configuration
// =============================================================================

/**
 * Defaults for every guesser built from this configuration.
 *
 * @example
 * ```typescript
 * const guessConfig: GuessConfig = {
 *   culture: 'en-GB',
 *   charCanBeBoolean: false,
 *   explicitDateFormats: ['yyyyMMdd'],
 *   extraLengthPerNonAsciiCharacter: 0,
 *   hardTypedConflict: 'throw',
 * };
 * ```
 */
export interface GuessConfig {
  /** Culture preset name */
  culture: string;

  /** Accept single-character booleans such as "Y"/"N" */
  charCanBeBoolean: boolean;

  /** Formats that mark numeric-looking strings as dates, or null */
  explicitDateFormats: readonly string[] | null;

  /** Extra string length counted per non-ASCII character */
  extraLengthPerNonAsciiCharacter: number;

  /** Policy when hard-typed values from different type families meet */
  hardTypedConflict: HardTypedConflictPolicy;
}

// =============================================================================
// Pool Configuration
// =============================================================================

export interface PoolConfig {
  /** Idle guessers kept for reuse; 0 disables retention */
  maxRetained: number;
}

// =============================================================================
// Logging Configuration
// =============================================================================

/**
 * Log format options.
 */
export type LogFormat = 'json' | 'pretty';

export interface LoggingConfig {
  /** Minimum log level */
  level: LogLevel;

  /** Log output format */
  format: LogFormat;
}

// =============================================================================
// Unified Configuration
// =============================================================================

/**
 * Complete coltype configuration.
 *
 * @example
 * ```typescript
 * const config: ColTypeConfig = {
 *   guess: { culture: 'invariant', ... },
 *   pool: { maxRetained: 16 },
 *   logging: { level: 'info', format: 'json' },
 * };
 * ```
 */
export interface ColTypeConfig {
  guess: GuessConfig;
  pool: PoolConfig;
  logging: LoggingConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'pool.maxRetained') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ConfigValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  /** List of validation errors */
  errors: ConfigValidationError[];

  /** List of validation warnings */
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'COLTYPE_') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
