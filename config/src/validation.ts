/**
 * @coltype/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  ErrorCode,
  MAX_POOL_RETAINED,
  ValidationError,
  getCulture,
  listCultureNames,
  parseJSON,
} from '@coltype/core';

import { createConfig } from './config.js';
import type {
  ColTypeConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
} from './types.js';

/**
 * Validate a complete ColTypeConfig.
 *
 * @param config - The configuration to validate
 * @returns ValidationResult with errors and warnings
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * if (result.warnings.length > 0) {
 *   console.warn('Config warnings:', result.warnings);
 * }
 * ```
 */
export function validateConfig(config: ColTypeConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateGuessConfig(config.guess, errors, warnings);
  validatePoolConfig(config.pool, errors, warnings);
  validateLoggingConfig(config.logging, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw a ValidationError carrying every problem `validateConfig` finds.
 */
export function assertValidConfig(config: ColTypeConfig): ColTypeConfig {
  const result = validateConfig(config);

  if (!result.valid) {
    throw new ValidationError(
      `Invalid configuration: ${result.errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      ErrorCode.VALIDATION_ERROR,
      { errors: result.errors.map(e => ({ path: e.path, message: e.message })) },
      result.errors.find(e => e.suggestion !== undefined)?.suggestion
    );
  }

  return config;
}

// Quoted runs are literals; any y, M or d left outside them is a date field.
function hasDateField(format: string): boolean {
  return /[yMd]/.test(format.replace(/'[^']*'/g, ''));
}

function validateGuessConfig(
  guess: ColTypeConfig['guess'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (getCulture(guess.culture) === undefined) {
    errors.push({
      path: 'guess.culture',
      message: `Unknown culture "${guess.culture}"`,
      value: guess.culture,
      suggestion: `Use one of: ${listCultureNames().join(', ')}`,
    });
  }

  if (!Number.isInteger(guess.extraLengthPerNonAsciiCharacter) || guess.extraLengthPerNonAsciiCharacter < 0) {
    errors.push({
      path: 'guess.extraLengthPerNonAsciiCharacter',
      message: 'Extra length per non-ASCII character must be a non-negative integer',
      value: guess.extraLengthPerNonAsciiCharacter,
      suggestion: 'Use 0 when the target measures length in characters',
    });
  }

  if (guess.hardTypedConflict !== 'throw' && guess.hardTypedConflict !== 'fallback') {
    errors.push({
      path: 'guess.hardTypedConflict',
      message: "Hard-typed conflict policy must be 'throw' or 'fallback'",
      value: guess.hardTypedConflict,
    });
  }

  guess.explicitDateFormats?.forEach((format, index) => {
    const path = `guess.explicitDateFormats[${index}]`;
    if (format.trim() === '') {
      errors.push({
        path,
        message: 'Explicit date formats must not be empty',
        value: format,
      });
    } else if (!hasDateField(format)) {
      warnings.push({
        path,
        message: 'Explicit date format has no year, month or day field',
        value: format,
        recommendation: 'Add yyyy, MM or dd, or quote letters meant as literals',
      });
    }
  });

  if (guess.charCanBeBoolean) {
    warnings.push({
      path: 'guess.charCanBeBoolean',
      message: 'Single letters such as "Y" and "N" will be read as booleans',
      value: guess.charCanBeBoolean,
      recommendation: 'Enable only for columns known to hold flag characters',
    });
  }
}

function validatePoolConfig(
  pool: ColTypeConfig['pool'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!Number.isInteger(pool.maxRetained) || pool.maxRetained < 0 || pool.maxRetained > MAX_POOL_RETAINED) {
    errors.push({
      path: 'pool.maxRetained',
      message: `Max retained guessers must be an integer between 0 and ${MAX_POOL_RETAINED}`,
      value: pool.maxRetained,
    });
  } else if (pool.maxRetained === 0) {
    warnings.push({
      path: 'pool.maxRetained',
      message: 'Pooling is disabled; every acquire builds a new guesser',
      value: pool.maxRetained,
      recommendation: 'Retain roughly one guesser per column loaded concurrently',
    });
  }
}

function validateLoggingConfig(
  logging: ColTypeConfig['logging'],
  errors: ConfigValidationError[]
): void {
  const validLogLevels = ['debug', 'info', 'warn', 'error'];
  if (!validLogLevels.includes(logging.level)) {
    errors.push({
      path: 'logging.level',
      message: `Log level must be one of: ${validLogLevels.join(', ')}`,
      value: logging.level,
    });
  }

  const validLogFormats = ['json', 'pretty'];
  if (!validLogFormats.includes(logging.format)) {
    errors.push({
      path: 'logging.format',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: logging.format,
    });
  }
}

// =============================================================================
// JSON Configuration Files
// =============================================================================

/**
 * Shape of a configuration file. Every section and field is optional;
 * unknown keys are rejected so typos surface instead of being ignored.
 */
export const ConfigFileSchema = z
  .object({
    guess: z
      .object({
        culture: z.string().min(1),
        charCanBeBoolean: z.boolean(),
        explicitDateFormats: z.array(z.string()).nullable(),
        extraLengthPerNonAsciiCharacter: z.number().int().nonnegative(),
        hardTypedConflict: z.enum(['throw', 'fallback']),
      })
      .partial()
      .strict(),
    pool: z
      .object({
        maxRetained: z.number().int().min(0).max(MAX_POOL_RETAINED),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        format: z.enum(['json', 'pretty']),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Parse a JSON configuration document over `base` and validate the result.
 *
 * @throws JSONParseError when the text is not JSON
 * @throws JSONValidationError when the document does not match ConfigFileSchema
 * @throws ValidationError when the merged configuration is invalid (an unknown culture, say)
 *
 * @example
 * ```typescript
 * const config = parseConfigJSON(await readFile('coltype.json', 'utf8'));
 * ```
 */
export function parseConfigJSON(json: string, base?: ColTypeConfig): ColTypeConfig {
  const file = parseJSON(json, ConfigFileSchema);
  return assertValidConfig(createConfig(file, base));
}
