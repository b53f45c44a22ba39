/**
 * @coltype/config - Runtime objects from configuration
 *
 * @packageDocumentation
 */

import {
  GuesserPool,
  ValidationError,
  createConsoleLogger,
  getCulture,
  listCultureNames,
  type GuessSettings,
  type Logger,
} from '@coltype/core';

import type { ColTypeConfig } from './types.js';

/**
 * Resolve the guess section into settings a Guesser accepts.
 *
 * @throws ValidationError if the culture name has no preset
 */
export function toGuessSettings(config: ColTypeConfig): GuessSettings {
  const { guess } = config;
  const culture = getCulture(guess.culture);

  if (culture === undefined) {
    throw new ValidationError(
      `Unknown culture "${guess.culture}"`,
      undefined,
      { culture: guess.culture },
      `Use one of: ${listCultureNames().join(', ')}`
    );
  }

  return {
    culture,
    charCanBeBoolean: guess.charCanBeBoolean,
    explicitDateFormats: guess.explicitDateFormats === null ? null : [...guess.explicitDateFormats],
    explicitDatePredicate: null,
    extraLengthPerNonAsciiCharacter: guess.extraLengthPerNonAsciiCharacter,
    hardTypedConflict: guess.hardTypedConflict,
  };
}

export function createLoggerFromConfig(config: ColTypeConfig): Logger {
  return createConsoleLogger({
    minLevel: config.logging.level,
    format: config.logging.format,
  });
}

/**
 * Build a pool whose guessers start from the configured settings.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const pool = createPoolFromConfig(config);
 * const type = pool.withGuesser(g => {
 *   g.adjustToCompensateForValues(cells);
 *   return g.guess;
 * });
 * ```
 */
export function createPoolFromConfig(config: ColTypeConfig, logger?: Logger): GuesserPool {
  return new GuesserPool({
    maxRetained: config.pool.maxRetained,
    settings: toGuessSettings(config),
    logger: logger ?? createLoggerFromConfig(config),
  });
}
