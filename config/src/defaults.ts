/**
 * @coltype/config - Default Configuration Values
 *
 * Values are sourced from @coltype/core constants and settings defaults.
 *
 * @packageDocumentation
 */

import { DEFAULT_POOL_MAX_RETAINED, INVARIANT_CULTURE, createGuessSettings } from '@coltype/core';

import type { ColTypeConfig } from './types.js';

const GUESS_DEFAULTS = createGuessSettings();

/**
 * Default guess configuration, matching a guesser built with no options.
 */
const DEFAULT_GUESS_CONFIG = {
  culture: INVARIANT_CULTURE.name,
  charCanBeBoolean: GUESS_DEFAULTS.charCanBeBoolean,
  explicitDateFormats: GUESS_DEFAULTS.explicitDateFormats,
  extraLengthPerNonAsciiCharacter: GUESS_DEFAULTS.extraLengthPerNonAsciiCharacter,
  hardTypedConflict: GUESS_DEFAULTS.hardTypedConflict,
};

const DEFAULT_POOL_CONFIG = {
  maxRetained: DEFAULT_POOL_MAX_RETAINED,
} as const;

const DEFAULT_LOGGING_CONFIG = {
  level: 'info' as const,
  format: 'json' as const,
} as const;

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@coltype/config';
 *
 * console.log(DEFAULT_CONFIG.pool.maxRetained); // 16
 *
 * const config = createConfig({
 *   guess: { culture: 'de-DE' },
 * });
 * ```
 */
export const DEFAULT_CONFIG: ColTypeConfig = Object.freeze({
  guess: Object.freeze(DEFAULT_GUESS_CONFIG),
  pool: Object.freeze(DEFAULT_POOL_CONFIG),
  logging: Object.freeze(DEFAULT_LOGGING_CONFIG),
});
