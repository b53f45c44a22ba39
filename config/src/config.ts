/**
 * @coltype/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { ENV_PREFIX, LogLevels, ValidationError, type HardTypedConflictPolicy } from '@coltype/core';

import { DEFAULT_CONFIG } from './defaults.js';
import type {
  ColTypeConfig,
  DeepPartial,
  EnvConfigOptions,
  GuessConfig,
  LogFormat,
  LoggingConfig,
  PoolConfig,
} from './types.js';

/**
 * Overlay the defined fields of `override` on a copy of `base`.
 * Undefined values do not override.
 */
function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  const defined: Partial<T> = {};

  if (override) {
    for (const key in override) {
      if (override[key] !== undefined) {
        defined[key] = override[key];
      }
    }
  }

  return { ...base, ...defined };
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T>(obj: T): T {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Create a complete configuration with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen ColTypeConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   guess: { culture: 'en-GB' },
 *   pool: { maxRetained: 4 },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ logging: { level: 'debug' } }, config2);
 * ```
 */
export function createConfig(
  overrides: DeepPartial<ColTypeConfig> = {},
  base: ColTypeConfig = DEFAULT_CONFIG
): ColTypeConfig {
  return deepFreeze({
    guess: mergeSection<GuessConfig>(base.guess, overrides.guess),
    pool: mergeSection<PoolConfig>(base.pool, overrides.pool),
    logging: mergeSection<LoggingConfig>(base.logging, overrides.logging),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { pool: { maxRetained: 4 } },
 *   { pool: { maxRetained: 8 }, logging: { level: 'debug' } }
 * );
 * // merged.pool.maxRetained === 8
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<ColTypeConfig> | null | undefined>
): DeepPartial<ColTypeConfig> {
  const result: DeepPartial<ColTypeConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    if (config.guess) result.guess = mergeSection<Partial<GuessConfig>>(result.guess ?? {}, config.guess);
    if (config.pool) result.pool = mergeSection<Partial<PoolConfig>>(result.pool ?? {}, config.pool);
    if (config.logging) result.logging = mergeSection<Partial<LoggingConfig>>(result.logging ?? {}, config.logging);
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

const HARD_TYPED_CONFLICT_POLICIES: readonly HardTypedConflictPolicy[] = ['throw', 'fallback'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

function isHardTypedConflictPolicy(value: string): value is HardTypedConflictPolicy {
  return HARD_TYPED_CONFLICT_POLICIES.some(policy => policy === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

/**
 * Reads typed values out of an environment map. Values that are present
 * but malformed raise a ValidationError naming the variable.
 */
class EnvReader {
  constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly prefix: string
  ) {}

  key(...parts: string[]): string {
    return `${this.prefix}${parts.join('_')}`.toUpperCase();
  }

  string(...parts: string[]): string | undefined {
    const value = this.env[this.key(...parts)];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  number(...parts: string[]): number | undefined {
    const raw = this.string(...parts);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw ValidationError.invalidFormat(this.key(...parts), 'a number', raw);
    }
    return value;
  }

  boolean(...parts: string[]): boolean | undefined {
    const raw = this.string(...parts)?.toLowerCase();
    if (raw === undefined) return undefined;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    throw ValidationError.invalidFormat(this.key(...parts), 'true, false, 1 or 0', raw);
  }

  list(...parts: string[]): string[] | undefined {
    return this.string(...parts)
      ?.split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  oneOf<T extends string>(guard: (value: string) => value is T, expected: string, ...parts: string[]): T | undefined {
    const raw = this.string(...parts);
    if (raw === undefined) return undefined;
    if (!guard(raw)) {
      throw ValidationError.invalidFormat(this.key(...parts), expected, raw);
    }
    return raw;
  }
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern COLTYPE_<SECTION>_<FIELD>:
 * - COLTYPE_GUESS_CULTURE=en-GB
 * - COLTYPE_GUESS_CHAR_CAN_BE_BOOLEAN=true
 * - COLTYPE_GUESS_EXPLICIT_DATE_FORMATS=yyyyMMdd,ddMMyyyy
 * - COLTYPE_GUESS_EXTRA_LENGTH_PER_NON_ASCII_CHARACTER=1
 * - COLTYPE_GUESS_HARD_TYPED_CONFLICT=fallback
 * - COLTYPE_POOL_MAX_RETAINED=32
 * - COLTYPE_LOGGING_LEVEL=debug
 * - COLTYPE_LOGGING_FORMAT=pretty
 *
 * @throws ValidationError when a variable is set to a malformed value
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'LOADER_', env: { LOADER_POOL_MAX_RETAINED: '4' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): ColTypeConfig {
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});
  const read = new EnvReader(env, options.prefix ?? ENV_PREFIX);

  return createConfig({
    guess: {
      culture: read.string('GUESS', 'CULTURE'),
      charCanBeBoolean: read.boolean('GUESS', 'CHAR', 'CAN', 'BE', 'BOOLEAN'),
      explicitDateFormats: read.list('GUESS', 'EXPLICIT', 'DATE', 'FORMATS'),
      extraLengthPerNonAsciiCharacter: read.number('GUESS', 'EXTRA', 'LENGTH', 'PER', 'NON', 'ASCII', 'CHARACTER'),
      hardTypedConflict: read.oneOf(isHardTypedConflictPolicy, "'throw' or 'fallback'", 'GUESS', 'HARD', 'TYPED', 'CONFLICT'),
    },
    pool: {
      maxRetained: read.number('POOL', 'MAX', 'RETAINED'),
    },
    logging: {
      level: read.oneOf(LogLevels.isLogLevel, 'debug, info, warn or error', 'LOGGING', 'LEVEL'),
      format: read.oneOf(isLogFormat, "'json' or 'pretty'", 'LOGGING', 'FORMAT'),
    },
  });
}
