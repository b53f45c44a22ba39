/**
 * @coltype/config - Configuration for coltype guessers and pools
 *
 * Key Features:
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - JSON configuration files checked with zod via parseConfigJSON()
 * - Validation with clear error messages
 *
 * @example
 * ```typescript
 * import { getConfigFromEnv, validateConfig, createPoolFromConfig } from '@coltype/config';
 *
 * const config = getConfigFromEnv();
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 *
 * const pool = createPoolFromConfig(config);
 * ```
 *
 * @packageDocumentation
 * @module @coltype/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // Utility types
  DeepPartial,

  // Sections
  GuessConfig,
  PoolConfig,
  LogFormat,
  LoggingConfig,

  // Main config
  ColTypeConfig,

  // Validation types
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,

  // Environment types
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export {
  validateConfig,
  assertValidConfig,
  parseConfigJSON,
  ConfigFileSchema,
  type ConfigFile,
} from './validation.js';

// =============================================================================
// Runtime Objects
// =============================================================================

export { toGuessSettings, createLoggerFromConfig, createPoolFromConfig } from './bridge.js';
