/**
 * coltype Common Constants
 *
 * Centralized constants to replace magic numbers across the codebase.
 * Both packages import from @coltype/core instead of using inline values.
 *
 * @module constants
 */

// =============================================================================
// STRING WIDTH CONSTANTS
// =============================================================================

/**
 * Minimum text width for a column that has held date values.
 * Wide enough for `yyyy-MM-dd HH:mm:ss.fffffff` so an ALTER to a
 * string column never truncates a rendered date.
 */
export const MIN_DATE_STRING_LENGTH = 27;

/** Width of the longest boolean rendering ("false") */
export const BOOLEAN_STRING_LENGTH = 5;

// =============================================================================
// NUMERIC RANGE CONSTANTS
// =============================================================================

/** Signed 8-bit integer bounds */
export const INT8_MIN = -128;
export const INT8_MAX = 127;

/** Signed 16-bit integer bounds */
export const INT16_MIN = -32768;
export const INT16_MAX = 32767;

/** Signed 32-bit integer bounds */
export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/**
 * Most digits a decimal column may need in total, integer and fractional
 * together, once any exponent is applied. Wider values are not decimals.
 */
export const MAX_DECIMAL_DIGITS = 38;

/**
 * Two-digit years below this pivot land in the 2000s, the rest in the 1900s.
 */
export const TWO_DIGIT_YEAR_PIVOT = 50;

// =============================================================================
// POOL CONSTANTS
// =============================================================================

/** Default number of idle guessers a pool keeps for reuse */
export const DEFAULT_POOL_MAX_RETAINED = 16;

/** Upper bound accepted by config validation for pool.maxRetained */
export const MAX_POOL_RETAINED = 4096;

// =============================================================================
// ENVIRONMENT CONSTANTS
// =============================================================================

/** Prefix for configuration environment variables */
export const ENV_PREFIX = 'COLTYPE_';
