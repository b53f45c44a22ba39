// @coltype/core
// Incremental column type and size inference for data loaders

// =============================================================================
// Guesser & Pool
// =============================================================================

export { Guesser, type GuesserOptions } from './guesser.js';
export { GuesserPool, type GuesserPoolOptions, type GuesserPoolStats } from './pool.js';
export { guessIntegers, guessDecimals, guessBooleans, type BatchGuessOptions } from './batch.js';

// =============================================================================
// Core Types
// =============================================================================

export {
  TypeTag,
  CompatibilityGroup,
  type ValueKind,
  type ScalarKind,
  type ScalarValue,
  type GuessableValue,
  type ParsedValue,
  type DatabaseTypeRequest,
  type InputRegime,
  type GuesserStats,
} from './types.js';

export { Duration, type DurationParts } from './duration.js';

// =============================================================================
// Size Tracking
// =============================================================================

export {
  EMPTY_SIZE,
  createSize,
  covers,
  growNumeric,
  growLength,
  combineSizes,
  sizesEqual,
  isEmptySize,
  precisionOf,
  scaleOf,
  decimalStringLength,
  type Size,
} from './size.js';

// =============================================================================
// Settings & Culture
// =============================================================================

export {
  createGuessSettings,
  copyGuessSettings,
  guessSettingsEqual,
  type GuessSettings,
  type HardTypedConflictPolicy,
  type ExplicitDatePredicate,
} from './settings.js';

export {
  INVARIANT_CULTURE,
  EN_US_CULTURE,
  EN_GB_CULTURE,
  DE_DE_CULTURE,
  FR_FR_CULTURE,
  getCulture,
  listCultureNames,
  monthIndex,
  type CultureConfig,
  type DateOrder,
} from './culture.js';

// =============================================================================
// Deciders
// =============================================================================

export {
  BaseDecider,
  BooleanDecider,
  IntegerDecider,
  DecimalDecider,
  DateTimeDecider,
  DurationDecider,
  StringDecider,
  DeciderRegistry,
  createDefaultDeciders,
  getDefaultRegistry,
  isExplicitDate,
  readDateTime,
  readDuration,
  readInteger,
  readDecimal,
  isDecimalText,
  countDigits,
  guessDateOrder,
  compileDateFormat,
  matchDateFormats,
  type TypeDecider,
  type CompiledDateFormat,
  type DateFields,
  type IntegerReading,
  type DecimalReading,
} from './deciders/index.js';

// =============================================================================
// Compatibility & Merging
// =============================================================================

export {
  PREFERENCE_ORDER,
  preferenceIndex,
  groupOf,
  canWiden,
  resolveMerge,
  type MergeKind,
  type MergeResolution,
} from './compatibility.js';

export {
  createTypeRequest,
  mergeTypeRequests,
  databaseTypeRequestEquals,
  describeTypeRequest,
  type MergeTypeRequestsOptions,
} from './type-request.js';

// =============================================================================
// Guards
// =============================================================================

export { classifyScalar, isScalarValue, isValidDate, isDuration } from './guards.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  ColTypeError,
  UnsupportedTypeError,
  MixedTypingError,
  IncompatibleTypesError,
  ParseFailureError,
  InvalidDeciderConfigurationError,
  ValidationError,
  captureStackTrace,
  wrapError,
  hasErrorCode,
  isColTypeError,
  isMixedTypingError,
} from './errors.js';

export {
  JSONParseError,
  JSONValidationError,
  parseJSON,
  safeParseJSON,
  validate,
  type ZodErrorLike,
  type ZodSchemaLike,
  type SafeParseJSONResult,
} from './validation.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogContextValue,
  withContext,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogContextValue,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Constants
// =============================================================================

export {
  MIN_DATE_STRING_LENGTH,
  BOOLEAN_STRING_LENGTH,
  INT8_MIN,
  INT8_MAX,
  INT16_MIN,
  INT16_MAX,
  INT32_MIN,
  INT32_MAX,
  MAX_DECIMAL_DIGITS,
  TWO_DIGIT_YEAR_PIVOT,
  DEFAULT_POOL_MAX_RETAINED,
  MAX_POOL_RETAINED,
  ENV_PREFIX,
} from './constants.js';
