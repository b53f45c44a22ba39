export { type TypeDecider, BaseDecider, isExplicitDate } from './decider.js';
export { BooleanDecider } from './boolean.js';
export { IntegerDecider } from './integer.js';
export { DecimalDecider } from './decimal.js';
export { DateTimeDecider, readDateTime, guessDateOrder } from './date-time.js';
export { DurationDecider, readDuration } from './duration.js';
export { StringDecider } from './string.js';
export { DeciderRegistry, createDefaultDeciders, getDefaultRegistry } from './registry.js';
export { compileDateFormat, matchDateFormats, type CompiledDateFormat, type DateFields } from './date-formats.js';
export { readInteger, readDecimal, isDecimalText, countDigits, type IntegerReading, type DecimalReading } from './numeric.js';
