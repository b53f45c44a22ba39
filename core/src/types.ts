// Type system for column inference: storage tags, groups, value kinds

import type { Duration } from './duration.js';
import type { Size } from './size.js';

// =============================================================================
// Storage Types
// =============================================================================

/**
 * Storage-primitive types a guesser can infer.
 * String is the universal fallback and accepts every value.
 */
export enum TypeTag {
  Boolean = 'Boolean',
  Integer = 'Integer',
  Decimal = 'Decimal',
  DateTime = 'DateTime',
  Duration = 'Duration',
  String = 'String',
}

/**
 * Families of types that may widen into one another.
 * A conflict between two groups falls back to String.
 */
export enum CompatibilityGroup {
  Numerical = 'Numerical',
  Temporal = 'Temporal',
  Boolean = 'Boolean',
  Textual = 'Textual',
}

// =============================================================================
// Value Kinds
// =============================================================================

/**
 * Structural classification of an already-typed value (plus `string` for text).
 * Each kind is claimed by exactly one decider.
 */
export type ValueKind =
  | 'boolean'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float'
  | 'date'
  | 'duration'
  | 'string';

/** Kinds of hard-typed (non-text) values */
export type ScalarKind = Exclude<ValueKind, 'string'>;

/** A value already given as a concrete scalar rather than as text */
export type ScalarValue = boolean | number | bigint | Date | Duration;

/** Anything a guesser can ingest; null and undefined are always no-ops */
export type GuessableValue = string | ScalarValue | null | undefined;

/** What parse() can hand back: a scalar, the text itself for String, or null for blanks */
export type ParsedValue = ScalarValue | string | null;

// =============================================================================
// Guess Result
// =============================================================================

/**
 * Immutable result of reading a guesser's current estimate.
 *
 * `size` carries every width the column needs: digits before and after the
 * decimal point for numeric types, and the longest text rendering seen.
 */
export interface DatabaseTypeRequest {
  readonly type: TypeTag;
  readonly size: Size;
  /** True once any value contained a non-ASCII character */
  readonly unicode: boolean;
}

/**
 * Which kind of input a guesser has locked into.
 * Strings and hard-typed values never mix on one instance until reset.
 */
export type InputRegime = 'unset' | 'string' | 'hard-typed';

/**
 * Running counters kept beside the guess; nulls are counted here only.
 */
export interface GuesserStats {
  readonly valueCount: number;
  readonly nullCount: number;
}
