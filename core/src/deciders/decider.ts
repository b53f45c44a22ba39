/**
 * Decider capability interface and shared base class.
 *
 * A decider is bound to one storage type. It answers whether text can be
 * stored as that type, sizes the text when it can, and parses it. Deciders
 * hold no per-stream state: the size accumulator and the settings arrive on
 * every call, so one instance serves any number of guessers.
 */

import { InvalidDeciderConfigurationError, ParseFailureError } from '../errors.js';
import type { GuessSettings } from '../settings.js';
import { EMPTY_SIZE, type Size } from '../size.js';
import type { CompatibilityGroup, ParsedValue, ScalarValue, TypeTag, ValueKind } from '../types.js';
import { matchDateFormats } from './date-formats.js';

// =============================================================================
// Interface
// =============================================================================

export interface TypeDecider<T extends ParsedValue = ParsedValue> {
  readonly typeTag: TypeTag;
  readonly group: CompatibilityGroup;
  /** Value kinds this decider takes directly when handed an already-typed value */
  readonly scalarKinds: readonly ValueKind[];

  /**
   * Test `candidate` and, when it fits, return `size` grown to cover it.
   * Returns undefined for a rejected candidate; `size` itself is never mutated.
   */
  accept(candidate: string, size: Size, settings: GuessSettings): Size | undefined;

  isAcceptable(candidate: string, settings: GuessSettings): boolean;

  /** @throws ParseFailureError when `candidate` is not acceptable */
  parse(candidate: string, settings: GuessSettings): T;

  acceptsScalar(kind: ValueKind): boolean;

  /** Grow `size` to cover a hard-typed value of one of this decider's kinds */
  measureScalar(value: ScalarValue, size: Size): Size;

  /**
   * Characters needed to print any value this decider accepted under `size`.
   * Used when a column falls back to String.
   */
  renderedLength(size: Size): number;
}

// =============================================================================
// Explicit dates
// =============================================================================

/**
 * True when `candidate` is configured to be read as a date even though it
 * may also look like a number (e.g. `20240115` under `yyyyMMdd`).
 */
export function isExplicitDate(candidate: string, settings: GuessSettings): boolean {
  if (settings.explicitDatePredicate) {
    return settings.explicitDatePredicate(candidate);
  }
  if (settings.explicitDateFormats && settings.explicitDateFormats.length > 0) {
    return matchDateFormats(candidate, settings.explicitDateFormats, settings.culture) !== undefined;
  }
  return false;
}

// =============================================================================
// Base class
// =============================================================================

export abstract class BaseDecider<T extends ParsedValue> implements TypeDecider<T> {
  readonly scalarKinds: readonly ValueKind[];
  private readonly kinds: ReadonlySet<ValueKind>;

  protected constructor(
    readonly typeTag: TypeTag,
    readonly group: CompatibilityGroup,
    scalarKinds: readonly ValueKind[]
  ) {
    if (scalarKinds.length === 0) {
      throw InvalidDeciderConfigurationError.noSupportedKinds(typeTag);
    }
    this.scalarKinds = Object.freeze([...scalarKinds]);
    this.kinds = new Set(scalarKinds);
  }

  /** Accept an already-trimmed, non-empty candidate */
  protected abstract acceptTrimmed(text: string, size: Size, settings: GuessSettings): Size | undefined;

  /** Parse a trimmed candidate that acceptTrimmed has accepted */
  protected abstract parseTrimmed(text: string, settings: GuessSettings): T;

  abstract measureScalar(value: ScalarValue, size: Size): Size;

  accept(candidate: string, size: Size, settings: GuessSettings): Size | undefined {
    const text = candidate.trim();
    if (text.length === 0) return undefined;
    return this.acceptTrimmed(text, size, settings);
  }

  isAcceptable(candidate: string, settings: GuessSettings): boolean {
    return this.accept(candidate, EMPTY_SIZE, settings) !== undefined;
  }

  parse(candidate: string, settings: GuessSettings): T {
    const text = candidate.trim();
    if (text.length === 0 || this.acceptTrimmed(text, EMPTY_SIZE, settings) === undefined) {
      throw ParseFailureError.forValue(candidate, this.typeTag);
    }
    return this.parseTrimmed(text, settings);
  }

  acceptsScalar(kind: ValueKind): boolean {
    return this.kinds.has(kind);
  }

  renderedLength(size: Size): number {
    return size.stringLength;
  }
}
