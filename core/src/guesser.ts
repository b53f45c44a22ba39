/**
 * Incremental column type guesser
 *
 * A Guesser consumes one value at a time and keeps the narrowest type that
 * can store every value seen so far, together with the size that type needs.
 * Values arrive either as text or as already-typed scalars; one instance
 * accepts only one of the two until it is reset.
 *
 * Each ingestion computes the next state in locals and commits it in one
 * step, so a call that throws leaves the guesser untouched.
 *
 * @example
 * ```typescript
 * import { Guesser, describeTypeRequest } from '@coltype/core';
 *
 * const guesser = new Guesser();
 * guesser.adjustToCompensateForValues(['1', '2.5', '300']);
 * describeTypeRequest(guesser.guess); // 'Decimal(4,1)'
 * guesser.parse('2.5'); // 2.5
 * ```
 *
 * @module guesser
 */

import { resolveMerge, type MergeResolution } from './compatibility.js';
import type { TypeDecider } from './deciders/decider.js';
import { getDefaultRegistry, type DeciderRegistry } from './deciders/registry.js';
import { MixedTypingError, UnsupportedTypeError, ValidationError } from './errors.js';
import { classifyScalar } from './guards.js';
import { createNoopLogger, type Logger } from './logging.js';
import { createGuessSettings, type GuessSettings } from './settings.js';
import { EMPTY_SIZE, createSize, growLength, type Size } from './size.js';
import { createTypeRequest } from './type-request.js';
import {
  TypeTag,
  type DatabaseTypeRequest,
  type GuessableValue,
  type GuesserStats,
  type InputRegime,
  type ParsedValue,
  type ScalarKind,
  type ScalarValue,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export interface GuesserOptions {
  /** Overrides applied on top of the default settings */
  settings?: Partial<GuessSettings>;
  /** Receives a debug entry on every change of type estimate (default: no-op) */
  logger?: Logger;
  /** Deciders to consult (default: the shared built-in registry) */
  registry?: DeciderRegistry;
  /**
   * Estimate to start from, e.g. the type of an existing column. Later values
   * widen it like any other; reset() discards it.
   */
  initialType?: DatabaseTypeRequest;
}

// =============================================================================
// Helpers
// =============================================================================

interface TextMeasure {
  length: number;
  unicode: boolean;
}

function measureText(text: string, extraPerNonAscii: number): TextMeasure {
  let nonAscii = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) nonAscii++;
  }
  return { length: text.length + nonAscii * extraPerNonAscii, unicode: nonAscii > 0 };
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function mixedTypingAfterString(kind: ScalarKind, value: ScalarValue): MixedTypingError {
  if (typeof value === 'boolean') return MixedTypingError.booleanAfterString(value);
  if (typeof value === 'bigint') return MixedTypingError.integerAfterString(value);
  if (typeof value === 'number') {
    return kind === 'float' ? MixedTypingError.decimalAfterString(value) : MixedTypingError.integerAfterString(value);
  }
  return MixedTypingError.genericAfterString(kind);
}

// =============================================================================
// Guesser
// =============================================================================

export class Guesser {
  /**
   * Live settings. Changes apply to values ingested afterwards; values
   * already accepted are not re-examined.
   */
  readonly settings: GuessSettings;

  private readonly logger: Logger;
  private readonly registry: DeciderRegistry;
  private readonly stringDecider: TypeDecider;

  private current: TypeDecider | undefined;
  private size: Size = EMPTY_SIZE;
  private unicode = false;
  private regime: InputRegime = 'unset';
  private valueCount = 0;
  private nullCount = 0;
  private cachedGuess: DatabaseTypeRequest | undefined;

  constructor(options: GuesserOptions = {}) {
    this.settings = createGuessSettings(options.settings);
    this.logger = options.logger ?? createNoopLogger();
    this.registry = options.registry ?? getDefaultRegistry();
    this.stringDecider = this.registry.get(TypeTag.String);

    if (options.initialType) {
      const { type, size, unicode } = options.initialType;
      this.current = this.registry.get(type);
      this.size = createSize(size.integerDigits, size.fractionalDigits, size.stringLength);
      this.unicode = unicode;
    }
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Widen the estimate, if needed, so it also covers `value`.
   *
   * null, undefined and whitespace-only strings change nothing but the null
   * count.
   *
   * @throws MixedTypingError when text follows hard-typed values or the
   * reverse, or when hard-typed values of incompatible families meet under
   * the 'throw' conflict policy
   * @throws UnsupportedTypeError for NaN, Infinity, invalid dates and other
   * values no decider claims
   */
  adjustToCompensateForValue(value: GuessableValue): void {
    if (value === null || value === undefined) {
      this.nullCount++;
      return;
    }
    if (typeof value === 'string') {
      this.adjustForText(value);
    } else {
      this.adjustForScalar(value);
    }
  }

  /**
   * Ingest each value in order. Ends in the same state as the matching
   * sequence of single-value calls, including when one of them throws.
   *
   * @throws ValidationError when given a bare string, which would otherwise
   * be ingested one character at a time
   */
  adjustToCompensateForValues(values: Iterable<GuessableValue> & object): void {
    if (typeof values === 'string') {
      throw new ValidationError(
        'Expected a collection of values, got a single string',
        undefined,
        { value: values },
        'Use adjustToCompensateForValue for a single value'
      );
    }
    for (const value of values) {
      this.adjustToCompensateForValue(value);
    }
  }

  private adjustForText(text: string): void {
    if (isBlank(text)) {
      this.nullCount++;
      return;
    }
    if (this.regime === 'hard-typed') {
      throw MixedTypingError.stringAfterHardTyped(text, this.guess.type);
    }

    const measured = measureText(text, this.settings.extraLengthPerNonAsciiCharacter);

    // String is never left, so only the width still matters
    if (this.current === this.stringDecider) {
      const resolution = resolveMerge(TypeTag.String, TypeTag.String);
      this.commit(resolution, this.stringDecider, growLength(this.size, measured.length), measured.unicode, 'string');
      return;
    }

    // Every scan starts at the most specific decider; accept() grows from the current size
    let incoming = this.stringDecider;
    let size = this.size;
    for (const decider of this.registry.deciders) {
      const grown = decider.accept(text, this.size, this.settings);
      if (grown) {
        incoming = decider;
        size = grown;
        break;
      }
    }

    size = growLength(size, measured.length);

    this.commit(resolveMerge(this.current?.typeTag, incoming.typeTag), incoming, size, measured.unicode, 'string');
  }

  private adjustForScalar(value: ScalarValue): void {
    const kind = classifyScalar(value);
    if (this.regime === 'string') {
      throw mixedTypingAfterString(kind, value);
    }

    const decider = this.registry.forKind(kind);
    if (!decider) {
      throw UnsupportedTypeError.forValue(value);
    }

    const resolution = resolveMerge(this.current?.typeTag, decider.typeTag);
    if (resolution.kind === 'fallback' && this.settings.hardTypedConflict === 'throw') {
      throw MixedTypingError.incompatibleHardTypes(kind, decider.typeTag, this.guess.type);
    }

    if (this.current === this.stringDecider) {
      // measured alone, so digits of earlier values do not inflate the width
      const width = decider.renderedLength(decider.measureScalar(value, EMPTY_SIZE));
      this.commit(resolution, this.stringDecider, growLength(this.size, width), false, 'hard-typed');
      return;
    }

    this.commit(resolution, decider, decider.measureScalar(value, this.size), false, 'hard-typed');
  }

  /**
   * Apply a merge decision. `incomingSize` already covers the current size.
   */
  private commit(
    resolution: MergeResolution,
    incoming: TypeDecider,
    incomingSize: Size,
    incomingUnicode: boolean,
    regime: InputRegime
  ): void {
    const previous = this.current;
    let next = incoming;
    let size = incomingSize;

    if (resolution.kind === 'same' && previous) {
      next = previous;
    } else if (resolution.kind === 'fallback') {
      next = this.stringDecider;
      // the String width must hold every earlier value as it would be printed
      const priorWidth = previous ? previous.renderedLength(this.size) : 0;
      size = growLength(size, Math.max(priorWidth, incoming.renderedLength(incomingSize)));
    }

    const unicode = this.unicode || incomingUnicode;
    if (next !== previous || size !== this.size || unicode !== this.unicode) {
      this.cachedGuess = undefined;
    }

    this.current = next;
    this.size = size;
    this.unicode = unicode;
    this.regime = regime;
    this.valueCount++;

    if (next !== previous) {
      this.logger.debug('Type estimate changed', {
        from: previous ? previous.typeTag : null,
        to: next.typeTag,
        reason: resolution.kind,
        valueCount: this.valueCount,
      });
    }
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  /**
   * Current estimate. String with an empty size before any value arrives.
   * The returned object is frozen and reused until the next change.
   */
  get guess(): DatabaseTypeRequest {
    if (!this.cachedGuess) {
      this.cachedGuess = createTypeRequest(this.current?.typeTag ?? TypeTag.String, this.size, this.unicode);
    }
    return this.cachedGuess;
  }

  get stats(): GuesserStats {
    return { valueCount: this.valueCount, nullCount: this.nullCount };
  }

  get inputRegime(): InputRegime {
    return this.regime;
  }

  /** True once a hard-typed value has been accepted */
  get isPrimedWithHardType(): boolean {
    return this.regime === 'hard-typed';
  }

  /**
   * Parse text with the current estimate's decider.
   *
   * Whitespace-only text parses to null; while the estimate is String (or
   * nothing was ingested yet) the text comes back unchanged. Any text this
   * guesser accepted earlier parses successfully.
   *
   * @throws ParseFailureError when the current type cannot read `candidate`
   */
  parse(candidate: string): ParsedValue {
    if (isBlank(candidate)) return null;
    const decider = this.current ?? this.stringDecider;
    return decider.parse(candidate, this.settings);
  }

  /**
   * True when a column created as `currentColumnType` is String but the
   * values seen fit a narrower type.
   */
  shouldDowngradeColumnType(currentColumnType: TypeTag): boolean {
    return currentColumnType === TypeTag.String && this.guess.type !== TypeTag.String;
  }

  /**
   * Return to the empty state. Settings are kept.
   */
  reset(): void {
    this.current = undefined;
    this.size = EMPTY_SIZE;
    this.unicode = false;
    this.regime = 'unset';
    this.valueCount = 0;
    this.nullCount = 0;
    this.cachedGuess = undefined;
  }
}
