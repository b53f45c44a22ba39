/**
 * Batch sizing for already-typed arrays
 *
 * When a whole column arrives as numbers or booleans there is nothing to
 * parse and no fallback to consider, so these helpers skip the Guesser and
 * fold each value straight into a Size with the decider's measureScalar.
 * An empty array gives String with an empty size, like a fresh Guesser.
 *
 * @example
 * ```typescript
 * import { guessIntegers, guessDecimals, describeTypeRequest } from '@coltype/core';
 *
 * describeTypeRequest(guessIntegers([1, 42, 999, -1234])); // 'Integer(4)'
 * describeTypeRequest(guessDecimals([1.99, 10.5, 999.999])); // 'Decimal(6,3)'
 * ```
 *
 * @module batch
 */

import type { TypeDecider } from './deciders/decider.js';
import { getDefaultRegistry, type DeciderRegistry } from './deciders/registry.js';
import { ValidationError } from './errors.js';
import { classifyScalar } from './guards.js';
import { EMPTY_SIZE } from './size.js';
import { createTypeRequest } from './type-request.js';
import { TypeTag, type DatabaseTypeRequest, type ScalarValue } from './types.js';

export interface BatchGuessOptions {
  /** Deciders to measure with (default: the shared built-in registry) */
  registry?: DeciderRegistry;
}

function measureAll<T extends ScalarValue>(
  values: ArrayLike<T>,
  decider: TypeDecider,
  check?: (value: T) => void
): DatabaseTypeRequest {
  if (values.length === 0) return createTypeRequest(TypeTag.String);

  let size = EMPTY_SIZE;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    check?.(value);
    size = decider.measureScalar(value, size);
  }
  return createTypeRequest(decider.typeTag, size);
}

/**
 * Integer type wide enough for every value.
 *
 * @throws ValidationError for a number with a fraction
 * @throws UnsupportedTypeError for NaN and Infinity
 */
export function guessIntegers(
  values: ArrayLike<number | bigint>,
  options: BatchGuessOptions = {}
): DatabaseTypeRequest {
  const decider = (options.registry ?? getDefaultRegistry()).get(TypeTag.Integer);
  return measureAll(values, decider, value => {
    if (classifyScalar(value) === 'float') {
      throw ValidationError.invalidFormat('values', 'whole numbers', String(value));
    }
  });
}

/**
 * Decimal precision and scale covering every value.
 *
 * @throws UnsupportedTypeError for NaN, Infinity, and values needing more
 * than MAX_DECIMAL_DIGITS digits
 */
export function guessDecimals(values: ArrayLike<number>, options: BatchGuessOptions = {}): DatabaseTypeRequest {
  const decider = (options.registry ?? getDefaultRegistry()).get(TypeTag.Decimal);
  return measureAll(values, decider, classifyScalar);
}

export function guessBooleans(values: ArrayLike<boolean>, options: BatchGuessOptions = {}): DatabaseTypeRequest {
  const decider = (options.registry ?? getDefaultRegistry()).get(TypeTag.Boolean);
  return measureAll(values, decider);
}
