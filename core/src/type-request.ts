// DatabaseTypeRequest construction, comparison and merging

import { resolveMerge } from './compatibility.js';
import { getDefaultRegistry, type DeciderRegistry } from './deciders/registry.js';
import { IncompatibleTypesError } from './errors.js';
import { combineSizes, EMPTY_SIZE, growLength, precisionOf, scaleOf, sizesEqual, type Size } from './size.js';
import { TypeTag, type DatabaseTypeRequest } from './types.js';

export function createTypeRequest(type: TypeTag, size: Size = EMPTY_SIZE, unicode = false): DatabaseTypeRequest {
  return Object.freeze({ type, size: Object.isFrozen(size) ? size : Object.freeze({ ...size }), unicode });
}

export function databaseTypeRequestEquals(a: DatabaseTypeRequest, b: DatabaseTypeRequest): boolean {
  return a.type === b.type && a.unicode === b.unicode && sizesEqual(a.size, b.size);
}

export interface MergeTypeRequestsOptions {
  /** Widen to String when the two types cannot be combined (default false) */
  allowStringFallback?: boolean;
  /** Supplies each type's rendered width for the String fallback */
  registry?: DeciderRegistry;
}

/**
 * Combine two type requests, e.g. the guesses for the same column from two
 * batches of a load.
 *
 * @throws IncompatibleTypesError when the types cannot widen into one
 * another and `allowStringFallback` is not set
 *
 * @example
 * ```typescript
 * const merged = mergeTypeRequests(
 *   createTypeRequest(TypeTag.Integer, createSize(3, 0, 3)),
 *   createTypeRequest(TypeTag.Decimal, createSize(1, 2, 4))
 * );
 * describeTypeRequest(merged); // 'Decimal(5,2)'
 * ```
 */
export function mergeTypeRequests(
  a: DatabaseTypeRequest,
  b: DatabaseTypeRequest,
  options: MergeTypeRequestsOptions = {}
): DatabaseTypeRequest {
  const { kind, winner } = resolveMerge(a.type, b.type);
  const unicode = a.unicode || b.unicode;
  let size = combineSizes(a.size, b.size);

  if (kind === 'fallback') {
    if (!options.allowStringFallback) {
      throw IncompatibleTypesError.between(a.type, b.type);
    }
    const registry = options.registry ?? getDefaultRegistry();
    const width = Math.max(registry.get(a.type).renderedLength(a.size), registry.get(b.type).renderedLength(b.size));
    size = growLength(size, width);
  }

  return createTypeRequest(winner, size, unicode);
}

/**
 * Short human-readable rendering: `Integer(3)`, `Decimal(5,2)`,
 * `String(12)`, `String(12) unicode`.
 */
export function describeTypeRequest(request: DatabaseTypeRequest): string {
  const { type, size } = request;
  switch (type) {
    case TypeTag.Integer:
      return `Integer(${size.integerDigits})`;
    case TypeTag.Decimal:
      return `Decimal(${precisionOf(size)},${scaleOf(size)})`;
    case TypeTag.String:
      return `String(${size.stringLength})${request.unicode ? ' unicode' : ''}`;
    default:
      return type;
  }
}
