/**
 * Compatibility and preference rules for merging type estimates.
 *
 * Types widen only along explicit edges inside a compatibility group. Two
 * types with no edge between them, in either direction, can only be stored
 * together as String, and String never narrows again.
 *
 * @module compatibility
 */

import { CompatibilityGroup, TypeTag } from './types.js';

// =============================================================================
// Preference Order
// =============================================================================

/**
 * Most specific first; String is the universal fallback and always last.
 * Strings are tried against deciders in this order.
 */
export const PREFERENCE_ORDER: readonly TypeTag[] = Object.freeze([
  TypeTag.Boolean,
  TypeTag.Integer,
  TypeTag.Decimal,
  TypeTag.DateTime,
  TypeTag.Duration,
  TypeTag.String,
]);

const PREFERENCE_INDEX: ReadonlyMap<TypeTag, number> = new Map(PREFERENCE_ORDER.map((tag, i) => [tag, i]));

export function preferenceIndex(tag: TypeTag): number {
  return PREFERENCE_INDEX.get(tag) ?? PREFERENCE_ORDER.length;
}

// =============================================================================
// Groups
// =============================================================================

const GROUPS: Readonly<Record<TypeTag, CompatibilityGroup>> = {
  [TypeTag.Boolean]: CompatibilityGroup.Boolean,
  [TypeTag.Integer]: CompatibilityGroup.Numerical,
  [TypeTag.Decimal]: CompatibilityGroup.Numerical,
  [TypeTag.DateTime]: CompatibilityGroup.Temporal,
  [TypeTag.Duration]: CompatibilityGroup.Temporal,
  [TypeTag.String]: CompatibilityGroup.Textual,
};

export function groupOf(tag: TypeTag): CompatibilityGroup {
  return GROUPS[tag];
}

/**
 * Widening edges. Every value of the source type is representable by the
 * target; DateTime and Duration share a group but have no edge.
 */
const WIDENS_TO: ReadonlyMap<TypeTag, readonly TypeTag[]> = new Map([[TypeTag.Integer, [TypeTag.Decimal]]]);

/**
 * True when every value of `from` can be stored as `to` without loss.
 */
export function canWiden(from: TypeTag, to: TypeTag): boolean {
  if (from === to) return true;
  if (groupOf(from) !== groupOf(to)) return false;
  return WIDENS_TO.get(from)?.includes(to) ?? false;
}

// =============================================================================
// Merge resolution
// =============================================================================

/**
 * - `adopt`: nothing was estimated yet, take the incoming type
 * - `same`: the estimate already covers the incoming type
 * - `widen`: move the estimate to the wider incoming type
 * - `fallback`: no lossless common type, the estimate becomes String
 */
export type MergeKind = 'adopt' | 'same' | 'widen' | 'fallback';

export interface MergeResolution {
  readonly kind: MergeKind;
  readonly winner: TypeTag;
}

function resolutionsFor(kind: MergeKind): Readonly<Record<TypeTag, MergeResolution>> {
  const entry = (winner: TypeTag): MergeResolution => Object.freeze({ kind, winner });
  return {
    [TypeTag.Boolean]: entry(TypeTag.Boolean),
    [TypeTag.Integer]: entry(TypeTag.Integer),
    [TypeTag.Decimal]: entry(TypeTag.Decimal),
    [TypeTag.DateTime]: entry(TypeTag.DateTime),
    [TypeTag.Duration]: entry(TypeTag.Duration),
    [TypeTag.String]: entry(TypeTag.String),
  };
}

// One frozen resolution per kind and winner
const RESOLUTIONS: Readonly<Record<MergeKind, Readonly<Record<TypeTag, MergeResolution>>>> = {
  adopt: resolutionsFor('adopt'),
  same: resolutionsFor('same'),
  widen: resolutionsFor('widen'),
  fallback: resolutionsFor('fallback'),
};

function resolution(kind: MergeKind, winner: TypeTag): MergeResolution {
  return RESOLUTIONS[kind][winner];
}

/**
 * Decide how an estimate of `current` absorbs a value of type `incoming`.
 *
 * @example
 * ```typescript
 * resolveMerge(TypeTag.Integer, TypeTag.Decimal); // { kind: 'widen', winner: Decimal }
 * resolveMerge(TypeTag.Decimal, TypeTag.Integer); // { kind: 'same', winner: Decimal }
 * resolveMerge(TypeTag.Boolean, TypeTag.Integer); // { kind: 'fallback', winner: String }
 * ```
 */
export function resolveMerge(current: TypeTag | undefined, incoming: TypeTag): MergeResolution {
  if (current === undefined) return resolution('adopt', incoming);
  if (current === incoming) return resolution('same', current);
  if (current !== TypeTag.String && incoming !== TypeTag.String) {
    if (canWiden(incoming, current)) return resolution('same', current);
    if (canWiden(current, incoming)) return resolution('widen', incoming);
  }
  return resolution('fallback', TypeTag.String);
}
