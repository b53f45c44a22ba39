/**
 * Decider registry: the fixed, ordered set of deciders a guesser consults.
 *
 * Deciders are kept in preference order (most specific first) so a raw
 * string is tried against Boolean before Integer, and so on down to String.
 * Already-typed values skip the scan and resolve their decider by kind.
 */

import { preferenceIndex } from '../compatibility.js';
import { InvalidDeciderConfigurationError, UnsupportedTypeError } from '../errors.js';
import { TypeTag, type ValueKind } from '../types.js';
import { BooleanDecider } from './boolean.js';
import { DateTimeDecider } from './date-time.js';
import { DecimalDecider } from './decimal.js';
import type { TypeDecider } from './decider.js';
import { DurationDecider } from './duration.js';
import { IntegerDecider } from './integer.js';
import { StringDecider } from './string.js';

export class DeciderRegistry implements Iterable<TypeDecider> {
  /** Deciders in preference order, String last */
  readonly deciders: readonly TypeDecider[];
  private readonly byTag = new Map<TypeTag, TypeDecider>();
  private readonly byKind = new Map<ValueKind, TypeDecider>();

  constructor(deciders: Iterable<TypeDecider>) {
    const sorted = [...deciders].sort((a, b) => preferenceIndex(a.typeTag) - preferenceIndex(b.typeTag));

    for (const decider of sorted) {
      if (decider.scalarKinds.length === 0) {
        throw InvalidDeciderConfigurationError.noSupportedKinds(decider.typeTag);
      }
      if (this.byTag.has(decider.typeTag)) {
        throw InvalidDeciderConfigurationError.duplicate(decider.typeTag);
      }
      this.byTag.set(decider.typeTag, decider);

      for (const kind of decider.scalarKinds) {
        if (this.byKind.has(kind)) {
          throw InvalidDeciderConfigurationError.duplicate(kind);
        }
        this.byKind.set(kind, decider);
      }
    }

    if (!this.byTag.has(TypeTag.String)) {
      throw InvalidDeciderConfigurationError.missingFallback();
    }

    this.deciders = Object.freeze(sorted);
  }

  /**
   * @throws UnsupportedTypeError when no decider is registered for `typeTag`
   */
  get(typeTag: TypeTag): TypeDecider {
    const decider = this.byTag.get(typeTag);
    if (!decider) {
      throw UnsupportedTypeError.forTypeTag(typeTag);
    }
    return decider;
  }

  has(typeTag: TypeTag): boolean {
    return this.byTag.has(typeTag);
  }

  /** The decider claiming `kind`, if any */
  forKind(kind: ValueKind): TypeDecider | undefined {
    return this.byKind.get(kind);
  }

  [Symbol.iterator](): Iterator<TypeDecider> {
    return this.deciders[Symbol.iterator]();
  }
}

export function createDefaultDeciders(): TypeDecider[] {
  return [
    new BooleanDecider(),
    new IntegerDecider(),
    new DecimalDecider(),
    new DateTimeDecider(),
    new DurationDecider(),
    new StringDecider(),
  ];
}

let defaultRegistry: DeciderRegistry | undefined;

/**
 * Shared registry of the built-in deciders. Deciders are stateless, so one
 * instance serves every guesser.
 */
export function getDefaultRegistry(): DeciderRegistry {
  if (!defaultRegistry) {
    const registry = new DeciderRegistry(createDefaultDeciders());
    Object.freeze(registry);
    defaultRegistry = registry;
  }
  return defaultRegistry;
}
