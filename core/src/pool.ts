/**
 * Guesser Pool
 *
 * Keeps released guessers for reuse so a loader inferring many columns does
 * not allocate a fresh guesser per column.
 *
 * Contract:
 * - acquire() never resets: an instance leaves the pool exactly as release()
 *   left it, which is empty with the pool's default settings
 * - release() resets state and restores default settings before retaining
 * - at most `maxRetained` idle instances are kept; extras are dropped
 *
 * JavaScript runs acquire() and release() to completion without
 * interleaving, so a checkout can never hand one instance to two callers.
 *
 * @example
 * ```typescript
 * const pool = new GuesserPool({ maxRetained: 8 });
 *
 * const type = pool.withGuesser(guesser => {
 *   guesser.adjustToCompensateForValues(column);
 *   return guesser.guess;
 * });
 * ```
 *
 * @module pool
 */

import { DEFAULT_POOL_MAX_RETAINED } from './constants.js';
import type { DeciderRegistry } from './deciders/registry.js';
import { ValidationError } from './errors.js';
import { Guesser } from './guesser.js';
import { createNoopLogger, type Logger } from './logging.js';
import { copyGuessSettings, createGuessSettings, type GuessSettings } from './settings.js';

export interface GuesserPoolOptions {
  /** Idle instances kept for reuse (default: DEFAULT_POOL_MAX_RETAINED) */
  maxRetained?: number;
  /** Settings every guesser starts from and is restored to on release */
  settings?: Partial<GuessSettings>;
  /** Passed to every guesser the pool creates */
  logger?: Logger;
  registry?: DeciderRegistry;
}

export interface GuesserPoolStats {
  /** Guessers constructed by this pool */
  created: number;
  /** Acquisitions served from idle instances */
  reused: number;
  /** Idle instances currently held */
  retained: number;
  maxRetained: number;
}

export class GuesserPool {
  private readonly idle: Guesser[] = [];
  private readonly idleSet = new Set<Guesser>();
  private readonly owned = new WeakSet<Guesser>();
  private readonly defaults: GuessSettings;
  private readonly logger: Logger;
  private readonly registry?: DeciderRegistry;
  private readonly _maxRetained: number;

  // Statistics
  private _created = 0;
  private _reused = 0;

  /**
   * @throws ValidationError if maxRetained is not a non-negative integer
   */
  constructor(options: GuesserPoolOptions = {}) {
    const maxRetained = options.maxRetained ?? DEFAULT_POOL_MAX_RETAINED;
    if (!Number.isInteger(maxRetained) || maxRetained < 0) {
      throw new ValidationError(
        `maxRetained must be a non-negative integer, got ${maxRetained}`,
        undefined,
        { maxRetained }
      );
    }
    this._maxRetained = maxRetained;
    this.defaults = createGuessSettings(options.settings);
    this.logger = options.logger ?? createNoopLogger();
    this.registry = options.registry;
  }

  /**
   * Check out a guesser. It is empty and carries the pool's default settings
   * with `overrides` applied.
   */
  acquire(overrides?: Partial<GuessSettings>): Guesser {
    const guesser = this.idle.pop();

    if (guesser) {
      this.idleSet.delete(guesser);
      this._reused++;
      if (overrides) {
        copyGuessSettings(createGuessSettings({ ...this.defaults, ...overrides }), guesser.settings);
      }
      return guesser;
    }

    const created = new Guesser({
      settings: { ...this.defaults, ...overrides },
      logger: this.logger,
      registry: this.registry,
    });
    this.owned.add(created);
    this._created++;
    return created;
  }

  /**
   * Return a guesser. Releasing an instance that is already idle does nothing.
   *
   * @throws ValidationError for a guesser this pool did not create
   */
  release(guesser: Guesser): void {
    if (!this.owned.has(guesser)) {
      throw new ValidationError(
        'Cannot release a guesser that was not acquired from this pool',
        undefined,
        undefined,
        'Release each guesser to the pool that handed it out'
      );
    }
    if (this.idleSet.has(guesser)) {
      return;
    }

    guesser.reset();
    copyGuessSettings(this.defaults, guesser.settings);

    if (this.idle.length < this._maxRetained) {
      this.idle.push(guesser);
      this.idleSet.add(guesser);
    } else {
      this.logger.debug('Guesser pool full, dropping released guesser', { retained: this.idle.length });
    }
  }

  /**
   * Run `fn` with a pooled guesser and release it afterwards, also when
   * `fn` throws.
   */
  withGuesser<T>(fn: (guesser: Guesser) => T, overrides?: Partial<GuessSettings>): T {
    const guesser = this.acquire(overrides);
    try {
      return fn(guesser);
    } finally {
      this.release(guesser);
    }
  }

  /** Drop every idle instance */
  clear(): void {
    this.idle.length = 0;
    this.idleSet.clear();
  }

  get stats(): GuesserPoolStats {
    return {
      created: this._created,
      reused: this._reused,
      retained: this.idle.length,
      maxRetained: this._maxRetained,
    };
  }
}
