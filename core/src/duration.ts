/**
 * Elapsed-time scalar.
 *
 * A plain number cannot be told apart from an integer column, so hard-typed
 * durations travel as instances of this class.
 */

import { ValidationError } from './errors.js';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface DurationParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
  negative?: boolean;
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

export class Duration {
  readonly totalMilliseconds: number;

  constructor(totalMilliseconds: number) {
    if (!Number.isFinite(totalMilliseconds)) {
      throw new ValidationError(
        `Duration must be a finite number of milliseconds, got ${totalMilliseconds}`
      );
    }
    // normalise -0 so equals() and toString() agree
    this.totalMilliseconds = totalMilliseconds === 0 ? 0 : totalMilliseconds;
  }

  static fromParts(parts: DurationParts): Duration {
    const magnitude =
      (parts.days ?? 0) * MS_PER_DAY +
      (parts.hours ?? 0) * MS_PER_HOUR +
      (parts.minutes ?? 0) * MS_PER_MINUTE +
      (parts.seconds ?? 0) * MS_PER_SECOND +
      (parts.milliseconds ?? 0);
    return new Duration(parts.negative ? -magnitude : magnitude);
  }

  get isNegative(): boolean {
    return this.totalMilliseconds < 0;
  }

  get days(): number {
    return Math.floor(Math.abs(this.totalMilliseconds) / MS_PER_DAY);
  }

  get hours(): number {
    return Math.floor((Math.abs(this.totalMilliseconds) % MS_PER_DAY) / MS_PER_HOUR);
  }

  get minutes(): number {
    return Math.floor((Math.abs(this.totalMilliseconds) % MS_PER_HOUR) / MS_PER_MINUTE);
  }

  get seconds(): number {
    return Math.floor((Math.abs(this.totalMilliseconds) % MS_PER_MINUTE) / MS_PER_SECOND);
  }

  get milliseconds(): number {
    return Math.abs(this.totalMilliseconds) % MS_PER_SECOND;
  }

  equals(other: Duration): boolean {
    return this.totalMilliseconds === other.totalMilliseconds;
  }

  /**
   * Canonical rendering: `[-][d.]hh:mm:ss[.fff]`
   */
  toString(): string {
    const sign = this.isNegative ? '-' : '';
    const days = this.days > 0 ? `${this.days}.` : '';
    const ms = Math.floor(this.milliseconds);
    const fraction = ms > 0 ? `.${String(ms).padStart(3, '0')}` : '';
    return `${sign}${days}${pad2(this.hours)}:${pad2(this.minutes)}:${pad2(this.seconds)}${fraction}`;
  }
}
