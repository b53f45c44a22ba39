import { Duration } from '../duration.js';
import { ParseFailureError } from '../errors.js';
import { growLength, type Size } from '../size.js';
import { CompatibilityGroup, TypeTag, type ScalarValue } from '../types.js';
import { BaseDecider } from './decider.js';
import { fractionToMilliseconds } from './date-formats.js';

// [-][d.]hh:mm[:ss[.fffffff]]
const CLOCK = /^(-)?(?:(\d+)\.)?(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?$/;
// ISO 8601: P3D, PT1H30M, P1DT2.5S
const ISO = /^(-)?P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * Read elapsed-time text as a Duration.
 */
export function readDuration(text: string): Duration | undefined {
  const clock = CLOCK.exec(text);
  if (clock) {
    const hours = Number(clock[3]);
    const minutes = Number(clock[4]);
    const seconds = clock[5] === undefined ? 0 : Number(clock[5]);
    if (hours > 23 || minutes > 59 || seconds > 59) return undefined;
    return Duration.fromParts({
      negative: clock[1] === '-',
      days: clock[2] === undefined ? 0 : Number(clock[2]),
      hours,
      minutes,
      seconds,
      milliseconds: clock[6] === undefined ? 0 : fractionToMilliseconds(clock[6]),
    });
  }

  const iso = ISO.exec(text);
  // "P" and "PT" alone carry no component
  if (iso && !text.endsWith('P') && !text.endsWith('T')) {
    const seconds = iso[5] === undefined ? 0 : Number(iso[5]);
    return Duration.fromParts({
      negative: iso[1] === '-',
      days: iso[2] === undefined ? 0 : Number(iso[2]),
      hours: iso[3] === undefined ? 0 : Number(iso[3]),
      minutes: iso[4] === undefined ? 0 : Number(iso[4]),
      milliseconds: Math.round(seconds * 1000),
    });
  }

  return undefined;
}

export class DurationDecider extends BaseDecider<Duration> {
  constructor() {
    super(TypeTag.Duration, CompatibilityGroup.Temporal, ['duration']);
  }

  protected override acceptTrimmed(text: string, size: Size): Size | undefined {
    return readDuration(text) === undefined ? undefined : size;
  }

  protected override parseTrimmed(text: string): Duration {
    const duration = readDuration(text);
    if (!duration) throw ParseFailureError.forValue(text, this.typeTag);
    return duration;
  }

  override measureScalar(value: ScalarValue, size: Size): Size {
    return value instanceof Duration ? growLength(size, value.toString().length) : size;
  }
}
