// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {Time} from './time.js';

/**
 * A time-based amount of time, such as '30 seconds', held with millisecond resolution.
 *
 * This is a value-based class; use `equals` for comparisons.
 */
export class Duration {
  /**
   * A constant for a duration of zero.
   */
  public static readonly ZERO = new Duration(0);

  private constructor(private readonly millis: number) {
    if (!Number.isFinite(millis)) {
      throw new IllegalArgumentError('duration must be a finite number of milliseconds', millis);
    }
  }

  public static ofMillis(millis: number): Duration {
    return new Duration(Math.trunc(millis));
  }

  public static ofSeconds(seconds: number): Duration {
    return new Duration(Math.trunc(seconds * Time.MILLIS_PER_SECOND));
  }

  public static ofMinutes(minutes: number): Duration {
    return Duration.ofSeconds(minutes * Time.SECONDS_PER_MINUTE);
  }

  public static ofHours(hours: number): Duration {
    return Duration.ofSeconds(hours * Time.SECONDS_PER_HOUR);
  }

  /**
   * Obtains the duration between two instants; negative when `end` is before `start`.
   */
  public static between(start: Date, end: Date): Duration {
    return new Duration(end.getTime() - start.getTime());
  }

  public isNegative(): boolean {
    return this.millis < 0;
  }

  public toMillis(): number {
    return this.millis;
  }

  public toSeconds(): number {
    return Math.trunc(this.millis / Time.MILLIS_PER_SECOND);
  }

  public compareTo(other: Duration): number {
    return Math.sign(this.millis - other.millis);
  }

  public equals(other: Duration): boolean {
    return this.millis === other.millis;
  }

  public toString(): string {
    return `PT${this.millis / Time.MILLIS_PER_SECOND}S`;
  }
}
