// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * A non-negative amount of time with millisecond resolution, such as '1.5 seconds'.
 *
 * This is a value-based class; use {@link Duration.equals} for comparisons.
 */
export class Duration {
  public static readonly MILLIS_PER_SECOND = 1000;
  public static readonly SECONDS_PER_MINUTE = 60;

  /**
   * A constant for a duration of zero.
   */
  public static readonly ZERO = new Duration(0);

  private constructor(private readonly millis: number) {
    if (!Number.isFinite(millis) || millis < 0) {
      throw new IllegalArgumentError('duration must be a finite, non-negative number of milliseconds', millis);
    }
  }

  public static ofMillis(millis: number): Duration {
    return millis === 0 ? Duration.ZERO : new Duration(millis);
  }

  public static ofSeconds(seconds: number): Duration {
    return Duration.ofMillis(seconds * Duration.MILLIS_PER_SECOND);
  }

  public isZero(): boolean {
    return this.millis === 0;
  }

  public toMillis(): number {
    return this.millis;
  }

  public equals(other: Duration): boolean {
    return other instanceof Duration && this.millis === other.millis;
  }

  /**
   * A short representation such as `500ms`, `3s` or `2m30s`.
   */
  public toString(): string {
    if (this.millis < Duration.MILLIS_PER_SECOND) {
      return `${this.millis}ms`;
    }

    const totalSeconds = this.millis / Duration.MILLIS_PER_SECOND;
    const minutes = Math.floor(totalSeconds / Duration.SECONDS_PER_MINUTE);
    const seconds = totalSeconds - minutes * Duration.SECONDS_PER_MINUTE;
    return minutes > 0 ? `${minutes}m${seconds}s` : `${seconds}s`;
  }
}
