// SPDX-License-Identifier: Apache-2.0

export class Comparators {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  /** Compares by UTF-16 code units, independent of the current locale */
  public static readonly string = (l: string, r: string): number => {
    if (l < r) {
      return -1;
    } else if (l > r) {
      return 1;
    }

    return 0;
  };
}
