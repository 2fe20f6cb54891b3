// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class DataValidationError extends DeckhandError {
  /**
   * Create a custom error for data validation error scenario
   *
   * error metadata will include `expected` and `found` values.
   *
   * @param message - error message
   * @param expected - expected value
   * @param found - value found
   * @param [cause] - source error (if any)
   */
  public constructor(message: string, expected: unknown, found: unknown, cause: unknown = {}) {
    super(message, cause, {expected, found});
  }
}
