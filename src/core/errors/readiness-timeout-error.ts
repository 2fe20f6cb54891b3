// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class ReadinessTimeoutError extends DeckhandError {
  /**
   * @param pending - resource keys that were not ready when the attempt budget ran out
   * @param attempts - the number of polls made
   */
  public constructor(
    public readonly pending: string[],
    attempts: number,
  ) {
    super(`resources not ready after ${attempts} attempts: ${pending.join(', ')}`, {}, {pending, attempts});
  }
}
