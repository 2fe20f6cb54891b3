// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class UnresolvedReferenceError extends DeckhandError {
  /**
   * @param references - `dependent -> reference` pairs that point outside the manifest set
   */
  public constructor(public readonly references: string[]) {
    super(`references to resources outside the manifest set: ${references.join(', ')}`, {}, {references});
  }
}
