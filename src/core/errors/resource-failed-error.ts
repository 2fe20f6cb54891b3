// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class ResourceFailedError extends DeckhandError {
  public constructor(
    public readonly resource: string,
    public readonly reason: string,
  ) {
    super(`${resource} failed: ${reason}`, {}, {resource, reason});
  }
}
