// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class ManifestLoadError extends DeckhandError {
  /**
   * Raised when a manifest file cannot be read, parsed or validated
   *
   * error metadata will include `source`
   *
   * @param message - error message
   * @param source - the file (and document index, if known) that failed
   * @param cause - source error (if any)
   */
  public constructor(message: string, source: string, cause: unknown = {}) {
    super(`${source}: ${message}`, cause, {source});
  }
}
