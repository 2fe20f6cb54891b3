// SPDX-License-Identifier: Apache-2.0

import {DeckhandError} from './deckhand-error.js';

export class DependencyCycleError extends DeckhandError {
  public static DEPENDENCY_CYCLE = (cycle: string[]) => `dependency cycle detected: ${cycle.join(' -> ')}`;

  /**
   * @param cycle - resource keys on the cycle, with the first key repeated at the end
   */
  public constructor(public readonly cycle: string[]) {
    super(DependencyCycleError.DEPENDENCY_CYCLE(cycle), {}, {cycle});
  }
}
