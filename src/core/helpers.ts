// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';
import {DeckhandError} from './errors/deckhand-error.js';

export function sleep(duration: Duration): Promise<void> {
  return new Promise<void>(resolve => {
    setTimeout(resolve, duration.toMillis());
  });
}

export function splitFlagInput(input: unknown, separator = ','): string[] {
  if (!input) {
    return [];
  } else if (typeof input !== 'string') {
    throw new DeckhandError(`input [input='${String(input)}'] is not a comma separated string`);
  }

  return input
    .split(separator)
    .map(s => s.trim())
    .filter(Boolean);
}
