// SPDX-License-Identifier: Apache-2.0

import {type DeckhandLogger} from '../core/logging/deckhand-logger.js';
import {type CommandDefinition} from '../types/index.js';

export interface Options {
  logger: DeckhandLogger;
}

export abstract class BaseCommand {
  protected readonly logger: DeckhandLogger;

  protected constructor(options: Options) {
    this.logger = options.logger;
  }

  public abstract getCommandDefinition(): CommandDefinition;
}
