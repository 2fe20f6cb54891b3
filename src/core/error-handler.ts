// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type DeckhandLogger} from './logging/deckhand-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';

@injectable()
export class ErrorHandler {
  public constructor(@inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  /**
   * Reports the error to the user
   * @returns the process exit code: 0 for user and silent breaks, 1 otherwise
   */
  public handle(error: unknown): number {
    const error_ = this.extractBreak(error);
    if (error_ instanceof UserBreak) {
      this.handleUserBreak(error_);
      return 0;
    }
    if (error_ instanceof SilentBreak) {
      this.handleSilentBreak(error_);
      return 0;
    }
    this.handleError(error);
    return 1;
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleSilentBreak(silentBreak: SilentBreak): void {
    this.logger.info(silentBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak or SilentBreak
   * @returns the break if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | SilentBreak | false {
    if (error instanceof UserBreak || error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
