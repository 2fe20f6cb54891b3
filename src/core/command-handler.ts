// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions} from 'listr2';
import fs from 'node:fs';
import {type DeckhandLogger} from './logging/deckhand-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {DeckhandError} from './errors/deckhand-error.js';
import * as constants from './constants.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type DeckhandListrTask} from '../types/index.js';

@injectable()
export class CommandHandler {
  public constructor(@inject(InjectTokens.DeckhandLogger) public readonly logger: DeckhandLogger) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  /**
   * Runs the tasks of a command in one listr2 task list.
   * @param errorString - prefix of the error message if a task fails
   */
  public async commandAction<T extends object>(
    context_: T,
    actionTasks: DeckhandListrTask<T>[],
    options: ListrBaseClassOptions<T>,
    errorString: string,
  ): Promise<T> {
    const tasks = new Listr<T>([...actionTasks], {...options, ctx: context_});
    try {
      return await tasks.run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeckhandError(`${errorString}: ${message}`, error);
    }
  }

  /**
   * Setup home directories
   * @param directories a list of directories that need to be created in sequence
   */
  public setupHomeDirectory(directories: string[] = [constants.DECKHAND_HOME_DIR, constants.DECKHAND_LOGS_DIR]): string[] {
    try {
      for (const directoryPath of directories) {
        if (!fs.existsSync(directoryPath)) {
          fs.mkdirSync(directoryPath, {recursive: true});
        }
        this.logger.debug(`OK: setup directory: ${directoryPath}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeckhandError(`failed to create directory: ${message}`, error);
    }

    return directories;
  }

  public setupHomeDirectoryTask<T extends object>(): DeckhandListrTask<T> {
    return {
      title: 'Setup home directory',
      task: async () => {
        this.setupHomeDirectory();
      },
    };
  }
}
