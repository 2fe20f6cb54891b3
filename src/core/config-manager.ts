// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {DeckhandError} from './errors/deckhand-error.js';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import {type DeckhandLogger} from './logging/deckhand-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag} from '../types/flag-types.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {NamespaceName} from '../integration/kube/resources/namespace/namespace-name.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {PathEx} from '../business/utils/path-ex.js';
import {getDeckhandVersion} from '../../version.js';

type FlagValue = string | number | boolean | NamespaceName;

interface Config {
  flags: Record<string, FlagValue | undefined>;
  version: string;
  updatedAt: string;
  lastCommand?: (string | number)[];
}

/**
 * ConfigManager holds the command flag values of the current command.
 *
 * Flag values given by the user take precedence over the flag defaults.
 */
@injectable()
export class ConfigManager {
  public config!: Config;

  public constructor(@inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);

    this.reset();
  }

  /** Reset config */
  public reset(): void {
    this.config = {
      flags: {},
      version: getDeckhandVersion(),
      updatedAt: new Date().toISOString(),
    };
  }

  /** Update the config using the argv */
  public update(argv: ArgvStruct): void {
    if (!argv || Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value = argv[flag.name];
      if (value === undefined) {
        continue;
      }

      switch (flag.definition.type) {
        case 'string': {
          if (value && flag.name === flags.manifestDirectory.name) {
            this.logger.debug(`Resolving directory path for '${flag.name}': ${String(value)}`);
            this.config.flags[flag.name] = PathEx.resolve(String(value));
          } else if (value && flag.name === flags.namespace.name) {
            // namespace flags are held as NamespaceName
            this.config.flags[flag.name] = value instanceof NamespaceName ? value : NamespaceName.of(String(value));
          } else {
            this.config.flags[flag.name] = `${String(value)}`; // force convert to string
          }
          break;
        }

        case 'number': {
          const number_ = flags.integerFlags.has(flag.name)
            ? Number.parseInt(String(value), 10)
            : Number.parseFloat(String(value));
          if (Number.isNaN(number_)) {
            throw new DeckhandError(`invalid number value '${String(value)}' for flag '${flag.name}'`);
          }
          this.config.flags[flag.name] = number_;
          break;
        }

        case 'boolean': {
          this.config.flags[flag.name] = value === true || value === 'true'; // use comparison to enforce boolean value
          break;
        }
      }
    }

    // store last command that was run
    if (argv._) {
      this.config.lastCommand = argv._;
    }

    this.config.updatedAt = new Date().toISOString();

    const flagMessage = Object.entries(this.config.flags)
      .filter(entries => entries[1] !== undefined && entries[1] !== null)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  /** Check if a flag value is set */
  public hasFlag(flag: CommandFlag): boolean {
    return this.config.flags[flag.name] !== undefined;
  }

  /**
   * Return the value of the given flag
   * @returns value of the flag or undefined if flag value is not available
   */
  public getFlag(flag: CommandFlag): FlagValue | undefined {
    return this.config.flags[flag.name];
  }

  public getStringFlag(flag: CommandFlag): string | undefined {
    const value = this.getFlag(flag);
    return value === undefined ? undefined : String(value);
  }

  public getBooleanFlag(flag: CommandFlag): boolean {
    return this.getFlag(flag) === true;
  }

  public getNumberFlag(flag: CommandFlag): number | undefined {
    const value = this.getFlag(flag);
    return typeof value === 'number' ? value : undefined;
  }

  public getNamespaceFlag(flag: CommandFlag): NamespaceName | undefined {
    const value = this.getFlag(flag);
    return value instanceof NamespaceName ? value : undefined;
  }

  /** Set value for the flag */
  public setFlag(flag: CommandFlag, value: unknown): void {
    if (!flag || !flag.name) {
      throw new MissingArgumentError('flag must have a name');
    }
    if (value === undefined || value === null) {
      this.config.flags[flag.name] = undefined;
      return;
    }
    // if it is a namespace then convert it to NamespaceName
    if (flag.name === flags.namespace.name) {
      this.config.flags[flag.name] = value instanceof NamespaceName ? value : NamespaceName.of(String(value));
      return;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      this.config.flags[flag.name] = value;
      return;
    }
    throw new DeckhandError(`unsupported value for flag '${flag.name}'`);
  }

  /** Get package version */
  public getVersion(): string {
    return this.config.version;
  }
}
