// SPDX-License-Identifier: Apache-2.0

import {ListrInquirerPromptAdapter} from '@listr2/prompt-adapter-inquirer';
import {confirm as confirmPrompt} from '@inquirer/prompts';
import * as constants from '../core/constants.js';
import {type CommandFlag, type Definition, type PromptingCommandFlag} from '../types/flag-types.js';
import {type AnyYargs} from '../types/aliases.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {...Flags.yargsOptions(flag.definition), demandOption: true});
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      y.option(flag.name, {
        ...Flags.yargsOptions(flag.definition),
        default: defaultValue,
      });
    }
  }

  private static yargsOptions(definition: Definition): {describe: string; alias?: string; type: Definition['type']} {
    return {describe: definition.describe, alias: definition.alias, type: definition.type};
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly manifestDirectory: CommandFlag = {
    constName: 'manifestDirectory',
    name: 'dir',
    definition: {
      describe: 'Directory holding the manifest files (.yaml, .yml, .json)',
      alias: 'd',
      type: 'string',
    },
  };

  public static readonly namespace: CommandFlag = {
    constName: 'namespace',
    name: 'namespace',
    definition: {
      describe: 'Namespace given to manifests that do not declare one',
      alias: 'n',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    constName: 'context',
    name: 'context',
    definition: {
      describe: 'The Kubernetes context name to be used, the current context when omitted',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly recursive: CommandFlag = {
    constName: 'recursive',
    name: 'recursive',
    definition: {
      describe: 'Read manifests from sub-directories as well',
      defaultValue: false,
      alias: 'R',
      type: 'boolean',
    },
  };

  public static readonly strict: CommandFlag = {
    constName: 'strict',
    name: 'strict',
    definition: {
      describe: 'Fail when a manifest refers to a resource that is not part of the manifest set',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly dryRun: CommandFlag = {
    constName: 'dryRun',
    name: 'dry-run',
    definition: {
      describe: 'Send every write with the server-side dry run flag',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly continueOnError: CommandFlag = {
    constName: 'continueOnError',
    name: 'continue-on-error',
    definition: {
      describe: 'Keep going after a manifest fails',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly wait: CommandFlag = {
    constName: 'wait',
    name: 'wait',
    definition: {
      describe: 'Wait for the applied resources to become ready',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly maxAttempts: CommandFlag = {
    constName: 'maxAttempts',
    name: 'max-attempts',
    definition: {
      describe: 'Number of readiness polls before giving up',
      defaultValue: constants.POLL_MAX_ATTEMPTS,
      type: 'number',
    },
  };

  public static readonly pollInterval: CommandFlag = {
    constName: 'pollInterval',
    name: 'poll-interval',
    definition: {
      describe: 'Milliseconds between readiness polls',
      defaultValue: constants.POLL_DELAY,
      type: 'number',
    },
  };

  public static readonly includeNamespaces: CommandFlag = {
    constName: 'includeNamespaces',
    name: 'include-namespaces',
    definition: {
      describe: 'Also delete the Namespace manifests of the set',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly diff: CommandFlag = {
    constName: 'diff',
    name: 'diff',
    definition: {
      describe: 'Compare the plan with the cluster',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly force: PromptingCommandFlag = {
    constName: 'force',
    name: 'force',
    definition: {
      describe: 'Skip the confirmation prompt',
      defaultValue: false,
      alias: 'f',
      type: 'boolean',
    },
    prompt: async (task, message) => {
      return task.prompt(ListrInquirerPromptAdapter).run(confirmPrompt, {default: false, message});
    },
  };

  public static readonly quiet: CommandFlag = {
    constName: 'quiet',
    name: 'quiet',
    definition: {
      describe: 'Quiet mode, do not prompt for confirmation',
      defaultValue: false,
      alias: 'q',
      type: 'boolean',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.continueOnError,
    Flags.context,
    Flags.devMode,
    Flags.diff,
    Flags.dryRun,
    Flags.force,
    Flags.includeNamespaces,
    Flags.manifestDirectory,
    Flags.maxAttempts,
    Flags.namespace,
    Flags.pollInterval,
    Flags.quiet,
    Flags.recursive,
    Flags.strict,
    Flags.wait,
  ];

  public static readonly allFlagsMap = new Map(Flags.allFlags.map(f => [f.name, f]));

  public static readonly integerFlags = new Map([Flags.maxAttempts, Flags.pollInterval].map(f => [f.name, f]));

  /**
   * Processes the Argv arguments and returns them as string, all with full flag names.
   * - removes flags that match the default value.
   * - removes flags with undefined and null values.
   * - removes boolean flags that are false.
   */
  public static stringifyArgv(argv: Record<string, unknown>): string {
    const processedFlags: string[] = [];

    for (const [name, value] of Object.entries(argv)) {
      // Remove non-flag data and boolean presence based flags that are false
      if (name === '_' || name === '$0' || value === '' || value === false || value === undefined || value === null) {
        continue;
      }

      // remove flags that use the default value
      const flag = Flags.allFlagsMap.get(name);
      if (!flag || (flag.definition.defaultValue && flag.definition.defaultValue === value)) {
        continue;
      }

      if (value === true) {
        processedFlags.push(`--${flag.name}`);
      } else {
        processedFlags.push(`--${flag.name} ${String(value)}`);
      }
    }

    return processedFlags.join(' ');
  }
}
