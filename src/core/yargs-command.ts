// SPDX-License-Identifier: Apache-2.0

import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {FleetError} from './errors/fleet-error.js';
import {type BaseCommand} from '../commands/base.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type CommandDefinition} from '../types/index.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export type CommandHandler = (argv: ArgvStruct) => Promise<boolean>;

export interface YargsCommandOptions {
  command: string;
  description: string;
  commandDef: BaseCommand;
  handler: CommandHandler;
}

export class YargsCommand {
  /**
   * Builds the yargs definition of a subcommand whose handler reports success by resolving to true.
   */
  public static of(options: YargsCommandOptions, flags: CommandFlags): CommandDefinition {
    const {command, description, commandDef, handler} = options;
    const {required, optional} = flags;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }

    const commandPath = `${commandDef.getCommandName()} ${command}`;

    return {
      command,
      describe: description,
      builder: (y: AnyYargs): AnyYargs => {
        commandFlags.setRequiredCommandFlags(y, ...required);
        commandFlags.setOptionalCommandFlags(y, ...optional);
        return y;
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        commandDef.logger.info(`==== Running '${commandPath}' ===`);
        commandDef.logger.debug(`argv: ${JSON.stringify(argv)}`);

        let result: boolean;
        try {
          result = await handler(argv);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new FleetError(`${commandPath} failed: ${message}`, error);
        }

        if (!result) {
          throw new FleetError(`${commandPath} failed, expected returned value to be true`);
        }
        commandDef.logger.info(`==== Finished running '${commandPath}' ====`);
      },
    };
  }
}
