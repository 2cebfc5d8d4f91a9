// SPDX-License-Identifier: Apache-2.0

import {ChartCommand} from './chart.js';
import {ReleaseCommand} from './release.js';
import {ConfigCommand} from './config.js';
import {ContextCommand} from './context.js';
import {type BaseCommand} from './base.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Creates the fleetgen commands, resolving their collaborators from the container
 */
export function createCommands(): BaseCommand[] {
  return [new ChartCommand(), new ReleaseCommand(), new ConfigCommand(), new ContextCommand()];
}

/**
 * Returns an array of Yargs command definitions
 */
export function Initialize(commands: BaseCommand[] = createCommands()): CommandDefinition[] {
  return commands.map(command => command.getCommandDefinition());
}
