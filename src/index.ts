// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import {type FleetLogger} from './core/logging/fleet-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {Middlewares} from './core/middlewares.js';
import {FleetError} from './core/errors/fleet-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {SilentBreak} from './core/errors/silent-break.js';
import {getFleetgenVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: FleetLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Error initializing container: ${reason}`, error);
    throw new FleetError('Error initializing container', error);
  }

  const logger = container.resolve<FleetLogger>(InjectTokens.FleetLogger);

  if (context) {
    // save the logger so that fleetgen.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new FleetError(`Unhandled Rejection, reason: ${String(reason)}`, reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new FleetError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing fleetgen CLI');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n***************************** fleetgen *******************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getFleetgenVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = new Middlewares();

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('fleetgen')
    .usage('Usage:\n  fleetgen <command> [options]')
    .alias('h', 'help')
    .alias('v', 'version');

  for (const definition of commands.Initialize()) {
    rootCmd.command(definition);
  }

  rootCmd
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [middlewares.setLoggerDevFlag(), middlewares.traceCommand()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  rootCmd.fail((message, error) => {
    if (message) {
      if (message.includes('Unknown argument')) {
        logger.showUser(message);
        rootCmd.showHelp();
      } else {
        logger.showUserError(new FleetError(`Error running fleetgen CLI, failure occurred: ${message}`));
      }
      process.exitCode = 1;
      throw new SilentBreak(message);
    }
    throw error;
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setCommandFlags(rootCmd, flags.devMode);
  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
