// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type FleetLogger} from './logging/fleet-logger.js';
import {type ArgvStruct} from '../types/aliases.js';

@injectable()
export class Middlewares {
  private readonly logger: FleetLogger;

  public constructor(@inject(InjectTokens.FleetLogger) logger?: FleetLogger) {
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): (argv: ArgvStruct) => ArgvStruct {
    const logger = this.logger;

    /**
     * @param argv - yargs argv
     */
    return (argv: ArgvStruct): ArgvStruct => {
      if (flags.getBoolean(argv, flags.devMode)) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }

      return argv;
    };
  }

  /**
   * Starts a new trace id for every command invocation and logs the command line
   */
  public traceCommand(): (argv: ArgvStruct) => ArgvStruct {
    const logger = this.logger;

    return (argv: ArgvStruct): ArgvStruct => {
      logger.nextTraceId();
      logger.debug(`Processing command: ${argv._.join(' ')}`);
      return argv;
    };
  }
}
