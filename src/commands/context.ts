// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';
import {YargsCommand} from '../core/yargs-command.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {FleetError} from '../core/errors/fleet-error.js';
import {type FleetLogger} from '../core/logging/fleet-logger.js';
import {type LocalConfig} from '../core/config/local/local-config.js';
import {type ClusterContext, type ClusterContextManager} from '../core/config/cluster-context-manager.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Shows and changes the Rancher cluster context and the storage roots kept in the local settings
 */
export class ContextCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'context';

  private readonly localConfig: LocalConfig;
  private readonly contextManager: ClusterContextManager;

  public constructor(
    @inject(InjectTokens.LocalConfig) localConfig?: LocalConfig,
    @inject(InjectTokens.ClusterContextManager) contextManager?: ClusterContextManager,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    super(logger);
    this.localConfig = patchInject(localConfig, InjectTokens.LocalConfig, this.constructor.name);
    this.contextManager = patchInject(contextManager, InjectTokens.ClusterContextManager, this.constructor.name);
  }

  public getCommandName(): string {
    return ContextCommand.COMMAND_NAME;
  }

  public async show(): Promise<boolean> {
    const context = await this.contextManager.current();
    this.showContext(context);
    return true;
  }

  public async detect(): Promise<boolean> {
    const context = await this.contextManager.detect();
    if (!context) {
      throw new FleetError('Could not read the current Rancher context, is the rancher CLI logged in?');
    }
    await this.contextManager.set(context);
    this.showContext(context);
    return true;
  }

  public async set(argv: ArgvStruct): Promise<boolean> {
    const stored = this.localConfig.clusterContext;
    const context: ClusterContext = {
      context: flags.getString(argv, flags.context) ?? stored.context,
      clusterId: flags.getString(argv, flags.clusterId) ?? stored.clusterId,
      clusterName: flags.getString(argv, flags.clusterName) ?? stored.clusterName,
    };
    const appsDirectory = flags.getString(argv, flags.appsDir);
    const intDirectory = flags.getString(argv, flags.intDir);

    await this.localConfig.modify(async data => {
      data.clusterContext = {...context};
      if (appsDirectory) {
        data.appsDir = appsDirectory;
      }
      if (intDirectory) {
        data.intDir = intDirectory;
      }
    });
    this.showContext(context);
    return true;
  }

  private showContext(context: ClusterContext): void {
    this.logger.showJSON('Cluster context', {
      ...context,
      appsDir: this.localConfig.appsDir,
      intDir: this.localConfig.intDir,
    });
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: ContextCommand.COMMAND_NAME,
      describe: 'Manage the Rancher cluster context and the output directories',
      builder: (yargs: AnyYargs): AnyYargs =>
        yargs
          .command(
            YargsCommand.of(
              {
                command: 'show',
                description: 'Show the stored context, detecting it when none is stored',
                commandDef: this,
                handler: () => this.show(),
              },
              {required: [], optional: []},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'detect',
                description: 'Read the current context from the rancher CLI and store it',
                commandDef: this,
                handler: () => this.detect(),
              },
              {required: [], optional: []},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'set',
                description: 'Store the context and output directories given as flags',
                commandDef: this,
                handler: argv => this.set(argv),
              },
              {
                required: [],
                optional: [flags.context, flags.clusterId, flags.clusterName, flags.appsDir, flags.intDir],
              },
            ),
          )
          .demandCommand(1, 'Select a context command'),
    };
  }
}
