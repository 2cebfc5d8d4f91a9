// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type Duration} from '../../core/time/duration.js';
import * as constants from '../../core/constants.js';
import {type CommandResult, type CommandRunner} from '../command/command-runner.js';
import {parseJsonLines} from '../../business/utils/records.js';
import {RancherContext} from './model/rancher-context.js';
import {ClusterEntry} from './model/cluster-entry.js';
import {namespaceName} from './model/namespace-entry.js';

/**
 * Wraps the rancher CLI. The CLI must already be logged in; every call uses its current context.
 */
@injectable()
export class RancherClient {
  private readonly runner: CommandRunner;
  private readonly timeout: Duration;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.CommandRunner) runner?: CommandRunner,
    @inject(InjectTokens.CommandTimeout) timeout?: Duration,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.runner = patchInject(runner, InjectTokens.CommandRunner, this.constructor.name);
    this.timeout = patchInject(timeout, InjectTokens.CommandTimeout, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public async currentContext(): Promise<RancherContext | undefined> {
    const result = await this.run('context', 'current');
    if (!result.ok) {
      this.logger.debug(`Failed to get current rancher context: ${result.output}`);
      return undefined;
    }
    const context = RancherContext.parse(result.output);
    if (!context) {
      this.logger.debug(`Could not parse cluster and project from: ${result.output}`);
    }
    return context;
  }

  public async listClusters(): Promise<ClusterEntry[]> {
    const result = await this.run('cluster', 'ls', '--format', 'json');
    if (!result.ok) {
      this.logger.debug(`Failed to get cluster list: ${result.output}`);
      return [];
    }
    return parseJsonLines(result.output)
      .map(line => ClusterEntry.fromJson(line))
      .filter((entry): entry is ClusterEntry => entry !== undefined);
  }

  public async listNamespaces(): Promise<string[]> {
    const result = await this.run('namespaces', 'ls', '--format', 'json');
    if (!result.ok || !result.output.trim()) {
      return [];
    }
    const names: string[] = [];
    for (const line of parseJsonLines(result.output)) {
      const name = namespaceName(line);
      if (name) {
        names.push(name);
      }
    }
    this.logger.debug(`Found ${names.length} namespaces via rancher`);
    return names;
  }

  /**
   * Fetches a secret as a JSON document through the rancher kubectl proxy.
   */
  public async getSecret(name: string, namespace: string): Promise<CommandResult> {
    return this.run('kubectl', 'get', 'secret', name, '-n', namespace, '-o', 'json');
  }

  /**
   * Prints the kubeconfig of the current context, credentials included.
   */
  public async viewRawKubeConfig(): Promise<CommandResult> {
    return this.run('kubectl', 'config', 'view', '--raw');
  }

  public async applyManifest(filePath: string): Promise<CommandResult> {
    return this.run('kubectl', 'apply', '-f', filePath);
  }

  private async run(...arguments_: string[]): Promise<CommandResult> {
    return this.runner.run(constants.RANCHER, arguments_, this.timeout);
  }
}
