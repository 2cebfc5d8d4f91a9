// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type FleetLogger} from '../logging/fleet-logger.js';
import {type LocalConfig} from './local/local-config.js';
import {type ClusterContextData} from './local/local-config-data.js';
import {type RancherClient} from '../../integration/rancher/rancher-client.js';

export type ClusterContext = Readonly<ClusterContextData>;

export const EMPTY_CLUSTER_CONTEXT: ClusterContext = Object.freeze({context: '', clusterId: '', clusterName: ''});

/**
 * Tracks which Rancher cluster generated artifacts belong to. The context is read from the local settings and
 * detected from the rancher CLI the first time it is needed.
 */
@injectable()
export class ClusterContextManager {
  private readonly localConfig: LocalConfig;
  private readonly rancher: RancherClient;
  private readonly logger: FleetLogger;
  private detectionAttempted = false;

  public constructor(
    @inject(InjectTokens.LocalConfig) localConfig?: LocalConfig,
    @inject(InjectTokens.Rancher) rancher?: RancherClient,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.localConfig = patchInject(localConfig, InjectTokens.LocalConfig, this.constructor.name);
    this.rancher = patchInject(rancher, InjectTokens.Rancher, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * Returns the stored context, detecting it once when nothing is stored. Never rejects; a context that cannot be
   * detected reads as empty.
   */
  public async current(): Promise<ClusterContext> {
    const stored = this.localConfig.clusterContext;
    if (stored.context || this.detectionAttempted) {
      return stored;
    }

    this.detectionAttempted = true;
    try {
      const detected = await this.detect();
      if (detected) {
        await this.set(detected);
        return detected;
      }
    } catch (error) {
      this.logger.error('Failed to detect the rancher context', error);
    }
    return stored;
  }

  public async set(context: ClusterContext): Promise<void> {
    await this.localConfig.modify(async data => {
      data.clusterContext = {...context};
    });
    this.logger.debug(
      `Cluster context set: ${context.context} -> cluster: ${context.clusterName}, cluster_id: ${context.clusterId}`,
    );
  }

  /**
   * Reads the current cluster and project from rancher, then looks up the cluster id. The project name stands in
   * for the id when the lookup fails.
   */
  public async detect(): Promise<ClusterContext | undefined> {
    const current = await this.rancher.currentContext();
    if (!current) {
      return undefined;
    }

    const clusters = await this.rancher.listClusters();
    const match = clusters.find(
      cluster => cluster.id !== '' && (cluster.current || cluster.name === current.clusterName),
    );
    let clusterId = match?.id ?? '';
    if (!clusterId) {
      this.logger.debug(`Could not get cluster ID for cluster: ${current.clusterName}`);
      clusterId = current.projectName;
    }

    return {context: current.context, clusterId, clusterName: current.clusterName};
  }
}
