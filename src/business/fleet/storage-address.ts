// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';
import {type ClusterContext} from '../../core/config/cluster-context-manager.js';
import {PathEx} from '../utils/path-ex.js';
import {sanitizeName} from './fleet-config.js';

/**
 * Where the artifacts of one application live: `<root>/<clusterFolder>/<appDirName>/` in both the bundle tree and
 * the config object tree.
 */
export class StorageAddress {
  private constructor(
    public readonly clusterFolder: string,
    public readonly appDirName: string,
  ) {}

  public static of(clusterFolder: string, appDirName: string): StorageAddress {
    return new StorageAddress(sanitizeName(clusterFolder), sanitizeName(appDirName));
  }

  /**
   * The cluster folder is the cluster name, else the cluster id, else `default`.
   */
  public static forContext(context: ClusterContext, appName: string): StorageAddress {
    return StorageAddress.of(
      context.clusterName || context.clusterId || constants.DEFAULT_CLUSTER_FOLDER,
      appName,
    );
  }

  /** `<cluster>/<app>`, used to name a configuration on the command line. */
  public get key(): string {
    return `${this.clusterFolder}/${this.appDirName}`;
  }

  public bundleManifestPath(appsDirectory: string): string {
    return PathEx.join(appsDirectory, this.clusterFolder, this.appDirName, constants.FLEET_BUNDLE_FILE);
  }

  public configObjectPath(intDirectory: string): string {
    return PathEx.join(
      intDirectory,
      this.clusterFolder,
      this.appDirName,
      `${this.appDirName}${constants.CONFIG_OBJECT_FILE_SUFFIX}`,
    );
  }
}
