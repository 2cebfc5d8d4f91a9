// SPDX-License-Identifier: Apache-2.0

export interface ClusterContextData {
  // `<cluster>:<project>` as reported by rancher
  context: string;
  clusterId: string;
  clusterName: string;
}

export interface LocalConfigData {
  // Root of the bundle manifest tree, relative to the working directory unless absolute
  appsDir: string;

  // Root of the config object tree
  intDir: string;

  clusterContext: ClusterContextData;
}
