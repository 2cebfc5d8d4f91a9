// SPDX-License-Identifier: Apache-2.0

/**
 * The cluster and project printed by `rancher context current`, e.g. `Cluster:staging Project:Default`.
 */
export class RancherContext {
  private static readonly CLUSTER_PREFIX = 'Cluster:';
  private static readonly PROJECT_SEPARATOR = ' Project:';

  public constructor(
    public readonly clusterName: string,
    public readonly projectName: string,
  ) {}

  /** `<cluster>:<project>`, the form stored in the local settings. */
  public get context(): string {
    return `${this.clusterName}:${this.projectName}`;
  }

  /**
   * Reads the first line that names both a cluster and a project. Project names may contain spaces.
   */
  public static parse(output: string): RancherContext | undefined {
    for (const line of output.trim().split(/\r?\n/)) {
      if (!line.startsWith(RancherContext.CLUSTER_PREFIX)) {
        continue;
      }
      const parts = line.split(RancherContext.PROJECT_SEPARATOR);
      if (parts.length !== 2) {
        continue;
      }
      const clusterName = parts[0].slice(RancherContext.CLUSTER_PREFIX.length).trim();
      const projectName = parts[1].trim();
      if (clusterName && projectName) {
        return new RancherContext(clusterName, projectName);
      }
    }
    return undefined;
  }
}
