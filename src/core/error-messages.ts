// SPDX-License-Identifier: Apache-2.0

export class ErrorMessages {
  public static readonly LOCAL_CONFIG_GENERIC = 'Validation of local config failed';

  public static readonly LOCAL_CONFIG_INVALID_APPS_DIR = 'appsDir must be a non-empty string';

  public static readonly LOCAL_CONFIG_INVALID_INT_DIR = 'intDir must be a non-empty string';

  public static readonly LOCAL_CONFIG_INVALID_CLUSTER_CONTEXT = 'clusterContext fields must be strings';

  public static readonly LOCAL_CONFIG_UNKNOWN_KEY = (key: string): string =>
    `Unknown key '${key}' in local config; allowed keys are appsDir, intDir and clusterContext`;

  public static readonly LOCAL_CONFIG_UNREADABLE = (filePath: string): string =>
    `Local config at ${filePath} is not a YAML mapping`;

  public static readonly APP_NAME_REQUIRED = 'An application name is required';

  public static readonly CONFIGURATION_NOT_FOUND = (key: string): string =>
    `No generated configuration found for ${key}`;

  public static readonly NAMESPACE_NOT_FOUND = (namespace: string): string =>
    `Namespace '${namespace}' does not exist in current Rancher context`;

  public static readonly CHART_OR_RELEASE_REQUIRED = 'Either --chart or --release is required';

  public static readonly CHART_AND_RELEASE_EXCLUSIVE = 'Use either --chart or --release, not both';

  public static readonly RELEASE_NOT_FOUND = (releaseName: string, namespace: string): string =>
    `Release '${releaseName}' not found in namespace '${namespace}'`;

  public static readonly CONFIG_OBJECT_MISSING = (filePath: string): string =>
    `No ConfigMap document found at ${filePath}`;
}
