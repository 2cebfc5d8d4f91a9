// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogsDir: Symbol.for('LogsDir'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDir: Symbol.for('HomeDir'),
  LocalConfigFilePath: Symbol.for('LocalConfigFilePath'),
  CatalogCacheFilePath: Symbol.for('CatalogCacheFilePath'),
  FallbackChartsFilePath: Symbol.for('FallbackChartsFilePath'),
  HelmRepository: Symbol.for('HelmRepository'),
  CommandTimeout: Symbol.for('CommandTimeout'),
  Clock: Symbol.for('Clock'),
  FleetLogger: Symbol.for('FleetLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  CommandRunner: Symbol.for('CommandRunner'),
  Helm: Symbol.for('Helm'),
  Rancher: Symbol.for('Rancher'),
  KubeConfigProvider: Symbol.for('KubeConfigProvider'),
  LocalConfig: Symbol.for('LocalConfig'),
  ClusterContextManager: Symbol.for('ClusterContextManager'),
  ChartCatalogCache: Symbol.for('ChartCatalogCache'),
  ReleaseMetadataDecoder: Symbol.for('ReleaseMetadataDecoder'),
  ReleaseInspector: Symbol.for('ReleaseInspector'),
  ConfigurationResolver: Symbol.for('ConfigurationResolver'),
  ArtifactGenerator: Symbol.for('ArtifactGenerator'),
  ExistingConfigurations: Symbol.for('ExistingConfigurations'),
  ConfigMapDeployer: Symbol.for('ConfigMapDeployer'),
};
