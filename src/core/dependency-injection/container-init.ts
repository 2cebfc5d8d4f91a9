// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type FleetLogger} from '../logging/fleet-logger.js';
import {FleetWinstonLogger} from '../logging/fleet-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {SYSTEM_CLOCK} from '../time/clock.js';
import {LocalConfig} from '../config/local/local-config.js';
import {ClusterContextManager} from '../config/cluster-context-manager.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {ProcessCommandRunner} from '../../integration/command/process-command-runner.js';
import {DefaultHelmClient} from '../../integration/helm/impl/default-helm-client.js';
import {Repository} from '../../integration/helm/model/repository.js';
import {RancherClient} from '../../integration/rancher/rancher-client.js';
import {KubeConfigProvider} from '../../integration/kube/kube-config-provider.js';
import {ChartCatalogCache} from '../../business/catalog/chart-catalog-cache.js';
import {ReleaseMetadataDecoder} from '../../business/release/release-metadata-decoder.js';
import {ReleaseInspector} from '../../business/release/release-inspector.js';
import {ConfigurationResolver} from '../../business/fleet/configuration-resolver.js';
import {ArtifactGenerator} from '../../business/fleet/artifact-generator.js';
import {ExistingConfigurations} from '../../business/fleet/existing-configurations.js';
import {ConfigMapDeployer} from '../../business/fleet/configmap-deployer.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - holds the logs, the chart cache and the local settings
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.FLEETGEN_HOME_DIR,
    logLevel: string = constants.FLEETGEN_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: FleetLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<FleetLogger>(InjectTokens.FleetLogger).debug('Container already initialized');
      return;
    }

    container.register(InjectTokens.HomeDir, {useValue: homeDirectory});
    container.register(InjectTokens.LogsDir, {useValue: PathEx.join(homeDirectory, 'logs')});
    container.register(InjectTokens.LocalConfigFilePath, {
      useValue: PathEx.join(homeDirectory, constants.DEFAULT_LOCAL_CONFIG_FILE),
    });
    container.register(InjectTokens.CatalogCacheFilePath, {
      useValue: PathEx.join(homeDirectory, constants.CATALOG_CACHE_FILE),
    });
    container.register(InjectTokens.FallbackChartsFilePath, {useValue: constants.FALLBACK_CHARTS_FILE});
    container.register(InjectTokens.HelmRepository, {
      useValue: new Repository(constants.HELM_REPO_NAME, constants.HELM_REPO_URL),
    });
    container.register(InjectTokens.CommandTimeout, {useValue: constants.COMMAND_TIMEOUT});
    container.register(InjectTokens.Clock, {useValue: SYSTEM_CLOCK});

    // FleetLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.FleetLogger, testLogger);
      container.resolve<FleetLogger>(InjectTokens.FleetLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.FleetLogger, {useClass: FleetWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<FleetLogger>(InjectTokens.FleetLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    // External tools
    container.register(
      InjectTokens.CommandRunner,
      {useClass: ProcessCommandRunner},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.Helm, {useClass: DefaultHelmClient}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Rancher, {useClass: RancherClient}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.KubeConfigProvider,
      {useClass: KubeConfigProvider},
      {lifecycle: Lifecycle.Singleton},
    );

    // Settings
    container.register(InjectTokens.LocalConfig, {useClass: LocalConfig}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ClusterContextManager,
      {useClass: ClusterContextManager},
      {lifecycle: Lifecycle.Singleton},
    );

    // Business
    container.register(
      InjectTokens.ChartCatalogCache,
      {useClass: ChartCatalogCache},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ReleaseMetadataDecoder,
      {useClass: ReleaseMetadataDecoder},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ReleaseInspector, {useClass: ReleaseInspector}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ConfigurationResolver,
      {useClass: ConfigurationResolver},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ArtifactGenerator,
      {useClass: ArtifactGenerator},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ExistingConfigurations,
      {useClass: ExistingConfigurations},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.ConfigMapDeployer,
      {useClass: ConfigMapDeployer},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - holds the logs, the chart cache and the local settings
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(homeDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: FleetLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<FleetLogger>(InjectTokens.FleetLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
