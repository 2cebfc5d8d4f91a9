// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type LocalConfig} from '../../core/config/local/local-config.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import * as constants from '../../core/constants.js';
import {PathEx} from '../utils/path-ex.js';
import {StorageAddress} from './storage-address.js';

export interface ExistingConfiguration {
  key: string;
  clusterFolder: string;
  appDirName: string;
  namespace: string;
  chartName: string;
}

export interface LoadedConfiguration {
  configuration: ExistingConfiguration;
  bundleManifestPath: string;
  configObjectPath: string;
  bundleManifest?: string;
  configObject?: string;
}

/**
 * Previously generated configurations, found by scanning the bundle tree for `<cluster>/<app>/fleet.yaml`.
 */
@injectable()
export class ExistingConfigurations {
  private readonly localConfig: LocalConfig;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.LocalConfig) localConfig?: LocalConfig,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.localConfig = patchInject(localConfig, InjectTokens.LocalConfig, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * The application directory is `<namespace>-<chart>`; the split happens at the first dash, so a namespace that
   * itself contains a dash is read back shorter than it was written.
   */
  public static describe(clusterFolder: string, appDirName: string): ExistingConfiguration {
    const separator = appDirName.indexOf('-');
    return {
      key: `${clusterFolder}/${appDirName}`,
      clusterFolder,
      appDirName,
      namespace: separator === -1 ? appDirName : appDirName.slice(0, separator),
      chartName: separator === -1 ? appDirName : appDirName.slice(separator + 1),
    };
  }

  public list(): ExistingConfiguration[] {
    const {appsDirectory} = this.localConfig.storageRoots();
    const configurations: ExistingConfiguration[] = [];

    for (const clusterFolder of ExistingConfigurations.subdirectories(appsDirectory)) {
      const clusterDirectory = PathEx.join(appsDirectory, clusterFolder);
      for (const appDirName of ExistingConfigurations.subdirectories(clusterDirectory)) {
        if (fs.existsSync(PathEx.join(clusterDirectory, appDirName, constants.FLEET_BUNDLE_FILE))) {
          configurations.push(ExistingConfigurations.describe(clusterFolder, appDirName));
        }
      }
    }

    this.logger.debug(`Found ${configurations.length} existing configurations in ${appsDirectory}`);
    return configurations;
  }

  /**
   * Reads both artifacts of the configuration named `<cluster>/<app>`. A missing file reads as undefined.
   * @throws IllegalArgumentError when the key is not of the form `<cluster>/<app>` or leaves the storage roots
   */
  public load(key: string): LoadedConfiguration {
    const separator = key.indexOf('/');
    if (separator <= 0 || separator === key.length - 1) {
      throw new IllegalArgumentError(`Invalid configuration key, expected <cluster>/<app>: ${key}`, key);
    }
    const clusterFolder = key.slice(0, separator);
    const appDirName = key.slice(separator + 1);
    const address = StorageAddress.of(clusterFolder, appDirName);
    const {appsDirectory, intDirectory} = this.localConfig.storageRoots();

    const bundleManifestPath = PathEx.safeJoinWithBaseDirConfinement(
      appsDirectory,
      PathEx.join(address.clusterFolder, address.appDirName, constants.FLEET_BUNDLE_FILE),
    );
    const configObjectPath = PathEx.safeJoinWithBaseDirConfinement(
      intDirectory,
      PathEx.join(
        address.clusterFolder,
        address.appDirName,
        `${address.appDirName}${constants.CONFIG_OBJECT_FILE_SUFFIX}`,
      ),
    );

    return {
      configuration: ExistingConfigurations.describe(address.clusterFolder, address.appDirName),
      bundleManifestPath,
      configObjectPath,
      bundleManifest: ExistingConfigurations.readIfExists(bundleManifestPath),
      configObject: ExistingConfigurations.readIfExists(configObjectPath),
    };
  }

  private static subdirectories(directory: string): string[] {
    if (!fs.existsSync(directory)) {
      return [];
    }
    return fs
      .readdirSync(directory, {withFileTypes: true})
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  private static readIfExists(filePath: string): string | undefined {
    return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf8') : undefined;
  }
}
