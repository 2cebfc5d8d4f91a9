// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as yaml from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {MissingArgumentError} from '../../errors/missing-argument-error.js';
import {FleetError} from '../../errors/fleet-error.js';
import {type FleetLogger} from '../../logging/fleet-logger.js';
import {ErrorMessages} from '../../error-messages.js';
import {patchInject} from '../../dependency-injection/container-helper.js';
import {InjectTokens} from '../../dependency-injection/inject-tokens.js';
import {ClusterContextDataWrapper, LocalConfigDataWrapper} from './local-config-data-wrapper.js';
import {type ClusterContextData} from './local-config-data.js';
import {isRecord, stringField} from '../../../business/utils/records.js';
import {PathEx} from '../../../business/utils/path-ex.js';
import * as constants from '../../constants.js';

export interface StorageRoots {
  appsDirectory: string;
  intDirectory: string;
}

/**
 * User settings kept in `local-config.yaml` under the home directory. A missing file reads as the defaults and is
 * created on the first modification.
 */
@injectable()
export class LocalConfig {
  private readonly filePath: string;
  private readonly logger: FleetLogger;
  private readonly localConfigData: LocalConfigDataWrapper;

  public constructor(
    @inject(InjectTokens.LocalConfigFilePath) filePath?: string,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.filePath = patchInject(filePath, InjectTokens.LocalConfigFilePath, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);

    if (!this.filePath) {
      throw new MissingArgumentError('a valid filePath is required');
    }

    this.localConfigData = this.configFileExists()
      ? this.read()
      : new LocalConfigDataWrapper(
          constants.DEFAULT_APPS_DIR,
          constants.DEFAULT_INT_DIR,
          new ClusterContextDataWrapper(),
        );
  }

  public get appsDir(): string {
    return this.localConfigData.appsDir;
  }

  public get intDir(): string {
    return this.localConfigData.intDir;
  }

  public get clusterContext(): Readonly<ClusterContextData> {
    return this.localConfigData.clusterContext;
  }

  /**
   * Resolves both storage roots against the working directory and creates them when missing.
   */
  public storageRoots(): StorageRoots {
    const appsDirectory = PathEx.resolve(this.appsDir);
    const intDirectory = PathEx.resolve(this.intDir);
    fs.mkdirSync(appsDirectory, {recursive: true});
    fs.mkdirSync(intDirectory, {recursive: true});
    return {appsDirectory, intDirectory};
  }

  /**
   * Applies changes through the callback, validates them and writes the file.
   * @throws FleetError when the modified settings are invalid
   */
  public async modify(callback: (config: LocalConfigDataWrapper) => Promise<void>): Promise<void> {
    await callback(this.localConfigData);
    this.localConfigData.validate();
    this.write();
  }

  public configFileExists(): boolean {
    return fs.existsSync(this.filePath);
  }

  private read(): LocalConfigDataWrapper {
    const fileContent = fs.readFileSync(this.filePath, 'utf8');
    let parsedConfig: unknown;
    try {
      parsedConfig = yaml.parse(fileContent) ?? {};
    } catch (error) {
      throw new FleetError(ErrorMessages.LOCAL_CONFIG_UNREADABLE(this.filePath), error);
    }
    if (!isRecord(parsedConfig)) {
      throw new FleetError(ErrorMessages.LOCAL_CONFIG_UNREADABLE(this.filePath));
    }
    this.logger.debug(`Parsed local config from ${this.filePath}: ${JSON.stringify(parsedConfig)}`);

    for (const key of Object.keys(parsedConfig)) {
      if (!LocalConfigDataWrapper.ALLOWED_KEYS.includes(key)) {
        throw new FleetError(ErrorMessages.LOCAL_CONFIG_UNKNOWN_KEY(key));
      }
    }

    const clusterContext = isRecord(parsedConfig.clusterContext)
      ? new ClusterContextDataWrapper(
          stringField(parsedConfig.clusterContext, 'context'),
          stringField(parsedConfig.clusterContext, 'clusterId'),
          stringField(parsedConfig.clusterContext, 'clusterName'),
        )
      : new ClusterContextDataWrapper();

    return new LocalConfigDataWrapper(
      'appsDir' in parsedConfig ? stringField(parsedConfig, 'appsDir') : constants.DEFAULT_APPS_DIR,
      'intDir' in parsedConfig ? stringField(parsedConfig, 'intDir') : constants.DEFAULT_INT_DIR,
      clusterContext,
    );
  }

  private write(): void {
    const yamlContent = yaml.stringify(this.localConfigData.toObject());
    fs.mkdirSync(PathEx.resolve(this.filePath, '..'), {recursive: true});
    fs.writeFileSync(this.filePath, yamlContent);
    this.logger.info(`Wrote local config to ${this.filePath}: ${yamlContent}`);
  }
}
