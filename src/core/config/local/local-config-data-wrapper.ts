// SPDX-License-Identifier: Apache-2.0

import {IsNotEmpty, IsString, ValidateNested, validateSync} from 'class-validator';
import {type ClusterContextData, type LocalConfigData} from './local-config-data.js';
import {ErrorMessages} from '../../error-messages.js';
import {FleetError} from '../../errors/fleet-error.js';

export class ClusterContextDataWrapper implements ClusterContextData {
  @IsString({message: ErrorMessages.LOCAL_CONFIG_INVALID_CLUSTER_CONTEXT})
  public context: string;

  @IsString({message: ErrorMessages.LOCAL_CONFIG_INVALID_CLUSTER_CONTEXT})
  public clusterId: string;

  @IsString({message: ErrorMessages.LOCAL_CONFIG_INVALID_CLUSTER_CONTEXT})
  public clusterName: string;

  public constructor(context: string = '', clusterId: string = '', clusterName: string = '') {
    this.context = context;
    this.clusterId = clusterId;
    this.clusterName = clusterName;
  }

  public toObject(): ClusterContextData {
    return {context: this.context, clusterId: this.clusterId, clusterName: this.clusterName};
  }
}

export class LocalConfigDataWrapper implements LocalConfigData {
  public static readonly ALLOWED_KEYS: readonly string[] = ['appsDir', 'intDir', 'clusterContext'];

  @IsString({message: ErrorMessages.LOCAL_CONFIG_INVALID_APPS_DIR})
  @IsNotEmpty({message: ErrorMessages.LOCAL_CONFIG_INVALID_APPS_DIR})
  private _appsDir: string;

  @IsString({message: ErrorMessages.LOCAL_CONFIG_INVALID_INT_DIR})
  @IsNotEmpty({message: ErrorMessages.LOCAL_CONFIG_INVALID_INT_DIR})
  private _intDir: string;

  @ValidateNested()
  private _clusterContext: ClusterContextDataWrapper;

  public constructor(appsDirectory: string, intDirectory: string, clusterContext: ClusterContextDataWrapper) {
    this._appsDir = appsDirectory;
    this._intDir = intDirectory;
    this._clusterContext = clusterContext;
    this.validate();
  }

  public get appsDir(): string {
    return this._appsDir;
  }

  public set appsDir(value: string) {
    this._appsDir = value;
  }

  public get intDir(): string {
    return this._intDir;
  }

  public set intDir(value: string) {
    this._intDir = value;
  }

  public get clusterContext(): ClusterContextData {
    return this._clusterContext.toObject();
  }

  public set clusterContext(value: ClusterContextData) {
    this._clusterContext = new ClusterContextDataWrapper(value.context, value.clusterId, value.clusterName);
  }

  /**
   * @throws FleetError listing every constraint that failed
   */
  public validate(): void {
    const errors = validateSync(this);
    if (errors.length > 0) {
      const messages = errors.flatMap(error => [
        ...Object.values(error.constraints ?? {}),
        ...(error.children ?? []).flatMap(child => Object.values(child.constraints ?? {})),
      ]);
      throw new FleetError(`${ErrorMessages.LOCAL_CONFIG_GENERIC}: ${messages.join(', ')}`);
    }
  }

  public toObject(): LocalConfigData {
    return {appsDir: this.appsDir, intDir: this.intDir, clusterContext: this.clusterContext};
  }
}
