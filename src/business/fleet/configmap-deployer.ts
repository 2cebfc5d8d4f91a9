// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import * as yaml from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {ErrorMessages} from '../../core/error-messages.js';
import * as constants from '../../core/constants.js';
import {type RancherClient} from '../../integration/rancher/rancher-client.js';
import {PathEx} from '../utils/path-ex.js';
import {isRecord, stringField} from '../utils/records.js';
import {ArtifactGenerator} from './artifact-generator.js';
import {type FleetConfig} from './fleet-config.js';

export interface DeploymentOutcome {
  ok: boolean;
  message: string;
}

/**
 * Applies ConfigMaps to the cluster of the current rancher context. The target namespace must already exist.
 */
@injectable()
export class ConfigMapDeployer {
  private readonly rancher: RancherClient;
  private readonly generator: ArtifactGenerator;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.Rancher) rancher?: RancherClient,
    @inject(InjectTokens.ArtifactGenerator) generator?: ArtifactGenerator,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.rancher = patchInject(rancher, InjectTokens.Rancher, this.constructor.name);
    this.generator = patchInject(generator, InjectTokens.ArtifactGenerator, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * Renders the ConfigMap of a resolved configuration and applies it.
   */
  public async deploy(config: FleetConfig): Promise<DeploymentOutcome> {
    const configObject = ArtifactGenerator.renderConfigObject(config, this.generator.renderValues(config));
    return this.apply(config.namespace, ArtifactGenerator.configObjectName(config), configObject);
  }

  /**
   * Applies a ConfigMap document previously written to disk.
   */
  public async deployDocument(configObject: string): Promise<DeploymentOutcome> {
    let document: unknown;
    try {
      document = yaml.parse(configObject);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {ok: false, message: `Invalid ConfigMap document: ${reason}`};
    }
    const metadata = isRecord(document) ? document.metadata : undefined;
    if (!isRecord(metadata)) {
      return {ok: false, message: 'Invalid ConfigMap document: missing metadata'};
    }
    return this.apply(stringField(metadata, 'namespace'), stringField(metadata, 'name'), configObject);
  }

  public async namespaceExists(namespace: string): Promise<boolean> {
    const namespaces = await this.rancher.listNamespaces();
    const exists = namespaces.includes(namespace);
    this.logger.debug(`Namespace '${namespace}' exists: ${exists}`);
    return exists;
  }

  private async apply(namespace: string, name: string, configObject: string): Promise<DeploymentOutcome> {
    if (!namespace || !(await this.namespaceExists(namespace))) {
      return {ok: false, message: `${ErrorMessages.NAMESPACE_NOT_FOUND(namespace)}. Please create it first.`};
    }

    const temporaryDirectory = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'fleetgen-'));
    const manifestPath = PathEx.join(temporaryDirectory, constants.APPLY_MANIFEST_FILE);
    try {
      fs.writeFileSync(manifestPath, configObject);
      const result = await this.rancher.applyManifest(manifestPath);
      if (!result.ok) {
        this.logger.error(`rancher kubectl apply failed: ${result.output}`);
        return {ok: false, message: `Failed to deploy ConfigMap: ${result.output}`};
      }
      return {ok: true, message: `ConfigMap ${name} deployed successfully`};
    } finally {
      fs.rmSync(temporaryDirectory, {recursive: true, force: true});
    }
  }
}
