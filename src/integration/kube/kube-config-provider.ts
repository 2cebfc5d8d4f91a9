// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type RancherClient} from '../rancher/rancher-client.js';
import {KubeAuthentication} from '../helm/request/authentication/kube-authentication.js';

/**
 * Materializes the kubeconfig of the current rancher context in a temporary file so that helm can talk to the
 * cluster. The file is created on first use, reused afterwards and removed by `dispose`.
 */
@injectable()
export class KubeConfigProvider {
  private static readonly FILE_NAME = 'kubeconfig.yaml';

  private readonly rancher: RancherClient;
  private readonly logger: FleetLogger;
  private temporaryDirectory?: string;
  private authentication?: KubeAuthentication;

  public constructor(
    @inject(InjectTokens.Rancher) rancher?: RancherClient,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.rancher = patchInject(rancher, InjectTokens.Rancher, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * @returns the authentication to pass to helm, or undefined when rancher cannot produce a kubeconfig
   */
  public async acquire(): Promise<KubeAuthentication | undefined> {
    if (this.authentication) {
      return this.authentication;
    }

    const result = await this.rancher.viewRawKubeConfig();
    if (!result.ok || !result.output.trim()) {
      this.logger.error(`Failed to get kubeconfig from rancher: ${result.output}`);
      return undefined;
    }

    this.temporaryDirectory = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'fleetgen-'));
    const kubeConfigPath = PathEx.join(this.temporaryDirectory, KubeConfigProvider.FILE_NAME);
    fs.writeFileSync(kubeConfigPath, result.output, {mode: 0o600});
    this.logger.debug(`Created temporary kubeconfig: ${kubeConfigPath}`);

    this.authentication = new KubeAuthentication(kubeConfigPath);
    return this.authentication;
  }

  public dispose(): void {
    if (!this.temporaryDirectory) {
      return;
    }
    fs.rmSync(this.temporaryDirectory, {recursive: true, force: true});
    this.logger.debug(`Cleaned up: ${this.temporaryDirectory}`);
    this.temporaryDirectory = undefined;
    this.authentication = undefined;
  }
}
