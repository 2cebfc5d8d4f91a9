// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import * as constants from '../../core/constants.js';
import {type RancherClient} from '../../integration/rancher/rancher-client.js';
import {andThen} from '../utils/result.js';
import {type ChartMetadata, EMPTY_CHART_METADATA} from './release-record.js';
import {decodeReleasePayload, extractReleasePayload} from './release-secret-decoder.js';

/**
 * Recovers the chart metadata of a deployed release from the secret helm keeps for each revision.
 */
@injectable()
export class ReleaseMetadataDecoder {
  private readonly rancher: RancherClient;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.Rancher) rancher?: RancherClient,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.rancher = patchInject(rancher, InjectTokens.Rancher, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public static secretName(releaseName: string, revision: string): string {
    return `${constants.HELM_RELEASE_SECRET_PREFIX}${releaseName}.v${revision}`;
  }

  /**
   * @returns the decoded metadata, or the all-empty metadata when any layer fails. Never rejects.
   */
  public async decode(releaseName: string, namespace: string, revision: string = '1'): Promise<ChartMetadata> {
    const secretName = ReleaseMetadataDecoder.secretName(releaseName, revision || '1');
    this.logger.debug(`Extracting metadata for release ${releaseName} from secret ${secretName}`);

    try {
      const response = await this.rancher.getSecret(secretName, namespace);
      if (!response.ok || !response.output.trim()) {
        this.logger.debug(`Failed to get secret ${secretName} in namespace ${namespace}: ${response.output}`);
        return EMPTY_CHART_METADATA;
      }

      const result = andThen(extractReleasePayload(response.output), decodeReleasePayload);
      if (!result.success) {
        this.logger.debug(`Could not decode secret ${secretName}: ${result.error}`);
        return EMPTY_CHART_METADATA;
      }

      this.logger.debug(`Extracted metadata for ${releaseName}: ${JSON.stringify(result.data)}`);
      return result.data;
    } catch (error) {
      this.logger.error(`Unexpected error reading secret ${secretName}`, error);
      return EMPTY_CHART_METADATA;
    }
  }
}
