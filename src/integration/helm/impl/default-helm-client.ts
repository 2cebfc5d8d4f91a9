// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type HelmClient} from '../helm-client.js';
import {type HelmExecution} from '../execution/helm-execution.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type Repository} from '../model/repository.js';
import {ChartSearchResult} from '../model/search/chart-search-result.js';
import {ReleaseItem} from '../model/release/release-item.js';
import {ReleaseMetadata} from '../model/release/release-metadata.js';
import {type HelmRequest} from '../request/helm-request.js';
import {type KubeAuthentication} from '../request/authentication/kube-authentication.js';
import {RepositoryAddRequest} from '../request/repository/repository-add-request.js';
import {RepositoryUpdateRequest} from '../request/repository/repository-update-request.js';
import {RepositorySearchRequest} from '../request/repository/repository-search-request.js';
import {ReleaseListRequest} from '../request/release/release-list-request.js';
import {ReleaseMetadataRequest} from '../request/release/release-metadata-request.js';
import {ReleaseValuesRequest, type ValuesOutputFormat} from '../request/release/release-values-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../../core/logging/fleet-logger.js';
import {type CommandRunner} from '../../command/command-runner.js';
import {type Duration} from '../../../core/time/duration.js';

/**
 * The default implementation of the HelmClient interface.
 */
@injectable()
export class DefaultHelmClient implements HelmClient {
  private readonly runner: CommandRunner;
  private readonly timeout: Duration;
  private readonly logger: FleetLogger;

  public constructor(
    @inject(InjectTokens.CommandRunner) runner?: CommandRunner,
    @inject(InjectTokens.CommandTimeout) timeout?: Duration,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.runner = patchInject(runner, InjectTokens.CommandRunner, this.constructor.name);
    this.timeout = patchInject(timeout, InjectTokens.CommandTimeout, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public async addRepository(repository: Repository): Promise<void> {
    await this.execute(new RepositoryAddRequest(repository)).call();
  }

  public async updateRepositories(): Promise<void> {
    await this.execute(new RepositoryUpdateRequest()).call();
  }

  public async searchRepository(keyword: string): Promise<ChartSearchResult[]> {
    return this.execute(new RepositorySearchRequest(keyword)).responseAsList(ChartSearchResult.fromJson);
  }

  public async listReleases(
    namespace: string | undefined,
    authentication: KubeAuthentication,
  ): Promise<ReleaseItem[]> {
    return this.execute(new ReleaseListRequest(namespace), authentication).responseAsList(ReleaseItem.fromJson);
  }

  public async getReleaseMetadata(
    releaseName: string,
    namespace: string,
    authentication: KubeAuthentication,
  ): Promise<ReleaseMetadata> {
    return this.execute(new ReleaseMetadataRequest(releaseName, namespace), authentication).responseAs(
      ReleaseMetadata.fromJson,
    );
  }

  public async getReleaseValues(
    releaseName: string,
    namespace: string,
    format: ValuesOutputFormat,
    authentication: KubeAuthentication,
  ): Promise<string> {
    return this.execute(new ReleaseValuesRequest(releaseName, namespace, format), authentication).responseText();
  }

  /**
   * Applies the request, and the authentication when given, to a fresh builder and starts the command.
   */
  private execute(request: HelmRequest, authentication?: KubeAuthentication): HelmExecution {
    const builder = new HelmExecutionBuilder(this.runner, this.timeout, this.logger);
    authentication?.apply(builder);
    request.apply(builder);
    return builder.build();
  }
}
