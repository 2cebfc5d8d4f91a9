// SPDX-License-Identifier: Apache-2.0

import {type Repository} from './model/repository.js';
import {type ChartSearchResult} from './model/search/chart-search-result.js';
import {type ReleaseItem} from './model/release/release-item.js';
import {type ReleaseMetadata} from './model/release/release-metadata.js';
import {type KubeAuthentication} from './request/authentication/kube-authentication.js';
import {type ValuesOutputFormat} from './request/release/release-values-request.js';

/**
 * The HelmClient is a bridge between TypeScript and the Helm CLI. Every method rejects with a
 * HelmExecutionException when helm exits unsuccessfully and with a HelmParserException when its output is not
 * the expected document.
 */
export interface HelmClient {
  /**
   * Adds a repository, replacing any existing repository registered under the same name.
   */
  addRepository(repository: Repository): Promise<void>;

  /**
   * Refreshes the indexes of all configured repositories.
   */
  updateRepositories(): Promise<void>;

  /**
   * Searches the configured repositories.
   * @param keyword the search term, e.g. `eea/` for every chart of the `eea` repository.
   */
  searchRepository(keyword: string): Promise<ChartSearchResult[]>;

  /**
   * Lists releases in the namespace, or in all namespaces when none is given.
   */
  listReleases(namespace: string | undefined, authentication: KubeAuthentication): Promise<ReleaseItem[]>;

  getReleaseMetadata(
    releaseName: string,
    namespace: string,
    authentication: KubeAuthentication,
  ): Promise<ReleaseMetadata>;

  /**
   * Returns the raw output of `helm get values` in the requested format.
   */
  getReleaseValues(
    releaseName: string,
    namespace: string,
    format: ValuesOutputFormat,
    authentication: KubeAuthentication,
  ): Promise<string>;
}
