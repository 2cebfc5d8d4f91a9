// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

/**
 * Searches the local repository indexes for charts matching a keyword.
 */
export class RepositorySearchRequest implements HelmRequest {
  public constructor(private readonly keyword: string) {
    if (!keyword?.trim()) {
      throw new Error('keyword must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('search', 'repo').argument('output', 'json').positional(this.keyword);
  }
}
