// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

export class ReleaseMetadataRequest implements HelmRequest {
  public constructor(
    private readonly releaseName: string,
    private readonly namespace: string,
  ) {
    if (!releaseName?.trim()) {
      throw new Error('releaseName must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('get', 'metadata').argument('output', 'json').positional(this.releaseName);
    if (this.namespace) {
      builder.argument('namespace', this.namespace);
    }
  }
}
