// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

export type ValuesOutputFormat = 'json' | 'yaml';

/**
 * Reads the user-supplied values of a release.
 */
export class ReleaseValuesRequest implements HelmRequest {
  public constructor(
    private readonly releaseName: string,
    private readonly namespace: string,
    private readonly format: ValuesOutputFormat,
  ) {
    if (!releaseName?.trim()) {
      throw new Error('releaseName must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('get', 'values').argument('output', this.format).positional(this.releaseName);
    if (this.namespace) {
      builder.argument('namespace', this.namespace);
    }
  }
}
