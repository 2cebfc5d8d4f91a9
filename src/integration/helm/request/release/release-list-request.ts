// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

/**
 * Lists releases in one namespace, or in all of them when no namespace is given.
 */
export class ReleaseListRequest implements HelmRequest {
  public constructor(private readonly namespace?: string) {}

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('list').argument('output', 'json');

    if (this.namespace) {
      builder.argument('namespace', this.namespace);
    } else {
      builder.flag('--all-namespaces');
    }
  }
}
