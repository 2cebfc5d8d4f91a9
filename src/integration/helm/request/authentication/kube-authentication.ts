// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';

/**
 * Points helm at a kubeconfig file through the environment rather than through `--kubeconfig`.
 */
export class KubeAuthentication {
  private static readonly KUBECONFIG_ENV = 'KUBECONFIG';

  public constructor(public readonly kubeConfigPath: string) {
    if (!kubeConfigPath?.trim()) {
      throw new Error('kubeConfigPath must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.environmentVariable(KubeAuthentication.KUBECONFIG_ENV, this.kubeConfigPath);
  }
}
