// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../execution/helm-execution-builder.js';

/**
 * A helm invocation expressed as the arguments it contributes to a builder.
 */
export interface HelmRequest {
  apply(builder: HelmExecutionBuilder): void;
}
