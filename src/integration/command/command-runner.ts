// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../../core/time/duration.js';

/**
 * Outcome of an external command: whether it exited cleanly and the text it produced. On success `output` is the
 * captured standard output, otherwise the captured standard error (or a short reason when the process never ran).
 */
export interface CommandResult {
  readonly ok: boolean;
  readonly output: string;
}

/**
 * Executes external command line tools. Implementations resolve with a failed result instead of rejecting.
 */
export interface CommandRunner {
  run(
    tool: string,
    arguments_: readonly string[],
    timeout: Duration,
    environment?: Readonly<Record<string, string>>,
  ): Promise<CommandResult>;
}
