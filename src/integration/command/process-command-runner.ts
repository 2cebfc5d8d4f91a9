// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type Duration} from '../../core/time/duration.js';
import * as constants from '../../core/constants.js';
import {type CommandResult, type CommandRunner} from './command-runner.js';

/**
 * Runs a tool as a child process and waits for it to exit or for the timeout to elapse, whichever comes first.
 */
@injectable()
export class ProcessCommandRunner implements CommandRunner {
  /**
   * The number of characters of output included in debug logs.
   */
  private static readonly LOG_OUTPUT_LIMIT = 200;

  private readonly logger: FleetLogger;

  public constructor(@inject(InjectTokens.FleetLogger) logger?: FleetLogger) {
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public run(
    tool: string,
    arguments_: readonly string[],
    timeout: Duration,
    environment: Readonly<Record<string, string>> = {},
  ): Promise<CommandResult> {
    const commandLine = [tool, ...arguments_].join(' ');
    this.logger.debug(`Executing: ${commandLine}`);

    return new Promise<CommandResult>(resolve => {
      let settled = false;
      const settle = (result: CommandResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        const logged = result.output.slice(0, ProcessCommandRunner.LOG_OUTPUT_LIMIT);
        this.logger.debug(`Finished: ${commandLine}, success: ${result.ok}, output: ${logged}`);
        resolve(result);
      };

      const child = spawn(tool, [...arguments_], {
        env: {...process.env, ...environment},
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timer = setTimeout(() => {
        child.kill('SIGTERM');
        settle({ok: false, output: constants.COMMAND_TIMED_OUT_MESSAGE});
      }, timeout.toMillis());

      let standardOutput = '';
      let standardError = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        standardOutput += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        standardError += chunk;
      });

      child.on('error', error => {
        settle({ok: false, output: error.message});
      });

      child.on('close', code => {
        const ok = code === 0;
        settle({ok, output: ok ? standardOutput : standardError});
      });
    });
  }
}
