// SPDX-License-Identifier: Apache-2.0

import {type CommandResult, type CommandRunner} from '../../src/integration/command/command-runner.js';
import {type Duration} from '../../src/core/time/duration.js';

export interface RecordedCall {
  commandLine: string;
  environment: Readonly<Record<string, string>>;
}

/**
 * Answers command lines with canned results. Unknown command lines fail the way a missing tool would.
 */
export class FakeCommandRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];
  private readonly responses = new Map<string, CommandResult>();
  private readonly prefixResponses: Array<[string, CommandResult]> = [];

  public succeed(commandLine: string, output: string): this {
    this.responses.set(commandLine, {ok: true, output});
    return this;
  }

  public fail(commandLine: string, output: string = 'command failed'): this {
    this.responses.set(commandLine, {ok: false, output});
    return this;
  }

  /**
   * Answers every command line starting with the prefix, for commands that carry generated paths.
   */
  public succeedStartingWith(prefix: string, output: string): this {
    this.prefixResponses.push([prefix, {ok: true, output}]);
    return this;
  }

  public async run(
    tool: string,
    arguments_: readonly string[],
    _timeout: Duration,
    environment: Readonly<Record<string, string>> = {},
  ): Promise<CommandResult> {
    const commandLine = [tool, ...arguments_].join(' ');
    this.calls.push({commandLine, environment});
    const prefixed = this.prefixResponses.find(([prefix]) => commandLine.startsWith(prefix));
    return (
      this.responses.get(commandLine) ??
      prefixed?.[1] ?? {ok: false, output: `no response configured for: ${commandLine}`}
    );
  }

  public commandLines(): string[] {
    return this.calls.map(call => call.commandLine);
  }
}
