// SPDX-License-Identifier: Apache-2.0

import {HelmExecutionException} from '../helm-execution-exception.js';
import {HelmParserException} from '../helm-parser-exception.js';
import {type CommandResult} from '../../command/command-runner.js';
import {tryParseJson} from '../../../business/utils/records.js';

/**
 * Converts one parsed JSON value into a response model, returning undefined when the value does not fit.
 */
export type ResponseParser<T> = (value: unknown) => T | undefined;

/**
 * Represents the execution of a helm command and is responsible for parsing the response.
 */
export class HelmExecution {
  /**
   * The message for a deserialization error.
   */
  private static readonly MSG_DESERIALIZATION_ERROR = 'Failed to deserialize the output of: %s';
  /**
   * The message for a list deserialization error.
   */
  private static readonly MSG_LIST_DESERIALIZATION_ERROR = 'Failed to deserialize the output into a list: %s';

  /**
   * Creates a new HelmExecution instance.
   * @param commandLine The command line being executed, used in error messages
   * @param pending The result of the running command
   */
  public constructor(
    public readonly commandLine: string,
    private readonly pending: Promise<CommandResult>,
  ) {}

  /**
   * Waits for the command and returns its standard output.
   * @throws HelmExecutionException when the command failed or timed out
   */
  public async responseText(): Promise<string> {
    const result = await this.pending;
    if (!result.ok) {
      throw new HelmExecutionException(this.commandLine, result.output);
    }
    return result.output;
  }

  /**
   * Gets the response as a parsed object.
   * @param parser Converts the parsed JSON document into the response model
   * @returns A promise that resolves with the parsed response
   */
  public async responseAs<T>(parser: ResponseParser<T>): Promise<T> {
    const output = await this.responseText();
    const parsed = parser(tryParseJson(output));
    if (parsed === undefined) {
      throw new HelmParserException(HelmExecution.MSG_DESERIALIZATION_ERROR.replace('%s', this.commandLine));
    }
    return parsed;
  }

  /**
   * Gets the response as a list of parsed objects. Items the parser rejects are dropped.
   * @param parser Converts each item of the JSON array into the response model
   * @returns A promise that resolves with the parsed response list
   */
  public async responseAsList<T>(parser: ResponseParser<T>): Promise<T[]> {
    const output = await this.responseText();
    const parsed = tryParseJson(output);
    if (!Array.isArray(parsed)) {
      throw new HelmParserException(HelmExecution.MSG_LIST_DESERIALIZATION_ERROR.replace('%s', this.commandLine));
    }

    const items: T[] = [];
    for (const item of parsed) {
      const value = parser(item);
      if (value !== undefined) {
        items.push(value);
      }
    }
    return items;
  }

  /**
   * Executes the command and waits for completion.
   * @returns A promise that resolves when the command completes
   */
  public async call(): Promise<void> {
    await this.responseText();
  }
}
