// SPDX-License-Identifier: Apache-2.0

/**
 * Exception thrown when the execution of the Helm executable fails.
 */
export class HelmExecutionException extends Error {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = 'Execution of the Helm command failed: %s';

  /**
   * Constructs a new exception instance.
   * @param commandLine The helm command line that failed
   * @param output The diagnostic text captured from the process
   */
  public constructor(
    public readonly commandLine: string,
    public readonly output: string,
  ) {
    super(HelmExecutionException.DEFAULT_MESSAGE.replace('%s', commandLine));
    this.name = 'HelmExecutionException';
  }

  /**
   * Returns a string representation of the exception.
   * @returns A string representation of the exception
   */
  public override toString(): string {
    return `HelmExecutionException{message=${this.message}, output='${this.output}'}`;
  }
}
