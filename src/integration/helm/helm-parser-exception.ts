// SPDX-License-Identifier: Apache-2.0

/**
 * Exception thrown when the output of a successful Helm command cannot be read.
 */
export class HelmParserException extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'HelmParserException';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
