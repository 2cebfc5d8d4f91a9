// SPDX-License-Identifier: Apache-2.0

import {FleetError} from './fleet-error.js';

/**
 * Raised when user supplied chart values cannot be read as a YAML mapping. Resolution stops instead of generating
 * artifacts with empty values.
 */
export class ValuesParseError extends FleetError {
  public constructor(
    public readonly parserMessage: string,
    cause?: unknown,
  ) {
    super(`Error parsing values: ${parserMessage}`, cause, {parserMessage});
  }
}
