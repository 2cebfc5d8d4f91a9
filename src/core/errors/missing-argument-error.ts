// SPDX-License-Identifier: Apache-2.0

import {FleetError} from './fleet-error.js';

export class MissingArgumentError extends FleetError {
  /**
   * Create a custom error for missing argument scenario
   *
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
