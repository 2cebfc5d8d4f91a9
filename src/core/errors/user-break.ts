// SPDX-License-Identifier: Apache-2.0

import {FleetError} from './fleet-error.js';

export class UserBreak extends FleetError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
