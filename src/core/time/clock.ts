// SPDX-License-Identifier: Apache-2.0

/**
 * Source of the current instant, injected so that cache expiry can be driven from tests.
 */
export interface Clock {
  now(): Date;
}

export const SYSTEM_CLOCK: Clock = {
  now: (): Date => new Date(),
};
