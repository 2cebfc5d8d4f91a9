// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';

// NOTE: DO NOT add any fleetgen imports in this file to avoid circular dependencies

/**
 * Generic type for representing optional types
 */
export type Optional<T> = T | undefined;

/**
 * Interface for capsuling validating for class's own properties
 */
export interface Validate {
  /**
   * Validates all properties of the class and throws if data is invalid
   */
  validate(): void;
}

/**
 * Interface for converting a class to a plain object.
 */
export interface ToObject<T> {
  /**
   * Converts the class instance to a plain object.
   *
   * @returns the plain object representation of the class.
   */
  toObject(): T;
}

// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export type CommandDefinition = CommandModule<{}, {}>;
