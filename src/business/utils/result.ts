// SPDX-License-Identifier: Apache-2.0

/**
 * A discriminated union for success/error results.
 */
export type Result<T, E = string> = {success: true; data: T} | {success: false; error: E};

export function ok<T>(data: T): Result<T, never> {
  return {success: true, data};
}

export function err<E>(error: E): Result<never, E> {
  return {success: false, error};
}

/**
 * Feeds a successful result into the next step; an error passes through untouched.
 */
export function andThen<T, U, E>(result: Result<T, E>, next: (data: T) => Result<U, E>): Result<U, E> {
  return result.success ? next(result.data) : result;
}
