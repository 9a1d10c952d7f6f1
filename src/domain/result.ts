/**
 * Structured operation results.
 *
 * Component boundaries return these instead of throwing, so callers can
 * distinguish a recorded failure from a successful outcome by shape alone.
 */

import { TypedError } from './errors';

export type Result<T> =
  | { success: true; value: T }
  | { success: false; error: TypedError };

export function ok<T>(value: T): Result<T> {
  return { success: true, value };
}

export function fail<T = never>(error: TypedError): Result<T> {
  return { success: false, error };
}
