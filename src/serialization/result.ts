import type { BufferError } from "./buffer_error.ts";

/**
 * Outcome of a fallible codec operation. Callers branch on `ok` and, on
 * failure, on `error.kind`.
 */
export type Result<T, E = BufferError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/**
 * Returns the value of a successful result or throws the carried error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
