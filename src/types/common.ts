/**
 * Common Types
 *
 * Shared types used across modules.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

/** Injectable fetch, defaults to the guarded global fetch. */
export type FetchFn = typeof fetch
