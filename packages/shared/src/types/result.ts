/**
 * Result type for training log logic: no throwing, explicit error handling.
 *
 * Usage:
 *   const parsed = parseSplit('2:05.3');
 *   if (parsed.ok) {
 *     console.log(parsed.value); // 125.3
 *   } else {
 *     console.log(parsed.error.code); // INVALID_SPLIT_FORMAT
 *   }
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
