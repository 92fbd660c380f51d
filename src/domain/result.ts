/**
 * Outcome of an operation whose failure is an expected, ordinary case
 * (wrong password, expired token, taken email). Unexpected failures are
 * still thrown.
 */
export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });
