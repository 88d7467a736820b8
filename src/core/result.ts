export type Ok<T> = { ok: true; value: T }
export type Err<E> = { ok: false; error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

/** Returns the value, or `fallback` after handing the error to `onError`. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T, onError?: (error: E) => void): T {
  if (result.ok) return result.value
  onError?.(result.error)
  return fallback
}
