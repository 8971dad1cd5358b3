export type Ok<T> = {
  ok: true
  value: T
}

export type Err<E> = {
  ok: false
  error: E
}

/**
 * Outcome of an operation that fails in an expected way. Callers branch on
 * `ok` instead of catching.
 */
export type Result<T, E = Error> = Ok<T> | Err<E>
