export type Ok<T> = { readonly ok: true; readonly value: T };

export type Err<E> = { readonly ok: false; readonly error: E };

/**
 * Either `Ok` with a success value or `Err` with an error, never both.
 * Narrow on `ok` or use `match`; both are exhaustive over the two variants.
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export type MatchHandlers<T, E, R> = {
  ok: (value: T) => R;
  err: (error: E) => R;
};

export const Ok = <T, E = never>(value: T): Result<T, E> => {
  const result: Ok<T> = { ok: true, value };
  return Object.freeze(result);
};

export const Err = <T = never, E = unknown>(error: E): Result<T, E> => {
  const result: Err<E> = { ok: false, error };
  return Object.freeze(result);
};

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

/**
 * Runtime check for values of unknown origin, e.g. a value handed to an encoder.
 */
export const isResult = (value: unknown): value is Result<unknown, unknown> => {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) return 'value' in value;
  if (value.ok === false) return 'error' in value;
  return false;
};

export const match = <T, E, R>(result: Result<T, E>, handlers: MatchHandlers<T, E, R>): R =>
  result.ok ? handlers.ok(result.value) : handlers.err(result.error);

// Faults thrown by `f` in map/andThen/bind propagate as-is; only `from` captures.
export const map = <T, U, E>(result: Result<T, E>, f: (value: T) => U): Result<U, E> =>
  result.ok ? Ok(f(result.value)) : result;

export const andThen = <T, U, E>(result: Result<T, E>, f: (value: T) => Result<U, E>): Result<U, E> =>
  result.ok ? f(result.value) : result;

/**
 * `andThen` with a projection that sees both the original and the bound value,
 * so several bindings can be combined without nesting.
 *
 * @example
 * ```typescript
 * bind(parse('6'), n => divide(n, 2), (n, half) => `${n}/2 = ${half}`)
 * // Ok('6/2 = 3')
 * ```
 */
export const bind = <T, U, V, E>(
  result: Result<T, E>,
  f: (value: T) => Result<U, E>,
  project: (value: T, bound: U) => V
): Result<V, E> => {
  if (!result.ok) return result;
  const bound = f(result.value);
  return bound.ok ? Ok(project(result.value, bound.value)) : bound;
};

export const fromNullable = <T, E>(value: T | null | undefined, errorIfNull: E): Result<T, E> =>
  value === null || value === undefined ? Err(errorIfNull) : Ok(value);

/**
 * Runs an operation that may throw and captures the fault as `Err(toError(fault))`.
 */
export const from = <T, E>(operation: () => T, toError: (fault: unknown) => E): Result<T, E> => {
  try {
    return Ok(operation());
  } catch (fault) {
    return Err(toError(fault));
  }
};
