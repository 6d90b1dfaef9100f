/**
 * Capability an error type provides to take part in asynchronous chains:
 * turn any thrown value into an instance of that error type.
 *
 * Implement it on the error type's companion object:
 *
 * @example
 * ```typescript
 * type DbError = { kind: 'db'; message: string }
 * const DbError: FromException<DbError> = {
 *   fromException: fault => ({ kind: 'db', message: toError(fault).message }),
 * }
 * ```
 */
export type FromException<E> = {
  readonly fromException: (fault: unknown) => E;
};

export const toError = (fault: unknown): Error => {
  if (fault instanceof Error) return fault;
  if (typeof fault === 'string') return new Error(fault);
  return new Error(`Non-error value thrown: ${String(fault)}`);
};

export const errorFromException: FromException<Error> = {
  fromException: toError,
};
