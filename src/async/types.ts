import type { MatchHandlers, Result } from '../shared/result.js';

// A Result now, or one that arrives later
export type Deferred<T, E> = Result<T, E> | PromiseLike<Result<T, E>>;

export type MapStep<T, U> = (value: T) => U | PromiseLike<U>;

export type AndThenStep<T, U, E> = (value: T) => Deferred<U, E>;

// Fluent wrapper over a deferred Result; awaiting it yields the Result itself
export type AsyncResultChain<T, E> = PromiseLike<Result<T, E>> & {
  map: <U>(f: MapStep<T, U>) => AsyncResultChain<Awaited<U>, E>;
  andThen: <U>(f: AndThenStep<T, U, E>) => AsyncResultChain<U, E>;
  bind: <U, V>(f: AndThenStep<T, U, E>, project: (value: T, bound: U) => V) => AsyncResultChain<V, E>;
  match: <R>(handlers: MatchHandlers<T, E, R>) => Promise<R>;
};

// Combinators bound to one error type and its FromException capability
export type AsyncResult<E> = {
  settle: <T>(deferred: Deferred<T, E>) => Promise<Result<T, E>>;
  map: <T, U>(deferred: Deferred<T, E>, f: MapStep<T, U>) => Promise<Result<Awaited<U>, E>>;
  andThen: <T, U>(deferred: Deferred<T, E>, f: AndThenStep<T, U, E>) => Promise<Result<U, E>>;
  bind: <T, U, V>(
    deferred: Deferred<T, E>,
    f: AndThenStep<T, U, E>,
    project: (value: T, bound: U) => V
  ) => Promise<Result<V, E>>;
  match: <T, R>(deferred: Deferred<T, E>, handlers: MatchHandlers<T, E, R>) => Promise<R>;
  chain: <T>(deferred: Deferred<T, E>) => AsyncResultChain<T, E>;
};
