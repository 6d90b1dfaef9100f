import { Ok, Err, match as matchResult, type MatchHandlers, type Result } from '../shared/result.js';
import { toError as asError, type FromException } from '../shared/fault.js';
import { logger } from '../shared/logger.js';
import type { AndThenStep, AsyncResult, AsyncResultChain, Deferred, MapStep } from './types.js';

/**
 * Builds the asynchronous combinators for one error type.
 *
 * Every combinator is fault-capturing: a rejected input, or a continuation that
 * throws or rejects, resolves to `Err(errorType.fromException(fault))` instead of
 * rejecting. Once a step yields `Err`, later steps are not invoked.
 *
 * @example
 * ```typescript
 * const AppResult = createAsyncResult(AppError)
 *
 * const message = await AppResult.chain(getOrder(id))
 *   .andThen(order => getUser(order.userId))
 *   .map(user => `Hello ${user.name}`)
 *   .match({ ok: text => text, err: describeAppError })
 * ```
 */
export const createAsyncResult = <E>(errorType: FromException<E>): AsyncResult<E> => {
  const capture = <T>(step: string, fault: unknown): Result<T, E> => {
    logger.debug(`[AsyncResult] Captured fault in ${step}: ${asError(fault).message}`);
    return Err(errorType.fromException(fault));
  };

  const settle = async <T>(deferred: Deferred<T, E>): Promise<Result<T, E>> => {
    try {
      return await deferred;
    } catch (fault) {
      return capture('settle', fault);
    }
  };

  const map = async <T, U>(deferred: Deferred<T, E>, f: MapStep<T, U>): Promise<Result<Awaited<U>, E>> => {
    try {
      const result = await deferred;
      if (!result.ok) return result;
      return Ok(await f(result.value));
    } catch (fault) {
      return capture('map', fault);
    }
  };

  const andThen = async <T, U>(deferred: Deferred<T, E>, f: AndThenStep<T, U, E>): Promise<Result<U, E>> => {
    try {
      const result = await deferred;
      if (!result.ok) return result;
      return await f(result.value);
    } catch (fault) {
      return capture('andThen', fault);
    }
  };

  const bind = async <T, U, V>(
    deferred: Deferred<T, E>,
    f: AndThenStep<T, U, E>,
    project: (value: T, bound: U) => V
  ): Promise<Result<V, E>> => {
    try {
      const result = await deferred;
      if (!result.ok) return result;
      const bound = await f(result.value);
      if (!bound.ok) return bound;
      return Ok(project(result.value, bound.value));
    } catch (fault) {
      return capture('bind', fault);
    }
  };

  const match = async <T, R>(deferred: Deferred<T, E>, handlers: MatchHandlers<T, E, R>): Promise<R> => {
    try {
      const result = await deferred;
      return matchResult(result, handlers);
    } catch (fault) {
      logger.debug(`[AsyncResult] Captured fault in match: ${asError(fault).message}`);
      return handlers.err(errorType.fromException(fault));
    }
  };

  const chain = <T>(deferred: Deferred<T, E>): AsyncResultChain<T, E> => {
    const settled = settle(deferred);
    return {
      map: (f) => chain(map(settled, f)),
      andThen: (f) => chain(andThen(settled, f)),
      bind: (f, project) => chain(bind(settled, f, project)),
      match: (handlers) => match(settled, handlers),
      then: (onfulfilled, onrejected) => settled.then(onfulfilled, onrejected),
    };
  };

  return {
    settle,
    map,
    andThen,
    bind,
    match,
    chain,
  };
};

/**
 * Awaits an operation that produces a plain value and captures a throw or
 * rejection as `Err(toError(fault))`. Needs no FromException capability.
 */
export const fromAsync = async <T, E>(
  operation: () => PromiseLike<T>,
  toError: (fault: unknown) => E
): Promise<Result<Awaited<T>, E>> => {
  try {
    return Ok(await operation());
  } catch (fault) {
    return Err(toError(fault));
  }
};

// Same as fromAsync for an operation that already returns a Result
export const fromAsyncResult = async <T, E>(
  operation: () => PromiseLike<Result<T, E>>,
  toError: (fault: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return await operation();
  } catch (fault) {
    return Err(toError(fault));
  }
};
