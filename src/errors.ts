/**
 * @module
 * Error types raised by the combinators, plus the `Result`-based fault channel
 * that `resilient`, `parallel` and `background` use to observe each invocation
 * without letting it throw.
 */

import { type Result, ok, err } from 'neverthrow';
import type { ElementaryCallback, EventArgs, EventArgsType, MaybePromise } from './types';

// =================================================================
// Section 1: Error Types
// =================================================================

/**
 * Thrown by `adapt` (and returned by `tryAdapt`) when a value cannot be used
 * as an `EventHandler<T>`: it is not callable, declares too many parameters,
 * or accepts event data that does not cover `T`.
 */
export class SignatureMismatchError extends Error {
  public readonly _tag = 'SignatureMismatchError' as const;
  /** The event data type the adaptation targeted. */
  public readonly eventType: EventArgsType;
  public readonly callbackName: string;

  constructor(eventType: EventArgsType, callbackName: string) {
    super(`The signature of '${callbackName}' is incompatible with EventHandler<${eventType.name}>.`);
    this.name = 'SignatureMismatchError';
    this.eventType = eventType;
    this.callbackName = callbackName;
    Object.setPrototypeOf(this, SignatureMismatchError.prototype);
  }
}

/**
 * A single callback failure, paired with the callback that produced it.
 */
export interface HandlerFault<T extends EventArgs = EventArgs> {
  readonly callback: ElementaryCallback<T>;
  readonly error: Error;
}

/**
 * Raised by a `parallel` handler once every unit of work has finished and at
 * least one of them failed. `errors` lists the failures in invocation-list
 * order; `faults` additionally names the callback behind each one.
 */
export class AggregateHandlerError<T extends EventArgs = EventArgs> extends AggregateError {
  public readonly _tag = 'AggregateHandlerError' as const;
  public readonly faults: ReadonlyArray<HandlerFault<T>>;

  constructor(faults: ReadonlyArray<HandlerFault<T>>) {
    const count = faults.length;
    super(
      faults.map(fault => fault.error),
      `Parallel invocation failed in ${count} callback${count === 1 ? '' : 's'}.`,
    );
    this.name = 'AggregateHandlerError';
    this.faults = faults;
    Object.setPrototypeOf(this, AggregateHandlerError.prototype);
  }
}

// =================================================================
// Section 2: Fault Channel
// =================================================================

/**
 * Normalizes anything thrown into an `Error`. Non-`Error` values are wrapped
 * with their string form as the message; a value with no usable string form
 * becomes `Unknown error`, kept as the `cause`. Never throws.
 */
export function toError(caughtError: unknown): Error {
  if (caughtError instanceof Error) {
    return caughtError;
  }
  if (caughtError === undefined) {
    return new Error('Unknown error');
  }
  try {
    return new Error(String(caughtError));
  } catch {
    // e.g. Object.create(null), or a toString that throws
    return new Error('Unknown error', { cause: caughtError });
  }
}

/**
 * Runs an invocation and captures its outcome as a `Result` instead of letting
 * it throw or reject. Synchronous invocations settle synchronously; an
 * invocation that returns a promise settles once that promise does.
 *
 * @example
 * ```typescript
 * const outcome = settle(() => handler(sender, args));
 * if (!(outcome instanceof Promise) && outcome.isErr()) {
 *   logger.warn('handler failed', outcome.error);
 * }
 * ```
 */
export function settle(invocation: () => MaybePromise<void>): MaybePromise<Result<void, Error>> {
  let pending: MaybePromise<void>;
  try {
    pending = invocation();
  } catch (error) {
    return err(toError(error));
  }

  if (pending instanceof Promise) {
    return pending.then(
      (): Result<void, Error> => ok(undefined),
      (error: unknown): Result<void, Error> => err(toError(error)),
    );
  }
  return ok(undefined);
}
