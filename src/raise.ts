/**
 * @module
 * Invocation primitives. `raise` runs a list on the caller's execution context;
 * `raiseAsync` posts the same work to the scheduler and hands back its promise.
 */

import { getRaiserConfig, type RaiserConfig } from './config';
import type { EventArgs, EventHandler, MaybePromise } from './types';

/**
 * Invokes every callback in the list, in order. Does nothing for `undefined`.
 *
 * The first callback to throw stops the invocation and the error propagates
 * to the caller, unless the list was built by `resilient`. If a callback
 * returns a promise, the remaining callbacks run after it settles and a
 * promise is returned; otherwise the whole call is synchronous.
 */
export function raise<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  sender: unknown,
  args: T,
): MaybePromise<void> {
  if (!handler) {
    return undefined;
  }
  return handler(sender, args);
}

export type RaiseAsyncOptions = Partial<Pick<RaiserConfig, 'scheduler' | 'priority'>>;

/**
 * Schedules `raise` on the scheduler and returns a promise for its completion.
 * No fault is suppressed: the promise rejects with whatever the invocation
 * threw, and handling it is up to the caller.
 *
 * @example
 * ```typescript
 * await raiseAsync(onSaved, repository, new SavedArgs('doc-1'));
 * ```
 */
export function raiseAsync<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  sender: unknown,
  args: T,
  options: RaiseAsyncOptions = {},
): Promise<void> {
  const { scheduler, priority } = getRaiserConfig(options);
  return scheduler.postTask<void>(() => raise(handler, sender, args), { priority });
}
