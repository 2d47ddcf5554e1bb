/**
 * @module
 * Concurrent fan-out for callback lists. Each elementary callback is posted to
 * the scheduler as its own unit of work; the caller is released once every
 * unit has finished.
 */

import type { Result } from 'neverthrow';
import { getRaiserConfig, type RaiserConfig } from './config';
import { AggregateHandlerError, settle, type HandlerFault } from './errors';
import { finalizeDecoratedMethod } from './enhancers';
import { describeCallback, elementary, invoke, narrowestAccepted, singleton } from './handler';
import type { EventArgs, EventHandler } from './types';

export type ParallelOptions = Partial<RaiserConfig>;

/**
 * Turns a callback list into a single callback that runs every entry
 * concurrently with the same `(sender, args)` and resolves once all of them
 * have completed. Nothing is guaranteed about the order in which entries run.
 *
 * Faults are not isolated: if any entry fails, the returned promise rejects
 * with an `AggregateHandlerError` holding every fault, but only after all
 * entries have finished. Apply `resilient` first to suppress individual faults.
 *
 * @param handler The list to fan out. `undefined` yields `undefined`.
 *
 * @example
 * ```typescript
 * const notifyAll = parallel(resilient(subscribers));
 * await raise(notifyAll, feed, new PostedArgs(post));
 * ```
 */
export function parallel<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  options: ParallelOptions = {},
): EventHandler<T> | undefined {
  if (!handler) {
    return undefined;
  }

  const { scheduler, logger, priority } = getRaiserConfig(options);
  const callbacks = handler.invocationList;
  const name = `parallel(${callbacks.map(describeCallback).join(',')})`;

  const fanOut = async (sender: unknown, args: T): Promise<void> => {
    logger.debug(`[parallel] Dispatching ${callbacks.length} callback(s) for '${name}'`);
    const outcomes = await Promise.all(
      callbacks.map(callback => scheduler.postTask<Result<void, Error>>(() => settle(() => invoke(callback, sender, args)), { priority })),
    );

    const faults: Array<HandlerFault<T>> = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.isErr()) {
        faults.push({ callback: callbacks[index], error: outcome.error });
      }
    });

    if (faults.length > 0) {
      logger.debug(`[parallel] ${faults.length} of ${callbacks.length} callback(s) failed in '${name}'`);
      throw new AggregateHandlerError(faults);
    }
  };

  return singleton(elementary(finalizeDecoratedMethod(fanOut, name), narrowestAccepted(callbacks)));
}
