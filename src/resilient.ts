/**
 * @module
 * Fault isolation for callback lists. A resilient list attempts every callback
 * exactly once per invocation, in order, whatever the earlier ones did.
 */

import type { Result } from 'neverthrow';
import { getRaiserConfig, type Logger } from './config';
import { settle } from './errors';
import { finalizeDecoratedMethod } from './enhancers';
import { describeCallback, elementary, fromInvocationList, invoke } from './handler';
import type {
  ElementaryCallback,
  EventArgs,
  EventHandler,
  ExceptionHandler,
  MaybePromise,
} from './types';

/**
 * The default `ExceptionHandler`: the error is discarded.
 */
export const ignoreFault = (): void => {};

export interface ResilientOptions {
  logger?: Logger;
}

/**
 * Wraps each elementary callback so that an error it throws, or a promise it
 * rejects, is delivered to `onFault` together with the original callback
 * instead of reaching the raiser. The returned list has the same length and
 * order as `handler`.
 *
 * @param handler The list to protect. `undefined` yields `undefined`.
 * @param onFault Receives each suppressed error. Defaults to `ignoreFault`.
 *
 * @example
 * ```typescript
 * const onSaved = resilient(listeners, (callback, error) => {
 *   logger.warn(`listener ${callback.method.name} failed`, error);
 * });
 * raise(onSaved, repository, args); // never throws because of a listener
 * ```
 */
export function resilient<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  onFault: ExceptionHandler<T> = ignoreFault,
  options: ResilientOptions = {},
): EventHandler<T> | undefined {
  if (!handler) {
    return undefined;
  }
  const { logger } = getRaiserConfig(options);
  return fromInvocationList(handler.invocationList.map(callback => isolate(callback, onFault, logger)));
}

function isolate<T extends EventArgs>(
  callback: ElementaryCallback<T>,
  onFault: ExceptionHandler<T>,
  logger: Logger,
): ElementaryCallback<T> {
  const name = describeCallback(callback);

  const report = (outcome: Result<void, Error>): void => {
    if (outcome.isErr()) {
      logger.debug(`[resilient] Suppressed fault in '${name}'`, { error: outcome.error });
      onFault(callback, outcome.error);
    }
  };

  const guarded = (sender: unknown, args: T): MaybePromise<void> => {
    const outcome = settle(() => invoke(callback, sender, args));
    if (outcome instanceof Promise) {
      return outcome.then(report);
    }
    report(outcome);
    return undefined;
  };

  return elementary(finalizeDecoratedMethod(guarded, `resilient(${name})`), callback.accepts);
}
