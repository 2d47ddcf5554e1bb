/**
 * @module
 * Fire-and-forget execution for callback lists. The raiser gets control back
 * immediately; the outcome of the background unit is handed to a continuation
 * as a `Result`, so a failure there is always observed and never surfaces as
 * an unhandled rejection.
 */

import type { Result } from 'neverthrow';
import { defaultRaiserConfig, getRaiserConfig, type Logger, type RaiserConfig } from './config';
import { settle } from './errors';
import { finalizeDecoratedMethod } from './enhancers';
import { describeCallback, elementary, narrowestAccepted, singleton } from './handler';
import { raise } from './raise';
import type { EventArgs, EventHandler } from './types';

/**
 * Runs once a background unit has finished, with its outcome.
 */
export type Continuation = (outcome: Result<void, Error>) => void;

export interface BackgroundOptions extends Partial<RaiserConfig> {
  /** Defaults to `observeFault` on the configured logger. */
  continuation?: Continuation;
}

/** Background work runs at the lowest priority unless configured otherwise. */
const backgroundDefaults: Readonly<RaiserConfig> = Object.freeze({
  ...defaultRaiserConfig,
  priority: 'background',
});

/** Last resort once the logger itself has failed: there is nowhere left to report to. */
const discard = (): void => {};

/**
 * The default continuation: marks a fault as observed, reporting it to
 * `logger` at debug level. Successful outcomes are ignored.
 */
export function observeFault(logger: Logger): Continuation {
  return outcome => {
    if (outcome.isErr()) {
      logger.debug('[background] Observed fault in background invocation', { error: outcome.error });
    }
  };
}

/**
 * Turns a callback list into a callback that schedules the whole list on the
 * scheduler and returns at once. `continuation` receives the outcome when the
 * scheduled unit completes, successfully or not.
 *
 * Unlike the other decorators, an `undefined` input still yields a callback:
 * invoking it schedules a no-op that completes successfully.
 *
 * @example
 * ```typescript
 * const onSaved = background(listeners, {
 *   continuation: outcome => outcome.isErr() && metrics.increment('listener.failed'),
 * });
 * onSaved(repository, args); // returns before any listener runs
 * ```
 */
export function background<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  options: BackgroundOptions = {},
): EventHandler<T> {
  const { scheduler, logger, priority } = getRaiserConfig(options, backgroundDefaults);
  const continuation = options.continuation ?? observeFault(logger);
  const callbacks = handler?.invocationList ?? [];
  const name = `background(${callbacks.map(describeCallback).join(',')})`;

  const schedule = (sender: unknown, args: T): void => {
    void scheduler
      .postTask<Result<void, Error>>(() => settle(() => raise(handler, sender, args)), { priority })
      .then(continuation)
      .catch((error: unknown) => {
        logger.error(`[background] Continuation failed for '${name}'`, { error });
      })
      .catch(discard);
  };

  return singleton(elementary(finalizeDecoratedMethod(schedule, name), narrowestAccepted(callbacks)));
}
