/**
 * @module
 * Configuration for the combinators. Settings are resolved from explicit
 * per-call options first, then from the ambient configuration installed with
 * `withRaiserConfig`, then from the library defaults.
 */

import { createContext as createUnctx } from 'unctx';
import { AsyncLocalStorage } from 'node:async_hooks';
import { scheduler as defaultScheduler, type Scheduler, type TaskPriority } from './scheduler';

/**
 * Logger interface for diagnostic output.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface RaiserConfig {
  /** Where `parallel`, `background` and `raiseAsync` post their work. */
  scheduler: Scheduler;
  logger: Logger;
  /** Priority used when an operation does not name its own. */
  priority: TaskPriority;
}

export const defaultRaiserConfig: Readonly<RaiserConfig> = Object.freeze({
  scheduler: defaultScheduler,
  logger: noopLogger,
  priority: 'user-visible',
});

const configContext = createUnctx<Partial<RaiserConfig>>({ asyncContext: true, AsyncLocalStorage });

/**
 * Returns the configuration in effect: `overrides` win over the ambient
 * configuration, which wins over `defaults`. An operation with defaults of
 * its own (such as `background`'s priority) passes them as `defaults`.
 */
export function getRaiserConfig(
  overrides: Partial<RaiserConfig> = {},
  defaults: Readonly<RaiserConfig> = defaultRaiserConfig,
): RaiserConfig {
  const ambient = configContext.tryUse() ?? {};
  return {
    scheduler: overrides.scheduler ?? ambient.scheduler ?? defaults.scheduler,
    logger: overrides.logger ?? ambient.logger ?? defaults.logger,
    priority: overrides.priority ?? ambient.priority ?? defaults.priority,
  };
}

/**
 * Runs `fn` with `config` layered over the current ambient configuration.
 * Decorators created inside `fn`, including after an `await`, pick it up.
 * Calls may be nested; the innermost value of each setting wins.
 *
 * @example
 * ```typescript
 * const onSaved = await withRaiserConfig({ logger: console }, () =>
 *   background(resilient(listeners)),
 * );
 * ```
 */
export function withRaiserConfig<R>(config: Partial<RaiserConfig>, fn: () => R | Promise<R>): Promise<R> {
  const merged: Partial<RaiserConfig> = { ...(configContext.tryUse() ?? {}), ...definedEntries(config) };
  return configContext.callAsync(merged, async () => fn());
}

function definedEntries(config: Partial<RaiserConfig>): Partial<RaiserConfig> {
  const result: Partial<RaiserConfig> = {};
  if (config.scheduler) result.scheduler = config.scheduler;
  if (config.logger) result.logger = config.logger;
  if (config.priority) result.priority = config.priority;
  return result;
}
