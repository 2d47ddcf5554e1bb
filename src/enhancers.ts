/**
 * @module HandlerDecoratorUtils
 * Utilities for authoring and composing decorators. A decorator takes a
 * callback list and returns a new one with the same external shape but
 * different execution semantics (`resilient`, `parallel`, `background`).
 *
 * - `finalizeDecoratedMethod`: gives the method built by a decorator a
 *   descriptive `name`, so diagnostics and logs can tell decorated callbacks apart.
 * - `composeDecorators` / `decorate`: combine several decorators into one.
 */

import type { EventArgs, EventHandler, HandlerMethod } from './types';

// =================================================================
// Section 1: Finalizing Decorated Methods
// =================================================================

/**
 * Sets the human-readable name of a method produced by a decorator.
 * Include the decorated callback's name and the nature of the decoration,
 * e.g. `resilient(onSaved)`.
 */
export function finalizeDecoratedMethod<T extends EventArgs>(
  method: HandlerMethod<T>,
  name: string,
): HandlerMethod<T> {
  Object.defineProperty(method, 'name', {
    value: name,
    configurable: true, // Allows it to be changed again if further decorated
    writable: false,
    enumerable: false,
  });
  return method;
}

// =================================================================
// Section 2: Composing Decorators
// =================================================================

/**
 * A function from callback list to callback list. `undefined` stands for
 * "no callback" on both sides.
 */
export type Decorator<T extends EventArgs> = (
  handler: EventHandler<T> | undefined,
) => EventHandler<T> | undefined;

/**
 * Composes multiple decorators into a single decorator, applied right to left:
 * the last decorator wraps the list first (innermost), the first wraps last.
 *
 * @example
 * ```typescript
 * const isolated = (h?: EventHandler<SavedArgs>) => resilient(h);
 * const fanOut = (h?: EventHandler<SavedArgs>) => parallel(h);
 *
 * // Equivalent to: handler => fanOut(isolated(handler))
 * const safeFanOut = composeDecorators(fanOut, isolated);
 * ```
 */
export function composeDecorators<T extends EventArgs>(...decorators: Array<Decorator<T>>): Decorator<T> {
  if (decorators.length === 0) {
    return handler => handler;
  }
  if (decorators.length === 1) {
    return decorators[0];
  }
  return decorators.reduce((a, b) => handler => a(b(handler)));
}

/**
 * Applies decorators to a callback list left to right.
 */
export function decorate<T extends EventArgs>(
  handler: EventHandler<T> | undefined,
  ...decorators: Array<Decorator<T>>
): EventHandler<T> | undefined {
  return decorators.reduce<EventHandler<T> | undefined>((decorated, decorator) => decorator(decorated), handler);
}
