/**
 * @module
 * Adaptation of callback-shaped values into typed callback lists. Compatibility
 * is verified per elementary callback: a callback may only be typed for `T` if
 * the event data it accepts is `T` or a supertype of `T`.
 */

import { type Result, ok, err } from 'neverthrow';
import { combine } from './combine';
import { SignatureMismatchError } from './errors';
import {
  describeCallback,
  elementary,
  isAssignableArgs,
  isEventHandler,
  singleton,
} from './handler';
import {
  EventArgs,
  type ElementaryCallback,
  type EventArgsType,
  type EventHandler,
  type HandlerMethod,
} from './types';

/** `(sender, args)`: anything declaring more parameters cannot be a handler. */
const MAX_PARAMETERS = 2;

/**
 * An object whose `handleEvent` method receives the notification, with the
 * object itself as `this`.
 */
export interface HandlerObject {
  handleEvent: HandlerMethod<never>;
}

/** Class constructors are functions too, but throw unless called with `new`. */
const CLASS_SOURCE = /^class[\s{]/;

function isHandlerMethod(value: unknown): value is HandlerMethod<never> {
  return (
    typeof value === 'function' &&
    value.length <= MAX_PARAMETERS &&
    !CLASS_SOURCE.test(Function.prototype.toString.call(value))
  );
}

function isHandlerObject(value: unknown): value is HandlerObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    'handleEvent' in value &&
    isHandlerMethod(value.handleEvent)
  );
}

function isCompatible<T extends EventArgs>(
  callback: ElementaryCallback<never>,
  eventType: EventArgsType<T>,
): callback is ElementaryCallback<T> {
  return isHandlerMethod(callback.method) && isAssignableArgs(eventType, callback.accepts);
}

/**
 * The elementary callbacks a value stands for, or `undefined` if it is not
 * callback-shaped at all. Plain functions and handler objects carry no type
 * information and are taken to accept the target type.
 */
function elementsOf(
  callback: unknown,
  eventType: EventArgsType,
): ReadonlyArray<ElementaryCallback<never>> | undefined {
  if (isEventHandler(callback)) {
    return callback.invocationList;
  }
  if (isHandlerMethod(callback)) {
    return [elementary(callback, eventType)];
  }
  if (isHandlerObject(callback)) {
    return [elementary(callback.handleEvent, eventType, callback)];
  }
  return undefined;
}

function describeValue(value: unknown): string {
  if (typeof value === 'function') {
    return value.name || 'anonymous';
  }
  return typeof value;
}

/**
 * Converts a callback-shaped value into an `EventHandler<T>`, returning a
 * `SignatureMismatchError` instead of throwing when it is incompatible.
 *
 * - `undefined` / `null` adapt to `undefined`.
 * - An existing callback list is converted entry by entry and re-combined in
 *   order; the entries themselves are reused, so the invocation list is equal.
 * - A plain function of at most two parameters becomes a single entry.
 * - A `{ handleEvent }` object becomes a single entry bound to that object.
 *
 * Any incompatible entry fails the whole adaptation; no partial list is returned.
 *
 * @example
 * ```typescript
 * const result = tryAdapt(SavedArgs, registeredCallback);
 * if (result.isErr()) {
 *   logger.warn(result.error.message);
 * }
 * ```
 */
export function tryAdapt<T extends EventArgs>(
  eventType: EventArgsType<T>,
  callback: unknown,
): Result<EventHandler<T> | undefined, SignatureMismatchError> {
  if (callback === undefined || callback === null) {
    return ok(undefined);
  }

  const entries = elementsOf(callback, eventType);
  if (!entries) {
    return err(new SignatureMismatchError(eventType, describeValue(callback)));
  }

  const adapted: Array<EventHandler<T>> = [];
  for (const entry of entries) {
    if (!isCompatible(entry, eventType)) {
      return err(new SignatureMismatchError(eventType, describeCallback(entry)));
    }
    adapted.push(singleton(entry));
  }
  return ok(combine(adapted));
}

/**
 * Converts a callback-shaped value into an `EventHandler<T>`.
 *
 * @throws {SignatureMismatchError} If the value, or any entry of it, is not
 *         compatible with `(sender, args: T)`.
 */
export function adapt<T extends EventArgs>(
  eventType: EventArgsType<T>,
  callback: unknown,
): EventHandler<T> | undefined {
  const result = tryAdapt(eventType, callback);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Retypes a list typed for a supertype `S` as a list for the subtype `T`.
 * Always succeeds when `T` really derives from `S`.
 */
export function adaptContravariant<S extends EventArgs, T extends S>(
  handler: EventHandler<S> | undefined,
  eventType: EventArgsType<T>,
): EventHandler<T> | undefined {
  return adapt(eventType, handler);
}

/**
 * Adapts a callback to the base `EventArgs` type.
 */
export function toGeneric(callback: unknown): EventHandler<EventArgs> | undefined {
  return adapt(EventArgs, callback);
}
