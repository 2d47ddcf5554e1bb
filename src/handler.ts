/**
 * @module
 * Construction and invocation of callback lists. Every `EventHandler` in the
 * library is built here, from a frozen invocation list, so that "no callback"
 * can stay `undefined` and a list can always be told apart from a plain function.
 */

import {
  EventArgs,
  type ElementaryCallback,
  type EventArgsType,
  type EventHandler,
  type HandlerMethod,
  type MaybePromise,
} from './types';

const handlers = new WeakSet<object>();

// =================================================================
// Section 1: Building Callback Lists
// =================================================================

/**
 * Creates an elementary callback: `method` bound to `target`, accepting
 * event data of type `accepts` (or any subclass of it).
 */
export function elementary<T extends EventArgs>(
  method: HandlerMethod<T>,
  accepts: EventArgsType,
  target?: unknown,
): ElementaryCallback<T> {
  return Object.freeze({ target, method, accepts });
}

/**
 * Builds a callback list from its elementary callbacks, in order.
 * An empty list yields `undefined`.
 */
export function fromInvocationList<T extends EventArgs>(
  list: ReadonlyArray<ElementaryCallback<T>>,
): EventHandler<T> | undefined {
  if (list.length === 0) {
    return undefined;
  }
  return buildHandler(list);
}

/**
 * Builds a single-entry callback list.
 */
export function singleton<T extends EventArgs>(callback: ElementaryCallback<T>): EventHandler<T> {
  return buildHandler([callback]);
}

/**
 * Defines a typed callback list holding one method, bound to `target` when given.
 *
 * @example
 * ```typescript
 * class SavedArgs extends EventArgs {
 *   constructor(readonly id: string) { super(); }
 * }
 *
 * const onSaved = defineHandler(SavedArgs, (sender, args) => {
 *   audit.record(args.id);
 * });
 * raise(onSaved, repository, new SavedArgs('doc-1'));
 * ```
 */
export function defineHandler<T extends EventArgs>(
  eventType: EventArgsType<T>,
  method: HandlerMethod<T>,
  target?: unknown,
): EventHandler<T> {
  return singleton(elementary(method, eventType, target));
}

/**
 * Tells whether a value is a callback list built by this library.
 */
export function isEventHandler(value: unknown): value is EventHandler<never> {
  return typeof value === 'function' && handlers.has(value);
}

function buildHandler<T extends EventArgs>(list: ReadonlyArray<ElementaryCallback<T>>): EventHandler<T> {
  const invocationList = Object.freeze([...list]);
  const multicast = (sender: unknown, args: T): MaybePromise<void> => invokeFrom(invocationList, 0, sender, args);

  Object.defineProperty(multicast, 'name', {
    value: invocationList.length === 1
      ? describeCallback(invocationList[0])
      : `multicast(${invocationList.map(describeCallback).join(',')})`,
    configurable: true,
  });

  const handler = Object.freeze(Object.assign(multicast, { invocationList }));
  handlers.add(handler);
  return handler;
}

// =================================================================
// Section 2: Invocation
// =================================================================

/**
 * Invokes one elementary callback with its bound receiver.
 */
export function invoke<T extends EventArgs>(
  callback: ElementaryCallback<T>,
  sender: unknown,
  args: T,
): MaybePromise<void> {
  return callback.method.call(callback.target, sender, args);
}

/**
 * Invokes the callbacks from `start` onwards, strictly in order. The walk stays
 * synchronous until a callback returns a promise; the rest then run after it settles.
 * A throw or rejection stops the walk and propagates.
 */
function invokeFrom<T extends EventArgs>(
  list: ReadonlyArray<ElementaryCallback<T>>,
  start: number,
  sender: unknown,
  args: T,
): MaybePromise<void> {
  for (let index = start; index < list.length; index++) {
    const pending = invoke(list[index], sender, args);
    if (pending instanceof Promise) {
      return pending.then(() => invokeFrom(list, index + 1, sender, args));
    }
  }
  return undefined;
}

// =================================================================
// Section 3: Inspection
// =================================================================

export function describeCallback<T extends EventArgs>(callback: ElementaryCallback<T>): string {
  return callback.method.name || 'anonymous';
}

/**
 * Whether event data of type `type` can be handed to a callback accepting `accepted`.
 */
export function isAssignableArgs(type: EventArgsType, accepted: EventArgsType): boolean {
  return type === accepted || type.prototype instanceof accepted;
}

/**
 * The most derived event data type accepted across a list. Since every entry
 * of an `EventHandler<T>` accepts a supertype of `T`, this is the narrowest
 * type the list as a whole can be invoked with.
 */
export function narrowestAccepted<T extends EventArgs>(list: ReadonlyArray<ElementaryCallback<T>>): EventArgsType {
  return list.reduce<EventArgsType>(
    (narrowest, callback) => (isAssignableArgs(callback.accepts, narrowest) ? callback.accepts : narrowest),
    EventArgs,
  );
}
