/**
 * @module
 * Core type definitions shared by every combinator: the event-data hierarchy,
 * elementary callbacks, and the multicast `EventHandler` they form.
 */

// =================================================================
// Section 1: Event Data
// =================================================================

/**
 * Base class of all event data. Subclass it to carry the payload of a
 * specific event; handlers are typed by the most specific subclass they accept.
 */
export class EventArgs {
  /** Shared instance for events that carry no data. */
  static readonly empty: EventArgs = new EventArgs();
}

/**
 * The constructor of an `EventArgs` subclass. It is the runtime token for `T`
 * used wherever parameter compatibility has to be verified rather than assumed.
 */
export type EventArgsType<T extends EventArgs = EventArgs> = abstract new (...args: never[]) => T;

export type MaybePromise<T> = T | Promise<T>;

// =================================================================
// Section 2: Callbacks
// =================================================================

/**
 * The raw notification shape. A method may finish synchronously or return a
 * promise; the invocation of a list waits for it before moving on.
 */
export type HandlerMethod<T extends EventArgs> = (sender: unknown, args: T) => MaybePromise<void>;

/**
 * One registered callback: a method together with the receiver it is bound to.
 */
export interface ElementaryCallback<T extends EventArgs> {
  /** The receiver passed as `this` when `method` runs. */
  readonly target: unknown;
  readonly method: HandlerMethod<T>;
  /** The most specific `EventArgs` subclass `method` accepts. */
  readonly accepts: EventArgsType;
}

/**
 * An ordered, non-empty list of elementary callbacks that is itself callable.
 * The absence of any callback is `undefined`, never an empty list.
 *
 * @template T The event data type this list is invoked with.
 */
export interface EventHandler<T extends EventArgs> {
  (sender: unknown, args: T): MaybePromise<void>;
  readonly invocationList: ReadonlyArray<ElementaryCallback<T>>;
}

/**
 * Receives errors caught by `resilient`, along with the original callback
 * that raised them.
 */
export type ExceptionHandler<T extends EventArgs> = (callback: ElementaryCallback<T>, error: Error) => void;
