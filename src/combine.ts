/**
 * @module
 * Composition of callback lists. `undefined` ("no callback") is the identity
 * element: it never contributes entries and never replaces a defined operand.
 */

import { fromInvocationList } from './handler';
import type { EventArgs, EventHandler } from './types';

/**
 * Concatenates two callback lists. If either side is `undefined` the other
 * is returned unchanged, so no new list is allocated.
 */
export function append<T extends EventArgs>(
  first: EventHandler<T> | undefined,
  second: EventHandler<T> | undefined,
): EventHandler<T> | undefined {
  if (!first) return second;
  if (!second) return first;
  return fromInvocationList([...first.invocationList, ...second.invocationList]);
}

/**
 * Combines a sequence of callback lists into one multicast list holding every
 * elementary callback in traversal order. Duplicates are kept. Inputs are not
 * modified.
 *
 * @example
 * ```typescript
 * const onSaved = combine([auditTrail, searchIndexer, undefined, cacheBuster]);
 * raise(onSaved, repository, new SavedArgs('doc-1')); // audit, index, cache, in that order
 * ```
 */
export function combine<T extends EventArgs>(
  handlers: Iterable<EventHandler<T> | undefined>,
): EventHandler<T> | undefined {
  let result: EventHandler<T> | undefined = undefined;
  for (const handler of handlers) {
    result = append(result, handler);
  }
  return result;
}
