import { describe, expect, expectTypeOf, it, vi } from 'vitest';
import {
  adapt,
  adaptContravariant,
  background,
  combine,
  defineHandler,
  EventArgs,
  parallel,
  raise,
  raiseAsync,
  resilient,
  type EventHandler,
} from '../src/index';
import { PropertyChangedArgs, ValueChangedArgs, sender } from './fixtures';

describe('Basics', () => {
  it('should expose the combinators from the entry point', () => {
    for (const fn of [adapt, adaptContravariant, combine, resilient, parallel, background, raise, raiseAsync]) {
      expect(typeof fn).toBe('function');
    }
  });

  it('should build a handler from a plain function', () => {
    const handler = adapt(PropertyChangedArgs, (_sender: unknown, _args: PropertyChangedArgs) => {});

    expectTypeOf(handler).toEqualTypeOf<EventHandler<PropertyChangedArgs> | undefined>();
    expect(handler?.invocationList).toHaveLength(1);
  });

  it('should raise a decorated, combined list end to end', async () => {
    const seen: string[] = [];
    const faults: Error[] = [];
    const general = defineHandler(EventArgs, () => {
      seen.push('general');
    });
    const failing = defineHandler(PropertyChangedArgs, () => {
      throw new Error('listener failed');
    });
    const specific = defineHandler(ValueChangedArgs, (_sender, args) => {
      seen.push(`${args.propertyName}=${String(args.value)}`);
    });

    const listeners = combine<ValueChangedArgs>([
      adaptContravariant<EventArgs, ValueChangedArgs>(general, ValueChangedArgs),
      adaptContravariant<PropertyChangedArgs, ValueChangedArgs>(failing, ValueChangedArgs),
      specific,
    ]);
    const handler = parallel(resilient(listeners, (_callback, error) => faults.push(error)));

    await raise(handler, sender, new ValueChangedArgs('title', 'Draft'));

    expect([...seen].sort()).toEqual(['general', 'title=Draft']);
    expect(faults.map(error => error.message)).toEqual(['listener failed']);
  });

  it('should let raiseAsync release the caller before the handler runs', async () => {
    const fn = vi.fn();

    const pending = raiseAsync(defineHandler(EventArgs, fn), sender, EventArgs.empty);
    expect(fn).not.toHaveBeenCalled();

    await pending;
    expect(fn).toHaveBeenCalledWith(sender, EventArgs.empty);
  });
});
