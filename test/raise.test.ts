import { describe, it, expect, vi } from 'vitest';
import { combine } from '../src/combine';
import { defineHandler } from '../src/handler';
import { raise, raiseAsync } from '../src/raise';
import { EventArgs } from '../src/types';
import { PropertyChangedArgs, RecordingScheduler, sender } from './fixtures';

describe('Invocation (raise.ts)', () => {
  describe('raise', () => {
    it('should do nothing for an undefined handler', () => {
      expect(() => raise(undefined, sender, EventArgs.empty)).not.toThrow();
      expect(raise(undefined, sender, EventArgs.empty)).toBeUndefined();
    });

    it('should pass the sender and event data to every callback', () => {
      const fn = vi.fn();
      const args = new PropertyChangedArgs('title');

      raise(defineHandler(PropertyChangedArgs, fn), sender, args);

      expect(fn).toHaveBeenCalledWith(sender, args);
    });

    it('should stop at the first failing callback and propagate its error', () => {
      const fn = vi.fn(() => {
        throw new Error('boom');
      });
      const h = defineHandler(EventArgs, fn);

      expect(() => raise(combine([h, h, h]), sender, EventArgs.empty)).toThrow('boom');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('raiseAsync', () => {
    it('should run the handler on the scheduler, not on the caller', async () => {
      const fn = vi.fn();

      const pending = raiseAsync(defineHandler(EventArgs, fn), sender, EventArgs.empty);
      expect(fn).not.toHaveBeenCalled();

      await pending;
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should reject with the error of a failing callback', async () => {
      const h = defineHandler(EventArgs, () => {
        throw new Error('boom');
      });

      await expect(raiseAsync(h, sender, EventArgs.empty)).rejects.toThrow('boom');
    });

    it('should resolve for an undefined handler', async () => {
      await expect(raiseAsync(undefined, sender, EventArgs.empty)).resolves.toBeUndefined();
    });

    it('should post to the given scheduler with the given priority', async () => {
      const scheduler = new RecordingScheduler();

      await raiseAsync(defineHandler(EventArgs, vi.fn()), sender, EventArgs.empty, {
        scheduler,
        priority: 'user-blocking',
      });

      expect(scheduler.priorities).toEqual(['user-blocking']);
    });
  });
});
