import { vi } from 'vitest';
import { EventArgs } from '../src/types';
import type { PostTaskOptions, Scheduler, TaskPriority } from '../src/scheduler';

export class PropertyChangedArgs extends EventArgs {
  constructor(readonly propertyName: string) {
    super();
  }
}

export class ValueChangedArgs extends PropertyChangedArgs {
  constructor(propertyName: string, readonly value: unknown) {
    super(propertyName);
  }
}

export class ClosedArgs extends EventArgs {}

export const sender = { id: 'test-sender' };

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Runs posted work on the microtask queue and records the requested priorities.
 */
export class RecordingScheduler implements Scheduler {
  readonly isNative = false;
  readonly priorities: Array<TaskPriority | undefined> = [];

  postTask<T>(callback: () => T | Promise<T>, options?: PostTaskOptions): Promise<T> {
    this.priorities.push(options?.priority);
    return Promise.resolve().then(callback);
  }
}
