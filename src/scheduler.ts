/**
 * @module
 * The shared pool that `parallel`, `background` and `raiseAsync` post their
 * units of work to. Each posted callback runs as its own task on the event
 * loop; there is no cancellation or timeout once a unit is posted.
 */

// =================================================================
// Section 1: Core Types and Scheduler Definition
// =================================================================

/**
 * Defines the priority levels for posted work.
 * - `user-blocking`: runs on the microtask queue, ahead of pending I/O and timers.
 * - `user-visible`: default, runs on the next macrotask.
 * - `background`: lowest priority, deferred behind other macrotasks.
 */
export type TaskPriority = 'user-blocking' | 'user-visible' | 'background';

export interface PostTaskOptions {
  priority?: TaskPriority;
}

/**
 * Defines the contract for a scheduler, responsible for running callbacks as
 * independent units of work.
 */
export interface Scheduler {
  /**
   * Schedules a callback function to be executed.
   * @returns A Promise that resolves or rejects with the callback's outcome.
   */
  postTask<T>(callback: () => T | Promise<T>, options?: PostTaskOptions): Promise<T>;
  /** Indicates if the scheduler is using a native environment scheduling API. */
  readonly isNative: boolean;
}

interface ExperimentalScheduler {
  postTask<T>(callback: () => T | Promise<T>, options?: { priority?: TaskPriority }): Promise<T>;
}

declare global {
  var scheduler: ExperimentalScheduler | undefined; // This makes `globalThis.scheduler` known
}

class NativeScheduler implements Scheduler {
  readonly isNative = true;

  constructor(private readonly native: ExperimentalScheduler) {}

  postTask<T>(callback: () => T | Promise<T>, options?: PostTaskOptions): Promise<T> {
    return this.native.postTask(callback, { priority: options?.priority });
  }
}

class PromiseScheduler implements Scheduler {
  readonly isNative = false;

  postTask<T>(callback: () => T | Promise<T>, options: PostTaskOptions = {}): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const taskFn = async () => {
        try {
          resolve(await callback());
        } catch (error) {
          reject(error);
        }
      };

      if (options.priority === 'user-blocking') {
        queueMicrotask(taskFn);
      } else if (options.priority === 'background') {
        setTimeout(taskFn, 4); // Small delay for background work to yield to more important ones
      } else { // 'user-visible' or undefined priority
        setTimeout(taskFn, 0);
      }
    });
  }
}

/**
 * Gets the best available scheduler for the current environment.
 * It prefers a native scheduler if `globalThis.scheduler.postTask` is available,
 * otherwise it falls back to a promise-based scheduler using `queueMicrotask` and `setTimeout`.
 */
export function getScheduler(): Scheduler {
  const native = globalThis.scheduler;
  if (native && typeof native.postTask === 'function') {
    return new NativeScheduler(native);
  }
  return new PromiseScheduler();
}

/** A shared, default instance of the scheduler, determined at module load time. */
export const scheduler = getScheduler();
