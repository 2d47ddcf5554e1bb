import { describe, it, expect } from 'vitest';
import { getRaiserConfig, noopLogger, withRaiserConfig } from '../src/config';
import { defineHandler } from '../src/handler';
import { raise } from '../src/raise';
import { resilient } from '../src/resilient';
import { scheduler } from '../src/scheduler';
import { EventArgs } from '../src/types';
import { RecordingScheduler, createTestLogger, delay, sender } from './fixtures';

describe('Configuration (config.ts)', () => {
  it('should fall back to the library defaults', () => {
    const config = getRaiserConfig();

    expect(config.scheduler).toBe(scheduler);
    expect(config.logger).toBe(noopLogger);
    expect(config.priority).toBe('user-visible');
  });

  it('should supply the ambient logger to decorators created inside', async () => {
    const logger = createTestLogger();
    const error = new Error('boom');
    function failing() {
      throw error;
    }

    const handler = await withRaiserConfig({ logger }, () => resilient(defineHandler(EventArgs, failing)));
    raise(handler, sender, EventArgs.empty);

    expect(logger.debug).toHaveBeenCalledWith("[resilient] Suppressed fault in 'failing'", { error });
  });

  it('should keep the ambient configuration across awaits', async () => {
    const priority = await withRaiserConfig({ priority: 'background' }, async () => {
      await delay(1);
      return getRaiserConfig().priority;
    });

    expect(priority).toBe('background');
  });

  it('should layer nested configurations', async () => {
    const logger = createTestLogger();
    const recording = new RecordingScheduler();

    const config = await withRaiserConfig({ logger, scheduler: recording }, () =>
      withRaiserConfig({ priority: 'user-blocking' }, () => getRaiserConfig()),
    );

    expect(config.logger).toBe(logger);
    expect(config.scheduler).toBe(recording);
    expect(config.priority).toBe('user-blocking');
  });

  it('should let explicit options win over the ambient configuration', async () => {
    const priority = await withRaiserConfig({ priority: 'background' }, () =>
      getRaiserConfig({ priority: 'user-blocking' }).priority,
    );

    expect(priority).toBe('user-blocking');
  });

  it('should fall back to caller-supplied defaults after the ambient configuration', async () => {
    const defaults = { ...getRaiserConfig(), priority: 'background' as const };

    expect(getRaiserConfig({}, defaults).priority).toBe('background');
    const ambient = await withRaiserConfig({ priority: 'user-blocking' }, () => getRaiserConfig({}, defaults).priority);
    expect(ambient).toBe('user-blocking');
  });

  it('should not leak the ambient configuration once the call completes', async () => {
    await withRaiserConfig({ logger: createTestLogger() }, () => undefined);

    expect(getRaiserConfig().logger).toBe(noopLogger);
  });
});
