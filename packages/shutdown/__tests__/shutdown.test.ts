import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  clearShutdownHandlers,
  gracefulShutdown,
  registerShutdownHandler,
  runShutdownHandlers,
} from '../index';

describe('shutdown manager', () => {
  beforeEach(() => {
    clearShutdownHandlers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should run every handler and count failures', async () => {
    const closePool = vi.fn().mockResolvedValue(undefined);
    const closeServer = vi.fn().mockRejectedValue(new Error('already closed'));
    registerShutdownHandler(closePool);
    registerShutdownHandler(closeServer);

    expect(await runShutdownHandlers()).toBe(1);
    expect(closePool).toHaveBeenCalledTimes(1);
    expect(closeServer).toHaveBeenCalledTimes(1);
  });

  it('should skip unregistered handlers', async () => {
    const handler = vi.fn();
    const unregister = registerShutdownHandler(handler);
    unregister();

    expect(await runShutdownHandlers()).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should fail a handler that never settles after 30 seconds', async () => {
    vi.useFakeTimers();
    registerShutdownHandler(() => new Promise<void>(() => undefined));

    const pending = runShutdownHandlers();
    await vi.advanceTimersByTimeAsync(30000);

    expect(await pending).toBe(1);
  });

  it('should exit once, with status 1 when a handler failed', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as () => never);
    registerShutdownHandler(() => { throw new Error('flush failed'); });

    await gracefulShutdown('SIGTERM');
    await gracefulShutdown('SIGINT');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
