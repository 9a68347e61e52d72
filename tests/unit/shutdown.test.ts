/**
 * Shutdown Handler Tests
 */

import { describe, test, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { EXIT_FATAL, registerShutdownHandlers } from '../../src/shutdown.ts';

function setup() {
  const events = new EventEmitter();
  const handlers = { restore: vi.fn(), die: vi.fn(), exit: vi.fn() };
  registerShutdownHandlers(events, handlers);
  return { events, handlers };
}

describe('registerShutdownHandlers', () => {
  test('SIGTERM restores the terminal and exits with the fatal code', () => {
    const { events, handlers } = setup();

    events.emit('SIGTERM');

    expect(handlers.restore).toHaveBeenCalledTimes(1);
    expect(handlers.exit).toHaveBeenCalledWith(EXIT_FATAL);
    expect(EXIT_FATAL).toBe(1);
  });

  test('normal exit only restores the terminal', () => {
    const { events, handlers } = setup();

    events.emit('exit', 0);

    expect(handlers.restore).toHaveBeenCalledTimes(1);
    expect(handlers.exit).not.toHaveBeenCalled();
  });

  test('uncaught errors and rejections go to the fatal handler', () => {
    const { events, handlers } = setup();
    const error = new Error('boom');

    events.emit('uncaughtException', error);
    events.emit('unhandledRejection', error);

    expect(handlers.die).toHaveBeenCalledTimes(2);
    expect(handlers.die).toHaveBeenCalledWith(error);
  });
});
