/**
 * Process Shutdown
 *
 * Exit codes and the process-level handlers that put the terminal back
 * before the process goes away.
 */

import { debugLog } from './debug.ts';

/** Normal quit */
export const EXIT_OK = 0;
/** Fatal error or termination by signal */
export const EXIT_FATAL = 1;

export interface ShutdownHandlers {
  /** Restore cooked mode; safe to call more than once */
  restore: () => void;
  /** Report a fatal error and exit */
  die: (error: unknown) => void;
  exit: (code: number) => void;
}

/**
 * Wire exit, SIGTERM and uncaught errors on a process-like emitter.
 */
export function registerShutdownHandlers(events: NodeJS.EventEmitter, handlers: ShutdownHandlers): void {
  events.on('exit', handlers.restore);
  events.on('SIGTERM', () => {
    debugLog('[Main] SIGTERM');
    handlers.restore();
    handlers.exit(EXIT_FATAL);
  });
  events.on('uncaughtException', handlers.die);
  events.on('unhandledRejection', handlers.die);
}
