/**
 * Debug Logging
 *
 * Appends timestamped lines to debug.log. The terminal is in raw mode and
 * owned by the renderer, so nothing here ever writes to stdout or stderr.
 */

import { appendFileSync } from 'fs';

// Debug log file path
export const DEBUG_LOG_PATH = './debug.log';

let debugEnabled = false;

/**
 * Enable or disable debug logging
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Write a message to the debug log if enabled
 */
export function debugLog(message: string): void {
  if (!debugEnabled) return;

  const timestamp = new Date().toISOString();
  try {
    appendFileSync(DEBUG_LOG_PATH, `[${timestamp}] ${message}\n`);
  } catch {
    // Unwritable log file: give up for the rest of the session
    debugEnabled = false;
  }
}
