#!/usr/bin/env tsx
/**
 * Kiln - Terminal Text Editor
 *
 * Entry point for the application.
 *
 * Usage: kiln [file]
 */

import { Session, HELP_MESSAGE } from './app.ts';
import { Settings } from './config/settings.ts';
import { UserConfigManager } from './config/user-config.ts';
import { NodeTerminal } from './terminal/terminal.ts';
import { CURSOR, SCREEN } from './terminal/ansi.ts';
import { setDebugEnabled, debugLog } from './debug.ts';
import { describeError } from './errors.ts';
import { EXIT_FATAL, EXIT_OK, registerShutdownHandlers } from './shutdown.ts';

// Parse command line arguments
const args = process.argv.slice(2);
const filename = args[0];

// Debug logging is switched on from the environment; the CLI takes no flags
const debugEnv = process.env.KILN_DEBUG;
setDebugEnabled(debugEnv === '1' || debugEnv === 'true');

const terminal = new NodeTerminal();

/**
 * Put the terminal back in cooked mode. Runs on every exit path.
 */
function restoreTerminal(): void {
  if (terminal.isRawModeEnabled()) {
    terminal.disableRawMode();
  }
}

/**
 * Fatal error: restore the terminal, then report and exit 1.
 */
function die(error: unknown): never {
  const msg = describeError(error);
  debugLog(`[Main] Fatal error: ${error instanceof Error ? error.stack ?? msg : msg}`);

  const wasRaw = terminal.isRawModeEnabled();
  restoreTerminal();
  if (wasRaw) {
    terminal.write(SCREEN.clear + CURSOR.home + CURSOR.show);
  }
  console.error(`kiln: ${msg}`);
  process.exit(EXIT_FATAL);
}

registerShutdownHandlers(process, {
  restore: restoreTerminal,
  die,
  exit: (code) => process.exit(code),
});

async function main(): Promise<void> {
  debugLog('[Main] Starting Kiln...');

  const settings = new Settings();
  await new UserConfigManager().load(settings);

  terminal.enableRawMode();

  const session = await Session.create({ terminal, settings });
  if (filename) {
    await session.open(filename);
  }

  session.setStatusMessage(HELP_MESSAGE);
  await session.run();

  restoreTerminal();
  debugLog('[Main] Exited cleanly');
  process.exit(EXIT_OK);
}

// Start the application
main().catch(die);
