/**
 * Terminal
 *
 * Raw mode, window size and output for the process's controlling terminal.
 * Output is encoded latin1 so each document byte reaches the terminal as
 * the same byte.
 */

import { CURSOR } from './ansi.ts';
import { StdinByteSource, type ByteSource } from './input.ts';
import { TerminalError, describeError } from '../errors.ts';
import type { Size } from '../ui/viewport.ts';

// ============================================
// Types
// ============================================

/**
 * What the session needs from a terminal.
 */
export interface Terminal {
  /** Byte source the key decoder reads from */
  readonly input: ByteSource;
  write(data: string): void;
  getWindowSize(): Promise<Size>;
}

/** The parts of a TTY input stream the terminal drives */
export interface TtyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
}

/** The parts of a TTY output stream the terminal drives */
export interface TtyOutput {
  columns: number;
  rows: number;
  write(data: string, encoding: BufferEncoding): boolean;
}

const REPORT_MAX_BYTES = 32;
const REPORT_TIMEOUT = 1000;

// ============================================
// Cursor Position Fallback
// ============================================

/**
 * Parse a cursor position report body (`ESC [ rows ; cols`, without the
 * trailing 'R').
 */
export function parseCursorPositionReport(report: string): Size | null {
  const match = /^\x1b\[(\d+);(\d+)$/.exec(report);
  if (!match?.[1] || !match[2]) return null;
  const height = parseInt(match[1], 10);
  const width = parseInt(match[2], 10);
  if (height <= 0 || width <= 0) return null;
  return { width, height };
}

/**
 * Find the window size by pushing the cursor to the bottom-right corner and
 * asking the terminal where it ended up.
 */
export async function queryWindowSize(
  source: ByteSource,
  write: (data: string) => void
): Promise<Size> {
  write(CURSOR.toBottomRight + CURSOR.queryPosition);

  let report = '';
  while (report.length < REPORT_MAX_BYTES) {
    const byte = await source.read(REPORT_TIMEOUT);
    if (byte === null) break;
    const ch = String.fromCharCode(byte);
    if (ch === 'R') break;
    report += ch;
  }

  const size = parseCursorPositionReport(report);
  if (!size) {
    throw new TerminalError('getWindowSize: no cursor position report');
  }
  return size;
}

// ============================================
// Node Terminal
// ============================================

export class NodeTerminal implements Terminal {
  readonly input: StdinByteSource;
  private stdin: TtyInput;
  private stdout: TtyOutput;
  private rawEnabled = false;

  constructor(stdin: TtyInput = process.stdin, stdout: TtyOutput = process.stdout) {
    this.stdin = stdin;
    this.stdout = stdout;
    this.input = new StdinByteSource(stdin);
  }

  /**
   * Switch the terminal to raw mode and start reading bytes.
   */
  enableRawMode(): void {
    if (!this.stdin.isTTY) {
      throw new TerminalError('enableRawMode: stdin is not a terminal');
    }
    try {
      this.stdin.setRawMode(true);
    } catch (error) {
      throw new TerminalError(`enableRawMode: ${describeError(error)}`, { cause: error });
    }
    this.rawEnabled = true;
    this.input.start();
  }

  /**
   * Restore cooked mode. Safe to call more than once.
   */
  disableRawMode(): void {
    this.input.stop();
    if (!this.rawEnabled) return;
    this.rawEnabled = false;
    this.stdin.setRawMode(false);
  }

  isRawModeEnabled(): boolean {
    return this.rawEnabled;
  }

  write(data: string): void {
    this.stdout.write(data, 'latin1');
  }

  async getWindowSize(): Promise<Size> {
    const width = this.stdout.columns;
    const height = this.stdout.rows;
    if (width > 0 && height > 0) {
      return { width, height };
    }
    return queryWindowSize(this.input, (data) => this.write(data));
  }
}
