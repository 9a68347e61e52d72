/**
 * Raw Terminal Input
 *
 * Turns a byte stream read with a short timeout into key events. A lone ESC
 * byte starts a lookahead; if the follow-up bytes do not arrive in time the
 * event is a bare ESCAPE press.
 */

import { TerminalError } from '../errors.ts';

// ============================================
// Types
// ============================================

export type NamedKey =
  | 'ENTER'
  | 'TAB'
  | 'ESCAPE'
  | 'BACKSPACE'
  | 'DELETE'
  | 'UP'
  | 'DOWN'
  | 'LEFT'
  | 'RIGHT'
  | 'HOME'
  | 'END'
  | 'PAGEUP'
  | 'PAGEDOWN';

export interface KeyEvent {
  key: string;        // Named key (e.g. 'UP'), uppercase letter for Ctrl keys, or the character
  char?: string;      // Byte to insert into the document, if the key carries one
  ctrl: boolean;
}

/**
 * Source of single bytes. `read` resolves null when nothing arrived within
 * the timeout; that is "no data", not an error.
 */
export interface ByteSource {
  read(timeoutMs: number): Promise<number | null>;
}

// ============================================
// Key Tables
// ============================================

// Escape sequences, without the leading ESC
const ESCAPE_SEQUENCES: Record<string, NamedKey> = {
  // Arrow keys
  '[A': 'UP',
  '[B': 'DOWN',
  '[C': 'RIGHT',
  '[D': 'LEFT',
  // Home/End
  '[H': 'HOME',
  '[F': 'END',
  'OH': 'HOME',
  'OF': 'END',
  '[1~': 'HOME',
  '[7~': 'HOME',
  '[4~': 'END',
  '[8~': 'END',
  // Delete
  '[3~': 'DELETE',
  // Page Up/Down
  '[5~': 'PAGEUP',
  '[6~': 'PAGEDOWN',
};

// Control character mappings
const CTRL_CHARS: Record<number, string> = {
  0: '@',
  1: 'a',
  2: 'b',
  3: 'c',
  4: 'd',
  5: 'e',
  6: 'f',
  7: 'g',
  8: 'h',
  11: 'k',
  12: 'l',
  14: 'n',
  15: 'o',
  16: 'p',
  17: 'q',
  18: 'r',
  19: 's',
  20: 't',
  21: 'u',
  22: 'v',
  23: 'w',
  24: 'x',
  25: 'y',
  26: 'z',
  28: '\\',
  29: ']',
  30: '^',
  31: '_',
};

const ESC_BYTE = 0x1b;
const DEL_BYTE = 0x7f;

export function namedKey(key: NamedKey, char?: string): KeyEvent {
  return char === undefined ? { key, ctrl: false } : { key, char, ctrl: false };
}

/**
 * Whether the event is Ctrl+<letter>.
 */
export function isCtrlKey(event: KeyEvent, letter: string): boolean {
  return event.ctrl && event.key === letter.toUpperCase();
}

/**
 * Decode a single byte that does not start an escape sequence.
 */
export function decodeByte(byte: number): KeyEvent {
  const char = String.fromCharCode(byte);

  switch (byte) {
    case 9:
      return namedKey('TAB', '\t');
    case 10: // Line feed
    case 13: // Carriage return
      return namedKey('ENTER');
    case ESC_BYTE:
      return namedKey('ESCAPE');
    case DEL_BYTE:
      return namedKey('BACKSPACE');
  }

  const ctrlChar = CTRL_CHARS[byte];
  if (ctrlChar !== undefined) {
    return { key: ctrlChar.toUpperCase(), char, ctrl: true };
  }

  return { key: char, char, ctrl: false };
}

// ============================================
// Key Decoder
// ============================================

export class KeyDecoder {
  private source: ByteSource;
  private escapeTimeout: number;

  constructor(source: ByteSource, escapeTimeout = 100) {
    this.source = source;
    this.escapeTimeout = escapeTimeout;
  }

  setEscapeTimeout(ms: number): void {
    this.escapeTimeout = ms;
  }

  /**
   * Wait for the next key press.
   */
  async nextKey(): Promise<KeyEvent> {
    let byte: number | null = null;
    while (byte === null) {
      byte = await this.source.read(this.escapeTimeout);
    }

    if (byte === ESC_BYTE) {
      return this.decodeEscape();
    }
    return decodeByte(byte);
  }

  /**
   * Read the rest of an escape sequence. Anything unrecognized, or a
   * sequence cut short by the timeout, is a plain ESCAPE.
   */
  private async decodeEscape(): Promise<KeyEvent> {
    const first = await this.source.read(this.escapeTimeout);
    if (first === null) return namedKey('ESCAPE');
    const second = await this.source.read(this.escapeTimeout);
    if (second === null) return namedKey('ESCAPE');

    let seq = String.fromCharCode(first, second);
    if (seq[0] === '[' && second >= 0x30 && second <= 0x39) {
      const third = await this.source.read(this.escapeTimeout);
      if (third === null) return namedKey('ESCAPE');
      seq += String.fromCharCode(third);
    }

    const key = ESCAPE_SEQUENCES[seq];
    return namedKey(key ?? 'ESCAPE');
  }
}

// ============================================
// Stdin Byte Source
// ============================================

interface PendingRead {
  resolve: (byte: number | null) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Byte source over process.stdin. Chunks are queued as they arrive; only
 * one read may be outstanding at a time.
 */
export class StdinByteSource implements ByteSource {
  private stream: NodeJS.ReadableStream;
  private queue: number[] = [];
  private pending: PendingRead | null = null;
  private failure: TerminalError | null = null;
  private isRunning = false;

  constructor(stream: NodeJS.ReadableStream = process.stdin) {
    this.stream = stream;
  }

  /**
   * Start listening for input
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.stream.on('data', this.onData);
    this.stream.on('error', this.onError);
    this.stream.on('end', this.onEnd);
    this.stream.resume();
  }

  /**
   * Stop listening for input
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    this.stream.off('data', this.onData);
    this.stream.off('error', this.onError);
    this.stream.off('end', this.onEnd);
    this.stream.pause();
  }

  /**
   * Next byte, or null after `timeoutMs`. Bytes that arrived before a
   * stream failure are still handed out before the failure is reported.
   */
  read(timeoutMs: number): Promise<number | null> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new TerminalError('read: concurrent reads on stdin'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  private onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk;
    for (const byte of bytes) {
      this.queue.push(byte);
    }

    const pending = this.pending;
    const next = this.queue.shift();
    if (pending && next !== undefined) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.resolve(next);
    } else if (next !== undefined) {
      this.queue.unshift(next);
    }
  };

  private onError = (error: Error): void => {
    this.fail(new TerminalError(`read: ${error.message}`, { cause: error }));
  };

  private onEnd = (): void => {
    this.fail(new TerminalError('read: end of input'));
  };

  private fail(error: TerminalError): void {
    this.failure = error;
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.reject(error);
    }
  }
}
