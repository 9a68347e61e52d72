/**
 * Append Buffer Tests
 */

import { describe, test, expect } from 'vitest';
import { AppendBuffer } from '../../../src/ui/append-buffer.ts';

describe('AppendBuffer', () => {
  test('joins appended chunks in order', () => {
    const ab = new AppendBuffer();
    ab.append('\x1b[H').append('~').append('\r\n');
    expect(ab.toString()).toBe('\x1b[H~\r\n');
    expect(ab.length).toBe(6);
  });

  test('clear empties the buffer', () => {
    const ab = new AppendBuffer().append('abc');
    ab.clear();
    expect(ab.toString()).toBe('');
    expect(ab.length).toBe(0);
  });
});
