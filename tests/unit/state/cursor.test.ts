/**
 * Cursor Movement Tests
 */

import { describe, test, expect } from 'vitest';
import { moveCursor, pageCursor, moveToLineStart, moveToLineEnd } from '../../../src/state/cursor.ts';
import { createEditorState, type EditorState } from '../../../src/state/editor-state.ts';
import { Document } from '../../../src/core/document.ts';

function stateAt(text: string, cx: number, cy: number): EditorState {
  const state = createEditorState(Document.fromText(text), { width: 40, height: 10 }, 3);
  state.cursor = { cx, cy };
  return state;
}

const TEXT = 'abc\nde\n\nfghij\n';

describe('moveCursor', () => {
  test('right at the end of a row wraps to the next row', () => {
    const state = stateAt(TEXT, 3, 0);
    moveCursor(state, 'RIGHT');
    expect(state.cursor).toEqual({ cx: 0, cy: 1 });
  });

  test('left at the start of a row wraps to the end of the previous row', () => {
    const state = stateAt(TEXT, 0, 1);
    moveCursor(state, 'LEFT');
    expect(state.cursor).toEqual({ cx: 3, cy: 0 });
  });

  test('left at the document start stays put', () => {
    const state = stateAt(TEXT, 0, 0);
    moveCursor(state, 'LEFT');
    expect(state.cursor).toEqual({ cx: 0, cy: 0 });
  });

  test('vertical moves snap the column to the row length', () => {
    const state = stateAt(TEXT, 3, 0);
    moveCursor(state, 'DOWN');
    expect(state.cursor).toEqual({ cx: 2, cy: 1 });
    moveCursor(state, 'DOWN');
    expect(state.cursor).toEqual({ cx: 0, cy: 2 });
  });

  test('down stops one row past the end', () => {
    const state = stateAt(TEXT, 4, 3);
    moveCursor(state, 'DOWN');
    expect(state.cursor).toEqual({ cx: 0, cy: 4 });
    moveCursor(state, 'DOWN');
    expect(state.cursor).toEqual({ cx: 0, cy: 4 });
  });

  test('right past the end does nothing', () => {
    const state = stateAt(TEXT, 0, 4);
    moveCursor(state, 'RIGHT');
    expect(state.cursor).toEqual({ cx: 0, cy: 4 });
  });

  test('up at the first row stays put', () => {
    const state = stateAt(TEXT, 1, 0);
    moveCursor(state, 'UP');
    expect(state.cursor).toEqual({ cx: 1, cy: 0 });
  });
});

describe('pageCursor', () => {
  const longText = Array.from({ length: 20 }, (_, i) => `row ${i}`).join('\n');

  test('page down moves a screen past the bottom edge', () => {
    const state = stateAt(longText, 0, 0);
    pageCursor(state, 'DOWN');
    expect(state.cursor.cy).toBe(15);
  });

  test('page up moves a screen above the top edge', () => {
    const state = stateAt(longText, 0, 12);
    state.viewport.rowOff = 8;
    pageCursor(state, 'UP');
    expect(state.cursor.cy).toBe(0);
  });

  test('page down near the end stops one row past the end', () => {
    const state = stateAt(longText, 0, 18);
    state.viewport.rowOff = 15;
    pageCursor(state, 'DOWN');
    expect(state.cursor.cy).toBe(20);
  });
});

describe('line start and end', () => {
  test('moves to either end of the current row', () => {
    const state = stateAt(TEXT, 1, 3);
    moveToLineEnd(state);
    expect(state.cursor.cx).toBe(5);
    moveToLineStart(state);
    expect(state.cursor.cx).toBe(0);
  });

  test('end past the last row leaves the column alone', () => {
    const state = stateAt(TEXT, 0, 4);
    moveToLineEnd(state);
    expect(state.cursor.cx).toBe(0);
  });
});
