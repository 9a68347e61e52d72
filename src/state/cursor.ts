/**
 * Cursor Movement
 */

import type { EditorState } from './editor-state.ts';

export type Direction = 'LEFT' | 'RIGHT' | 'UP' | 'DOWN';

/**
 * Move one step. Left and right wrap across row boundaries; the column is
 * snapped to the new row's length afterwards.
 */
export function moveCursor(state: EditorState, direction: Direction): void {
  const { document, cursor } = state;
  const row = document.getRow(cursor.cy);

  switch (direction) {
    case 'LEFT':
      if (cursor.cx !== 0) {
        cursor.cx--;
      } else if (cursor.cy > 0) {
        cursor.cy--;
        cursor.cx = document.getRow(cursor.cy)?.size ?? 0;
      }
      break;
    case 'RIGHT':
      if (row && cursor.cx < row.size) {
        cursor.cx++;
      } else if (row && cursor.cx === row.size) {
        cursor.cy++;
        cursor.cx = 0;
      }
      break;
    case 'UP':
      if (cursor.cy !== 0) cursor.cy--;
      break;
    case 'DOWN':
      if (cursor.cy < document.numRows) cursor.cy++;
      break;
  }

  const rowLen = document.getRow(cursor.cy)?.size ?? 0;
  if (cursor.cx > rowLen) cursor.cx = rowLen;
}

/**
 * Page up/down: jump to the window edge, then move a full screen.
 */
export function pageCursor(state: EditorState, direction: 'UP' | 'DOWN'): void {
  const { cursor, viewport, document } = state;

  if (direction === 'UP') {
    cursor.cy = viewport.rowOff;
  } else {
    cursor.cy = Math.min(viewport.rowOff + viewport.screenRows - 1, document.numRows);
  }

  for (let times = viewport.screenRows; times > 0; times--) {
    moveCursor(state, direction);
  }
}

export function moveToLineStart(state: EditorState): void {
  state.cursor.cx = 0;
}

export function moveToLineEnd(state: EditorState): void {
  const row = state.document.getRow(state.cursor.cy);
  if (row) state.cursor.cx = row.size;
}
