/**
 * Viewport
 *
 * The visible window in rendered space. `screenRows` excludes the status
 * and message bars.
 */

import type { Document, Position } from '../core/document.ts';

export interface Size {
  width: number;
  height: number;
}

/** Rows reserved at the bottom for the status bar and message bar */
export const BAR_ROWS = 2;

export class Viewport {
  rowOff = 0;
  colOff = 0;
  screenRows: number;
  screenCols: number;

  constructor(screenRows: number, screenCols: number) {
    this.screenRows = screenRows;
    this.screenCols = screenCols;
  }

  /**
   * Viewport for a terminal of the given size, leaving room for the bars.
   */
  static forTerminal(size: Size): Viewport {
    return new Viewport(Math.max(1, size.height - BAR_ROWS), Math.max(1, size.width));
  }

  /**
   * Adjust offsets so the cursor is visible. Returns the cursor's rendered
   * column.
   */
  scroll(cursor: Position, document: Document): number {
    const row = document.getRow(cursor.cy);
    const rx = row ? row.cxToRx(cursor.cx) : 0;

    if (cursor.cy < this.rowOff) {
      this.rowOff = cursor.cy;
    }
    if (cursor.cy >= this.rowOff + this.screenRows) {
      this.rowOff = cursor.cy - this.screenRows + 1;
    }
    if (rx < this.colOff) {
      this.colOff = rx;
    }
    if (rx >= this.colOff + this.screenCols) {
      this.colOff = rx - this.screenCols + 1;
    }

    return rx;
  }
}
