/**
 * Row
 *
 * One line of the document: raw characters, the tab-expanded render and one
 * highlight tag per rendered character. Render and tags are recomputed
 * together whenever the raw characters change.
 */

import { Highlight } from '../features/syntax/types.ts';

// ============================================
// Types
// ============================================

/**
 * What a row needs from its document to derive render and highlight.
 */
export interface RowContext {
  readonly tabStop: number;
  highlight(render: string): Highlight[];
}

// ============================================
// Column Arithmetic
// ============================================

/**
 * Expand tabs. A tab emits one space, then pads to the next tab stop.
 */
export function renderTabs(chars: string, tabStop: number): string {
  let render = '';
  for (const ch of chars) {
    if (ch === '\t') {
      render += ' ';
      while (render.length % tabStop !== 0) render += ' ';
    } else {
      render += ch;
    }
  }
  return render;
}

/**
 * Raw index to rendered column.
 */
export function cxToRx(chars: string, cx: number, tabStop: number): number {
  let rx = 0;
  for (let j = 0; j < cx && j < chars.length; j++) {
    if (chars[j] === '\t') {
      rx += (tabStop - 1) - (rx % tabStop);
    }
    rx++;
  }
  return rx;
}

/**
 * Rendered column to raw index. Out-of-range columns map to the row length.
 */
export function rxToCx(chars: string, rx: number, tabStop: number): number {
  let curRx = 0;
  let cx: number;
  for (cx = 0; cx < chars.length; cx++) {
    if (chars[cx] === '\t') {
      curRx += (tabStop - 1) - (curRx % tabStop);
    }
    curRx++;
    if (curRx > rx) return cx;
  }
  return cx;
}

// ============================================
// Row Class
// ============================================

export class Row {
  private _chars: string;
  private _render = '';
  private context: RowContext;

  /** Highlight tags, one per rendered character */
  hl: Highlight[] = [];

  constructor(chars: string, context: RowContext) {
    this._chars = chars;
    this.context = context;
    this.update();
  }

  get chars(): string {
    return this._chars;
  }

  get render(): string {
    return this._render;
  }

  get size(): number {
    return this._chars.length;
  }

  /**
   * Re-derive render and highlight from the raw characters.
   */
  update(): void {
    this._render = renderTabs(this._chars, this.context.tabStop);
    this.rehighlight();
  }

  /**
   * Recompute highlight tags only (render is unchanged).
   */
  rehighlight(): void {
    this.hl = this.context.highlight(this._render);
  }

  cxToRx(cx: number): number {
    return cxToRx(this._chars, cx, this.context.tabStop);
  }

  rxToCx(rx: number): number {
    return rxToCx(this._chars, rx, this.context.tabStop);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert a character. Out-of-range positions append.
   */
  insertChar(at: number, ch: string): void {
    if (at < 0 || at > this._chars.length) at = this._chars.length;
    this._chars = this._chars.slice(0, at) + ch + this._chars.slice(at);
    this.update();
  }

  /**
   * Delete the character at `at`. Returns false when out of range.
   */
  deleteChar(at: number): boolean {
    if (at < 0 || at >= this._chars.length) return false;
    this._chars = this._chars.slice(0, at) + this._chars.slice(at + 1);
    this.update();
    return true;
  }

  appendString(text: string): void {
    this._chars += text;
    this.update();
  }

  /**
   * Cut the row at `at`, returning the removed tail.
   */
  truncate(at: number): string {
    const tail = this._chars.slice(at);
    this._chars = this._chars.slice(0, at);
    this.update();
    return tail;
  }
}
