/**
 * Document
 *
 * Ordered rows of one open file. Every mutation bumps `dirty`; callers only
 * ever test it for non-zero.
 */

import { Row, type RowContext } from './row.ts';
import { SyntaxHighlighter } from '../features/syntax/highlighter.ts';
import type { Highlight, SyntaxRule } from '../features/syntax/types.ts';

// ============================================
// Types
// ============================================

/**
 * Raw-space cursor position. `cy` may equal the row count (one past end).
 */
export interface Position {
  cx: number;
  cy: number;
}

export interface DocumentOptions {
  tabStop?: number;
  filename?: string | null;
  syntax?: SyntaxRule | null;
}

/**
 * Strip trailing newline characters from a loaded line.
 */
export function stripLineEnding(line: string): string {
  let end = line.length;
  while (end > 0 && (line[end - 1] === '\n' || line[end - 1] === '\r')) end--;
  return line.slice(0, end);
}

// ============================================
// Document Class
// ============================================

export class Document {
  private rows: Row[] = [];
  private highlighter: SyntaxHighlighter;
  private context: RowContext;

  /** Modification counter since last load/save */
  dirty = 0;

  /** Path the document was loaded from or saved to */
  filename: string | null;

  constructor(options: DocumentOptions = {}) {
    this.filename = options.filename ?? null;
    this.highlighter = new SyntaxHighlighter(options.syntax ?? null);
    const tabStop = options.tabStop ?? 8;
    this.context = {
      tabStop,
      highlight: (render: string): Highlight[] => this.highlighter.highlightLine(render),
    };
  }

  /**
   * Build a document from whole-file text.
   */
  static fromText(text: string, options: DocumentOptions = {}): Document {
    const doc = new Document(options);
    const lines = text.split('\n');
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    doc.load(lines);
    return doc;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Row Access
  // ─────────────────────────────────────────────────────────────────────────

  get numRows(): number {
    return this.rows.length;
  }

  get tabStop(): number {
    return this.context.tabStop;
  }

  /**
   * Get a row, or null past the end.
   */
  getRow(index: number): Row | null {
    return this.rows[index] ?? null;
  }

  isDirty(): boolean {
    return this.dirty !== 0;
  }

  markClean(): void {
    this.dirty = 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Syntax
  // ─────────────────────────────────────────────────────────────────────────

  getSyntax(): SyntaxRule | null {
    return this.highlighter.getRule();
  }

  /**
   * Switch language rule and re-highlight every row.
   */
  setSyntax(rule: SyntaxRule | null): void {
    this.highlighter.setRule(rule);
    for (const row of this.rows) {
      row.rehighlight();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading & Serialization
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Replace contents with the given lines. Line endings are stripped here
   * and nowhere else.
   */
  load(lines: readonly string[]): void {
    this.rows = lines.map((line) => new Row(stripLineEnding(line), this.context));
    this.dirty = 0;
  }

  /**
   * Every row followed by a newline, including the last.
   */
  rowsToText(): string {
    return this.rows.map((row) => row.chars + '\n').join('');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Row Operations
  // ─────────────────────────────────────────────────────────────────────────

  insertRow(at: number, text: string): void {
    const index = Math.max(0, Math.min(at, this.rows.length));
    this.rows.splice(index, 0, new Row(text, this.context));
    this.dirty++;
  }

  deleteRow(at: number): void {
    if (at < 0 || at >= this.rows.length) return;
    this.rows.splice(at, 1);
    this.dirty++;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert a character at the cursor. Typing past the last row appends one.
   */
  insertChar(pos: Position, ch: string): Position {
    if (pos.cy === this.rows.length) {
      this.insertRow(this.rows.length, '');
    }
    const row = this.rows[pos.cy];
    if (!row) return pos;

    const cx = Math.min(Math.max(pos.cx, 0), row.size);
    row.insertChar(cx, ch);
    this.dirty++;
    return { cx: cx + 1, cy: pos.cy };
  }

  /**
   * Delete the character before the cursor, joining rows at column 0.
   */
  deleteChar(pos: Position): Position {
    if (pos.cy === this.rows.length) return pos;
    if (pos.cx === 0 && pos.cy === 0) return pos;

    const row = this.rows[pos.cy];
    if (!row) return pos;

    if (pos.cx > 0) {
      row.deleteChar(pos.cx - 1);
      this.dirty++;
      return { cx: pos.cx - 1, cy: pos.cy };
    }

    const prev = this.rows[pos.cy - 1];
    if (!prev) return pos;
    const joinAt = prev.size;
    prev.appendString(row.chars);
    this.dirty++;
    this.deleteRow(pos.cy);
    return { cx: joinAt, cy: pos.cy - 1 };
  }

  /**
   * Break the line at the cursor.
   */
  insertNewline(pos: Position): Position {
    const row = this.rows[pos.cy];
    if (pos.cx === 0 || !row) {
      this.insertRow(pos.cy, '');
    } else {
      const tail = row.chars.slice(pos.cx);
      this.insertRow(pos.cy + 1, tail);
      row.truncate(pos.cx);
    }
    return { cx: 0, cy: pos.cy + 1 };
  }
}
