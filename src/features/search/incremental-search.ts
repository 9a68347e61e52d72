/**
 * Incremental Search
 *
 * Searches rendered rows for a literal substring while the query is typed.
 * Arrow keys step to the next or previous match, wrapping at the ends of
 * the document. The current match is tagged Match; the row's previous tags
 * are kept and put back before the next step.
 */

import { Highlight } from '../syntax/types.ts';
import { prompt, type PromptHost } from '../../ui/prompt.ts';
import type { KeyEvent } from '../../terminal/input.ts';
import type { EditorState } from '../../state/editor-state.ts';

export const SEARCH_PROMPT = 'Search: %s (Use ESC/Arrows/Enter)';

interface SavedHighlight {
  row: number;
  hl: Highlight[];
}

export class IncrementalSearch {
  private state: EditorState;
  private lastMatch = -1;
  private direction: 1 | -1 = 1;
  private saved: SavedHighlight | null = null;

  constructor(state: EditorState) {
    this.state = state;
  }

  getLastMatch(): number {
    return this.lastMatch;
  }

  /**
   * Continue from a given row, as if it had been the previous match.
   */
  setLastMatch(row: number): void {
    this.lastMatch = row;
  }

  /**
   * Prompt callback: runs once per keystroke.
   */
  onKey = (query: string, key: KeyEvent): void => {
    this.restoreHighlight();

    if (key.key === 'ENTER' || key.key === 'ESCAPE') {
      this.lastMatch = -1;
      this.direction = 1;
      return;
    } else if (key.key === 'RIGHT' || key.key === 'DOWN') {
      this.direction = 1;
    } else if (key.key === 'LEFT' || key.key === 'UP') {
      this.direction = -1;
    } else {
      this.lastMatch = -1;
      this.direction = 1;
    }

    if (this.lastMatch === -1) this.direction = 1;
    if (query.length === 0) return;

    this.step(query);
  };

  /**
   * Visit each row at most once, starting one step past the last match.
   */
  private step(query: string): void {
    const { document, cursor, viewport } = this.state;
    const numRows = document.numRows;
    let current = this.lastMatch;

    for (let i = 0; i < numRows; i++) {
      current += this.direction;
      if (current === -1) current = numRows - 1;
      else if (current === numRows) current = 0;

      const row = document.getRow(current);
      if (!row) continue;

      const index = row.render.indexOf(query);
      if (index === -1) continue;

      this.lastMatch = current;
      cursor.cy = current;
      cursor.cx = row.rxToCx(index);
      // Past the end so the next scroll puts the match on the top line
      viewport.rowOff = numRows;

      this.saved = { row: current, hl: row.hl.slice() };
      row.hl.fill(Highlight.Match, index, index + query.length);
      break;
    }
  }

  private restoreHighlight(): void {
    if (!this.saved) return;
    const row = this.state.document.getRow(this.saved.row);
    if (row) row.hl = this.saved.hl;
    this.saved = null;
  }
}

/**
 * Run an interactive search. Escape puts the cursor and viewport back
 * exactly where they were.
 */
export async function find(host: PromptHost, state: EditorState, search: IncrementalSearch): Promise<void> {
  const { cursor, viewport } = state;
  const savedCx = cursor.cx;
  const savedCy = cursor.cy;
  const savedColOff = viewport.colOff;
  const savedRowOff = viewport.rowOff;

  const query = await prompt(host, SEARCH_PROMPT, search.onKey);

  if (query === null) {
    cursor.cx = savedCx;
    cursor.cy = savedCy;
    viewport.colOff = savedColOff;
    viewport.rowOff = savedRowOff;
  }
}
