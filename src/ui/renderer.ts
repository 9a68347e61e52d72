/**
 * Renderer
 *
 * Composes a full frame (text rows, status bar, message bar, cursor) into
 * one append buffer and hands it to the output in a single write.
 * Supports both real terminal output and captured output for testing.
 */

import { AppendBuffer } from './append-buffer.ts';
import { CURSOR, SCREEN, STYLE, FG, fgColor } from '../terminal/ansi.ts';
import { Highlight } from '../features/syntax/types.ts';
import type { EditorState } from '../state/editor-state.ts';

// ============================================
// Types
// ============================================

export const KILN_VERSION = '0.1.0';

export interface RendererOptions {
  /** Output function, called once per frame */
  output: (data: string) => void;
  /** Clock in milliseconds. Defaults to Date.now */
  now?: () => number;
  /** How long a status message stays visible (ms) */
  messageTimeout?: number;
}

/**
 * SGR foreground color for a highlight tag.
 */
export function syntaxToColor(hl: Highlight): number {
  switch (hl) {
    case Highlight.Comment:
      return FG.cyan;
    case Highlight.Keyword1:
      return FG.yellow;
    case Highlight.Keyword2:
      return FG.green;
    case Highlight.String:
      return FG.magenta;
    case Highlight.Number:
      return FG.red;
    case Highlight.Match:
      return FG.blue;
    default:
      return FG.white;
  }
}

function isControlChar(code: number): boolean {
  return code < 32 || code === 127;
}

/**
 * Printable stand-in for a control byte: '@'..'Z' for 0..26, '?' otherwise.
 */
export function controlSymbol(code: number): string {
  return code <= 26 ? String.fromCharCode(64 + code) : '?';
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private output: (data: string) => void;
  private now: () => number;
  private messageTimeout: number;

  constructor(options: RendererOptions) {
    this.output = options.output;
    this.now = options.now ?? Date.now;
    this.messageTimeout = options.messageTimeout ?? 5000;
  }

  setMessageTimeout(ms: number): void {
    this.messageTimeout = ms;
  }

  /**
   * Scroll to the cursor and repaint the whole screen.
   */
  refresh(state: EditorState): void {
    const { viewport, cursor } = state;
    state.rx = viewport.scroll(cursor, state.document);

    const ab = new AppendBuffer();
    ab.append(CURSOR.hide).append(CURSOR.home);

    this.drawRows(state, ab);
    this.drawStatusBar(state, ab);
    this.drawMessageBar(state, ab);

    ab.append(CURSOR.moveTo(cursor.cy - viewport.rowOff + 1, state.rx - viewport.colOff + 1));
    ab.append(CURSOR.show);

    this.output(ab.toString());
  }

  /**
   * Clear the screen and home the cursor (used on quit).
   */
  clearScreen(): void {
    this.output(SCREEN.clear + CURSOR.home);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Text Area
  // ─────────────────────────────────────────────────────────────────────────

  private drawRows(state: EditorState, ab: AppendBuffer): void {
    const { document, viewport } = state;

    for (let y = 0; y < viewport.screenRows; y++) {
      const fileRow = y + viewport.rowOff;
      const row = document.getRow(fileRow);

      if (!row) {
        if (document.numRows === 0 && y === Math.floor(viewport.screenRows / 3)) {
          this.drawWelcome(viewport.screenCols, ab);
        } else {
          ab.append('~');
        }
      } else {
        const start = Math.min(viewport.colOff, row.render.length);
        const end = Math.min(row.render.length, viewport.colOff + viewport.screenCols);
        this.drawLine(row.render, row.hl, start, end, ab);
      }

      ab.append(SCREEN.clearToEnd);
      ab.append('\r\n');
    }
  }

  private drawWelcome(screenCols: number, ab: AppendBuffer): void {
    const welcome = `Kiln editor -- version ${KILN_VERSION}`.slice(0, screenCols);
    let padding = Math.floor((screenCols - welcome.length) / 2);
    if (padding > 0) {
      ab.append('~');
      padding--;
    }
    ab.append(' '.repeat(padding));
    ab.append(welcome);
  }

  /**
   * Emit a slice of a rendered line, changing color only where the tag
   * changes.
   */
  private drawLine(
    render: string,
    hl: readonly Highlight[],
    start: number,
    end: number,
    ab: AppendBuffer
  ): void {
    let currentColor = -1;

    for (let i = start; i < end; i++) {
      const ch = render.charAt(i);
      const code = render.charCodeAt(i);
      const tag = hl[i] ?? Highlight.Normal;

      if (isControlChar(code)) {
        ab.append(STYLE.inverse).append(controlSymbol(code)).append(STYLE.reset);
        if (currentColor !== -1) {
          ab.append(fgColor(currentColor));
        }
      } else if (tag === Highlight.Normal) {
        if (currentColor !== -1) {
          ab.append(fgColor(FG.default));
          currentColor = -1;
        }
        ab.append(ch);
      } else {
        const color = syntaxToColor(tag);
        if (color !== currentColor) {
          currentColor = color;
          ab.append(fgColor(color));
        }
        ab.append(ch);
      }
    }

    ab.append(fgColor(FG.default));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status & Message Bars
  // ─────────────────────────────────────────────────────────────────────────

  private drawStatusBar(state: EditorState, ab: AppendBuffer): void {
    const { document, viewport, cursor } = state;
    const width = viewport.screenCols;

    const name = (document.filename ?? '[No Name]').slice(0, 20);
    const modified = document.isDirty() ? '(modified)' : '';
    const status = `${name} - ${document.numRows} lines ${modified}`.slice(0, width);
    const filetype = document.getSyntax()?.filetype ?? 'no ft';
    const rstatus = `${filetype} | ${cursor.cy + 1}/${document.numRows}`;

    ab.append(STYLE.inverse);
    ab.append(status);
    let len = status.length;
    while (len < width) {
      if (width - len === rstatus.length) {
        ab.append(rstatus);
        break;
      }
      ab.append(' ');
      len++;
    }
    ab.append(STYLE.reset);
    ab.append('\r\n');
  }

  private drawMessageBar(state: EditorState, ab: AppendBuffer): void {
    ab.append(SCREEN.clearToEnd);
    const { text, time } = state.statusMessage;
    const message = text.slice(0, state.viewport.screenCols);
    if (message.length > 0 && this.now() - time < this.messageTimeout) {
      ab.append(message);
    }
  }
}

// ============================================
// Factory Functions
// ============================================

/**
 * Create a renderer that captures frames (for testing).
 */
export function createTestRenderer(
  options: Omit<RendererOptions, 'output'> = {}
): { renderer: Renderer; getOutput: () => string; getFrames: () => string[]; clearOutput: () => void } {
  let frames: string[] = [];

  const renderer = new Renderer({
    ...options,
    output: (data: string) => {
      frames.push(data);
    },
  });

  return {
    renderer,
    getOutput: () => frames.join(''),
    getFrames: () => [...frames],
    clearOutput: () => {
      frames = [];
    },
  };
}
