/**
 * Editor Session
 *
 * Orchestrates the read-key, interpret, mutate, repaint loop over a single
 * document.
 */

import { Document } from './core/document.ts';
import { Settings } from './config/settings.ts';
import { createEditorState, setStatusMessage, type EditorState } from './state/editor-state.ts';
import { moveCursor, moveToLineEnd, moveToLineStart, pageCursor } from './state/cursor.ts';
import { Renderer } from './ui/renderer.ts';
import { prompt, type PromptHost } from './ui/prompt.ts';
import { KeyDecoder, isCtrlKey, type KeyEvent } from './terminal/input.ts';
import type { Terminal } from './terminal/terminal.ts';
import { IncrementalSearch, find } from './features/search/incremental-search.ts';
import { selectSyntax } from './features/syntax/languages.ts';
import { NodeFileStore, type FileStore } from './services/file-store.ts';
import { FileSaveError } from './errors.ts';
import { debugLog } from './debug.ts';
import type { Size } from './ui/viewport.ts';

export const HELP_MESSAGE = 'HELP: Ctrl-S = save | Ctrl-Q = quit | Ctrl-F = find';
export const SAVE_AS_PROMPT = 'Save as: %s (ESC to cancel)';

export interface SessionOptions {
  terminal: Terminal;
  settings?: Settings;
  fileStore?: FileStore;
  /** Clock in milliseconds. Defaults to Date.now */
  now?: () => number;
}

// ============================================
// Session Class
// ============================================

export class Session implements PromptHost {
  readonly state: EditorState;
  private terminal: Terminal;
  private settings: Settings;
  private fileStore: FileStore;
  private now: () => number;
  private renderer: Renderer;
  private decoder: KeyDecoder;
  private search: IncrementalSearch;
  private running = false;

  constructor(options: SessionOptions, size: Size) {
    this.terminal = options.terminal;
    this.settings = options.settings ?? new Settings();
    this.fileStore = options.fileStore ?? new NodeFileStore();
    this.now = options.now ?? Date.now;

    const document = new Document({ tabStop: this.settings.get('editor.tabStop') });
    this.state = createEditorState(document, size, this.settings.get('editor.quitTimes'));

    this.renderer = new Renderer({
      output: (data) => this.terminal.write(data),
      now: this.now,
      messageTimeout: this.settings.get('editor.statusMessageTimeout'),
    });
    this.decoder = new KeyDecoder(this.terminal.input, this.settings.get('input.escapeTimeout'));
    this.search = new IncrementalSearch(this.state);

    this.settings.onChange('editor.statusMessageTimeout', (ms) => this.renderer.setMessageTimeout(ms));
    this.settings.onChange('input.escapeTimeout', (ms) => this.decoder.setEscapeTimeout(ms));
  }

  /**
   * Create a session sized to the terminal.
   */
  static async create(options: SessionOptions): Promise<Session> {
    const size = await options.terminal.getWindowSize();
    debugLog(`[Session] Window size ${size.width}x${size.height}`);
    return new Session(options, size);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load a file. A path that does not exist yet opens an empty buffer that
   * will be created on save.
   */
  async open(filename: string): Promise<void> {
    const document = this.state.document;
    const lines = await this.fileStore.readLines(filename);

    document.filename = filename;
    document.setSyntax(selectSyntax(filename));
    document.load(lines ?? []);

    debugLog(`[Session] Opened ${filename} (${document.numRows} rows${lines ? '' : ', new file'})`);
  }

  /**
   * Run until the user quits.
   */
  async run(): Promise<void> {
    this.running = true;
    while (this.running) {
      this.refresh();
      const key = await this.readKey();
      await this.processKeypress(key);
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PromptHost
  // ─────────────────────────────────────────────────────────────────────────

  setStatusMessage(text: string): void {
    setStatusMessage(this.state, text, this.now());
  }

  refresh(): void {
    this.renderer.refresh(this.state);
  }

  readKey(): Promise<KeyEvent> {
    return this.decoder.nextKey();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Key Handling
  // ─────────────────────────────────────────────────────────────────────────

  async processKeypress(key: KeyEvent): Promise<void> {
    const { state } = this;
    const document = state.document;

    if (isCtrlKey(key, 'q')) {
      if (document.isDirty() && state.quitTimes > 0) {
        this.setStatusMessage(
          `WARNING!!! File has unsaved changes. Press Ctrl-Q ${state.quitTimes} more times to quit.`
        );
        state.quitTimes--;
        return;
      }
      this.quit();
      return;
    }

    if (key.ctrl) {
      switch (key.key) {
        case 'S':
          await this.save();
          break;
        case 'F':
          await find(this, state, this.search);
          break;
        case 'H':
          state.cursor = document.deleteChar(state.cursor);
          break;
        case 'L':
          break;
        default:
          this.insertKeyChar(key);
      }
    } else {
      switch (key.key) {
        case 'ENTER':
          state.cursor = document.insertNewline(state.cursor);
          break;
        case 'HOME':
          moveToLineStart(state);
          break;
        case 'END':
          moveToLineEnd(state);
          break;
        case 'DELETE':
          moveCursor(state, 'RIGHT');
          state.cursor = document.deleteChar(state.cursor);
          break;
        case 'BACKSPACE':
          state.cursor = document.deleteChar(state.cursor);
          break;
        case 'PAGEUP':
          pageCursor(state, 'UP');
          break;
        case 'PAGEDOWN':
          pageCursor(state, 'DOWN');
          break;
        case 'UP':
          moveCursor(state, 'UP');
          break;
        case 'DOWN':
          moveCursor(state, 'DOWN');
          break;
        case 'LEFT':
          moveCursor(state, 'LEFT');
          break;
        case 'RIGHT':
          moveCursor(state, 'RIGHT');
          break;
        case 'ESCAPE':
          break;
        default:
          this.insertKeyChar(key);
      }
    }

    state.quitTimes = this.settings.get('editor.quitTimes');
  }

  private insertKeyChar(key: KeyEvent): void {
    if (key.char === undefined) return;
    this.state.cursor = this.state.document.insertChar(this.state.cursor, key.char);
  }

  private quit(): void {
    this.renderer.clearScreen();
    this.running = false;
    debugLog('[Session] Quit');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Save
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write the document. On failure the buffer, cursor and dirty state are
   * left as they were.
   */
  async save(): Promise<void> {
    const document = this.state.document;

    if (!document.filename) {
      const name = await prompt(this, SAVE_AS_PROMPT);
      if (name === null) {
        this.setStatusMessage('Save aborted');
        return;
      }
      document.filename = name;
      document.setSyntax(selectSyntax(name));
    }

    const text = document.rowsToText();
    try {
      const written = await this.fileStore.writeAll(document.filename, text);
      document.markClean();
      this.setStatusMessage(`${written} bytes written to disk`);
      debugLog(`[Session] Saved ${written} bytes to ${document.filename}`);
    } catch (error) {
      if (!(error instanceof FileSaveError)) throw error;
      this.setStatusMessage(`Can't save! I/O error: ${error.message}`);
      debugLog(`[Session] Save failed: ${error.message}`);
    }
  }
}

/**
 * Create and size a session for the given terminal.
 */
export function createSession(options: SessionOptions): Promise<Session> {
  return Session.create(options);
}
