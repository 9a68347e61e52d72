/**
 * Editor State
 *
 * Everything the session mutates between a key read and the next repaint,
 * owned in one place and passed down the call chain.
 */

import { Document, type Position } from '../core/document.ts';
import { Viewport, type Size } from '../ui/viewport.ts';

export interface StatusMessage {
  text: string;
  /** Clock time (ms) when the message was set */
  time: number;
}

export interface EditorState {
  document: Document;
  cursor: Position;
  /** Rendered column of the cursor, derived on every scroll */
  rx: number;
  viewport: Viewport;
  statusMessage: StatusMessage;
  /** Remaining Ctrl-Q presses before quitting with unsaved changes */
  quitTimes: number;
}

export function createEditorState(document: Document, size: Size, quitTimes: number): EditorState {
  return {
    document,
    cursor: { cx: 0, cy: 0 },
    rx: 0,
    viewport: Viewport.forTerminal(size),
    statusMessage: { text: '', time: 0 },
    quitTimes,
  };
}

export function setStatusMessage(state: EditorState, text: string, now: number): void {
  state.statusMessage = { text, time: now };
}
