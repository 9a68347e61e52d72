/**
 * Prompt
 *
 * Single-line input in the message bar. The callback runs after every key,
 * which is how incremental search follows the query as it is typed.
 */

import { isCtrlKey, type KeyEvent } from '../terminal/input.ts';

/**
 * Called with the current buffer and the key just pressed.
 */
export type PromptCallback = (input: string, key: KeyEvent) => void;

/**
 * What the prompt loop needs from the session.
 */
export interface PromptHost {
  setStatusMessage(text: string): void;
  refresh(): void;
  readKey(): Promise<KeyEvent>;
}

function isPrintableAscii(char: string | undefined): char is string {
  if (char === undefined || char.length !== 1) return false;
  const code = char.charCodeAt(0);
  return code >= 32 && code < 127;
}

/**
 * Ask for a line of input. `template` contains one '%s' where the typed text
 * is shown. Resolves null when cancelled with Escape.
 */
export async function prompt(
  host: PromptHost,
  template: string,
  callback?: PromptCallback
): Promise<string | null> {
  let buffer = '';

  for (;;) {
    host.setStatusMessage(template.replace('%s', buffer));
    host.refresh();

    const key = await host.readKey();

    if (key.key === 'BACKSPACE' || key.key === 'DELETE' || isCtrlKey(key, 'h')) {
      buffer = buffer.slice(0, -1);
    } else if (key.key === 'ESCAPE') {
      host.setStatusMessage('');
      callback?.(buffer, key);
      return null;
    } else if (key.key === 'ENTER') {
      if (buffer.length !== 0) {
        host.setStatusMessage('');
        callback?.(buffer, key);
        return buffer;
      }
    } else if (!key.ctrl && isPrintableAscii(key.char)) {
      buffer += key.char;
    }

    callback?.(buffer, key);
  }
}
