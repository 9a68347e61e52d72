/**
 * Error Types
 *
 * Two tiers: TerminalError is fatal and only handled at the entry point,
 * FileSaveError is reported in the message bar and editing continues.
 */

export class KilnError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KilnError';
    this.code = code;
  }
}

/**
 * Terminal or device level failure. The session is presumed broken.
 */
export class TerminalError extends KilnError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TERMINAL', message, options);
    this.name = 'TerminalError';
  }
}

/**
 * Writing the document to disk failed. The in-memory buffer is untouched.
 */
export class FileSaveError extends KilnError {
  readonly path: string;

  constructor(path: string, description: string, options?: { cause?: unknown }) {
    super('FILE_SAVE', description, options);
    this.name = 'FileSaveError';
    this.path = path;
  }
}

/**
 * Normalize any thrown value to a message string.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
