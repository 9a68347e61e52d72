/**
 * File Store
 *
 * Whole-file read and write. Files are treated as bytes (latin1), one
 * document character per byte.
 */

import * as fs from 'fs';
import { FileSaveError, describeError } from '../errors.ts';

export const FILE_ENCODING = 'latin1';

export interface FileStore {
  /** Lines of the file, newline characters still attached. Null if the file does not exist. */
  readLines(path: string): Promise<string[] | null>;
  /** Write `text` in full or throw FileSaveError. Returns the byte count. */
  writeAll(path: string, text: string): Promise<number>;
}

/**
 * Split file content into lines, each keeping its '\n'. No empty fragment
 * is produced after a trailing newline.
 */
export function splitLines(content: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    const end = newline === -1 ? content.length : newline + 1;
    lines.push(content.slice(start, end));
    start = end;
  }
  return lines;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function toFileSaveError(path: string, error: unknown): FileSaveError {
  if (error instanceof FileSaveError) return error;
  return new FileSaveError(path, describeError(error), { cause: error });
}

export class NodeFileStore implements FileStore {
  async readLines(path: string): Promise<string[] | null> {
    try {
      const content = await fs.promises.readFile(path, FILE_ENCODING);
      return splitLines(content);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  /**
   * Open (creating with 0644), truncate to the new length, then write.
   * A failure to close counts as a failed save unless an earlier step
   * already failed.
   */
  async writeAll(path: string, text: string): Promise<number> {
    const data = Buffer.from(text, FILE_ENCODING);
    let handle: fs.promises.FileHandle | null = null;
    let failure: FileSaveError | null = null;
    let written = 0;

    try {
      handle = await fs.promises.open(path, fs.constants.O_RDWR | fs.constants.O_CREAT, 0o644);
      await handle.truncate(data.length);
      const { bytesWritten } = await handle.write(data, 0, data.length, 0);
      if (bytesWritten !== data.length) {
        throw new FileSaveError(path, `short write (${bytesWritten} of ${data.length} bytes)`);
      }
      written = bytesWritten;
    } catch (error) {
      failure = toFileSaveError(path, error);
    }

    if (handle) {
      try {
        await handle.close();
      } catch (error) {
        failure ??= toFileSaveError(path, error);
      }
    }

    if (failure) throw failure;
    return written;
  }
}
