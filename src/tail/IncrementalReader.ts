/**
 * Incremental Reader
 *
 * Reads the bytes appended since the cursor's offset. The file is opened
 * for each read and closed before returning, so rotation never leaves a
 * handle pinned to the old file.
 */

import * as fs from 'fs/promises';
import { toTailError } from './errors.js';
import type { WatchCursor } from './WatchCursor.js';

/** Upper bound on bytes consumed in one poll */
export const DEFAULT_MAX_READ_BYTES = 4 * 1024 * 1024;

const CHUNK_SIZE = 64 * 1024;

export interface IncrementalReaderOptions {
  maxReadBytes?: number;
}

export class IncrementalReader {
  private readonly maxReadBytes: number;

  constructor(options: IncrementalReaderOptions = {}) {
    this.maxReadBytes = options.maxReadBytes ?? DEFAULT_MAX_READ_BYTES;
  }

  /**
   * Read from cursor.offset up to `upTo` (the size the detector saw),
   * capped at maxReadBytes. Advances the cursor by the bytes actually read;
   * a file shrinking mid-read just yields fewer bytes.
   *
   * On failure the cursor is left untouched.
   */
  async readNewBytes(cursor: WatchCursor, upTo: number): Promise<Buffer> {
    const wanted = Math.min(upTo - cursor.offset, this.maxReadBytes);
    if (wanted <= 0) {
      return Buffer.alloc(0);
    }

    let handle: fs.FileHandle | null = null;
    const chunks: Buffer[] = [];
    let total = 0;

    try {
      handle = await fs.open(cursor.filePath, 'r');

      while (total < wanted) {
        const size = Math.min(CHUNK_SIZE, wanted - total);
        const buffer = Buffer.alloc(size);
        const { bytesRead } = await handle.read(buffer, 0, size, cursor.offset + total);
        if (bytesRead === 0) {
          break;
        }
        chunks.push(bytesRead === size ? buffer : buffer.subarray(0, bytesRead));
        total += bytesRead;
      }
    } catch (error) {
      throw toTailError(cursor.filePath, error);
    } finally {
      if (handle) {
        await handle.close();
      }
    }

    cursor.offset += total;
    return Buffer.concat(chunks, total);
  }

  /**
   * Rewind after truncation or replacement. Everything now in the file
   * is new.
   */
  reset(cursor: WatchCursor, fileIdentity?: string): void {
    cursor.offset = 0;
    if (fileIdentity !== undefined) {
      cursor.fileIdentity = fileIdentity;
    }
  }
}
