import { open, type FileHandle } from 'node:fs/promises';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('log-tail');

const NEWLINE = 0x0a;

/**
 * Reads only what was appended to a file since the last read.
 *
 * The offset moves forward only after a successful read and only past
 * complete lines, so a line written in two chunks is read once, whole.
 * It never moves backwards: a file that shrinks is reported and skipped
 * until it grows past the previous offset.
 */
export class LogTail {
  readonly path: string;
  private position: number;

  constructor(path: string, startOffset: number = 0) {
    this.path = path;
    this.position = startOffset;
  }

  get offset(): number {
    return this.position;
  }

  async readNewLines(): Promise<string[]> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    try {
      const { size } = await handle.stat();

      if (size < this.position) {
        logger.warn(`${this.path} shrank from ${this.position} to ${size} bytes, waiting for new content`);
        return [];
      }
      if (size === this.position) {
        return [];
      }

      const buffer = Buffer.alloc(size - this.position);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.position);
      const chunk = buffer.subarray(0, bytesRead);

      const lastNewline = chunk.lastIndexOf(NEWLINE);
      if (lastNewline === -1) {
        return [];
      }

      const complete = chunk.subarray(0, lastNewline + 1);
      this.position += complete.length;

      return complete
        .toString('utf-8')
        .split(/\r?\n/)
        .filter((line) => line.length > 0);
    } finally {
      await handle.close();
    }
  }
}
