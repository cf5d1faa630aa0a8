import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { withLock } from '../utils/file-mutex.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('pid-file');

/**
 * Single-purpose file holding the PID of the server this manager started.
 * Advisory only: a missing, empty or garbled file reads as "no record".
 */
export class PidFile {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async read(): Promise<number | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch {
      return null;
    }

    const pid = Number(content.trim());
    if (!Number.isInteger(pid) || pid <= 0) {
      if (content.trim() !== '') {
        logger.warn(`Ignoring unreadable PID record in ${this.path}`);
      }
      return null;
    }
    return pid;
  }

  async write(pid: number): Promise<void> {
    await withLock(this.path, async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, String(pid), 'utf-8');
    });
  }

  async clear(): Promise<void> {
    await withLock(this.path, () => rm(this.path, { force: true }));
  }
}
