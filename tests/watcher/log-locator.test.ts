import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findActivityLog } from '../../src/watcher/log-locator.js';
import { makeTempDir, removeDir, touch } from '../helpers/fixtures.js';

describe('findActivityLog', () => {
  let home: string;

  beforeEach(async () => {
    home = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(home);
  });

  it('prefers the configured logs directory', async () => {
    const logs = join(home, 'Steam', 'logs');
    await mkdir(logs, { recursive: true });
    await touch(logs, 'gameprocess_log.txt');

    expect(await findActivityLog({ steamLogsDir: logs, logFile: 'gameprocess_log.txt' }, home)).toBe(
      join(logs, 'gameprocess_log.txt')
    );
  });

  it('falls back to a Scoop install', async () => {
    const logs = join(home, 'scoop', 'apps', 'steam', '2.10.91.91', 'logs');
    await mkdir(logs, { recursive: true });
    await touch(logs, 'gameprocess_log.txt');

    expect(
      await findActivityLog({ steamLogsDir: join(home, 'missing'), logFile: 'gameprocess_log.txt' }, home)
    ).toBe(join(logs, 'gameprocess_log.txt'));
  });

  it('returns null when Steam is not installed', async () => {
    expect(
      await findActivityLog({ steamLogsDir: join(home, 'missing'), logFile: 'gameprocess_log.txt' }, home)
    ).toBeNull();
  });
});
