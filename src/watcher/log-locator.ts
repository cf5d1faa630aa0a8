import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import type { SteamConfig } from '../config/schema.js';

/**
 * Locate Steam's game process log: the configured logs directory first,
 * then a Scoop install (`~/scoop/apps/steam/<version>/logs`).
 */
export async function findActivityLog(
  steam: Pick<SteamConfig, 'steamLogsDir' | 'logFile'>,
  home: string = os.homedir()
): Promise<string | null> {
  const primary = join(steam.steamLogsDir, steam.logFile);
  if (existsSync(primary)) {
    return primary;
  }

  const scoopRoot = join(home, 'scoop', 'apps', 'steam');
  let versions: string[];
  try {
    versions = (await readdir(scoopRoot)).sort();
  } catch {
    // No Scoop install
    return null;
  }

  for (const version of versions) {
    const candidate = join(scoopRoot, version, 'logs', steam.logFile);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}
