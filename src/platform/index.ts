/**
 * Platform detection and per-OS defaults.
 *
 * Build one with createPlatform() and pass it down; nothing in the
 * manager reaches for process.platform on its own.
 */

import { existsSync } from 'node:fs';
import os from 'node:os';
import { join } from 'node:path';
import { SystemProcessTable } from './process-table.js';
import type { Platform, PlatformName, ProcessTable } from './types.js';

export type { Platform, PlatformName, ProcessInfo, ProcessTable, WaitForExitOptions } from './types.js';
export { SystemProcessTable, collectDescendants, parseCimOutput, parsePsOutput } from './process-table.js';

function firstExisting(candidates: string[], fallback: string): string {
  return candidates.find((candidate) => existsSync(candidate)) ?? fallback;
}

function firstExistingOrNull(candidates: string[]): string | null {
  return candidates.find((candidate) => existsSync(candidate)) ?? null;
}

class LinuxPlatform implements Platform {
  readonly name: PlatformName = 'linux';

  constructor(readonly processes: ProcessTable, private readonly home: string) {}

  defaultModelsDir(): string {
    return join(this.home, 'models');
  }

  defaultCacheDir(): string {
    return join(this.home, '.cache', 'local-ai');
  }

  defaultLogDir(): string {
    return join(this.home, '.local', 'log');
  }

  defaultConfigDir(): string {
    return join(this.home, '.config', 'local-ai');
  }

  llamaServerPath(): string {
    return firstExisting(
      [join(this.home, 'bin', 'llama-server'), '/usr/local/bin/llama-server', '/usr/bin/llama-server'],
      'llama-server'
    );
  }

  steamLogsDir(): string | null {
    return firstExistingOrNull([
      join(this.home, '.local', 'share', 'Steam', 'logs'),
      // Flatpak install
      join(this.home, '.var', 'app', 'com.valvesoftware.Steam', '.local', 'share', 'Steam', 'logs'),
    ]);
  }
}

class MacPlatform implements Platform {
  readonly name: PlatformName = 'darwin';

  constructor(readonly processes: ProcessTable, private readonly home: string) {}

  defaultModelsDir(): string {
    return join(this.home, 'models');
  }

  defaultCacheDir(): string {
    return join(this.home, 'Library', 'Caches', 'local-ai');
  }

  defaultLogDir(): string {
    return join(this.home, 'Library', 'Logs', 'local-ai');
  }

  defaultConfigDir(): string {
    return join(this.home, 'Library', 'Application Support', 'local-ai');
  }

  llamaServerPath(): string {
    return firstExisting(
      [join(this.home, 'bin', 'llama-server'), '/usr/local/bin/llama-server', '/opt/homebrew/bin/llama-server'],
      'llama-server'
    );
  }

  steamLogsDir(): string | null {
    return firstExistingOrNull([join(this.home, 'Library', 'Application Support', 'Steam', 'logs')]);
  }
}

class WindowsPlatform implements Platform {
  readonly name: PlatformName = 'win32';

  constructor(readonly processes: ProcessTable, private readonly home: string) {}

  defaultModelsDir(): string {
    return join(this.home, 'models');
  }

  defaultCacheDir(): string {
    return join(this.home, '.cache', 'local-ai');
  }

  defaultLogDir(): string {
    return join(this.home, '.local', 'log');
  }

  defaultConfigDir(): string {
    return join(this.home, '.config', 'local-ai');
  }

  llamaServerPath(): string {
    return firstExisting([join(this.home, 'bin', 'llama-server.exe')], 'llama-server.exe');
  }

  steamLogsDir(): string | null {
    return firstExistingOrNull([
      join(this.home, 'scoop', 'apps', 'steam', 'current', 'logs'),
      'C:/Program Files (x86)/Steam/logs',
      'C:/Program Files/Steam/logs',
    ]);
  }
}

/**
 * Build the platform for `name` (defaults to the running OS).
 * A custom process table can be supplied, which tests use.
 */
export function createPlatform(
  name: NodeJS.Platform = process.platform,
  options: { processes?: ProcessTable; home?: string } = {}
): Platform {
  const home = options.home ?? os.homedir();

  switch (name) {
    case 'linux':
      return new LinuxPlatform(options.processes ?? new SystemProcessTable('linux'), home);
    case 'darwin':
      return new MacPlatform(options.processes ?? new SystemProcessTable('darwin'), home);
    case 'win32':
      return new WindowsPlatform(options.processes ?? new SystemProcessTable('win32'), home);
    default:
      throw new Error(`Unsupported platform: ${name}`);
  }
}
