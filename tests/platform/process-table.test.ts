import { spawn } from 'node:child_process';
import { describe, expect, it } from 'vitest';
import {
  collectDescendants,
  createPlatform,
  parseCimOutput,
  parsePsOutput,
  SystemProcessTable,
  type ProcessInfo,
} from '../../src/platform/index.js';
import { FakeProcessTable } from '../helpers/fake-process-table.js';

describe('parsePsOutput', () => {
  it('parses pid, ppid and the executable base name', () => {
    const stdout = [
      '    1     0 systemd',
      ' 4242     1 /Applications/Game.app/Contents/MacOS/Game',
      ' 5000  4242 llama-server',
      '',
    ].join('\n');

    expect(parsePsOutput(stdout)).toEqual([
      { pid: 1, ppid: 0, name: 'systemd' },
      { pid: 4242, ppid: 1, name: 'Game' },
      { pid: 5000, ppid: 4242, name: 'llama-server' },
    ]);
  });

  it('skips lines that do not parse', () => {
    expect(parsePsOutput('  PID  PPID COMMAND\n')).toEqual([]);
  });
});

describe('parseCimOutput', () => {
  it('accepts a list', () => {
    const stdout = '[{"ProcessId":4,"ParentProcessId":0,"Name":"System"},{"ProcessId":900,"ParentProcessId":4,"Name":"steam.exe"}]';

    expect(parseCimOutput(stdout)).toEqual([
      { pid: 4, ppid: 0, name: 'System' },
      { pid: 900, ppid: 4, name: 'steam.exe' },
    ]);
  });

  it('accepts a single object and a null name', () => {
    expect(parseCimOutput('{"ProcessId":0,"ParentProcessId":0,"Name":null}')).toEqual([
      { pid: 0, ppid: 0, name: '' },
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseCimOutput('  \r\n')).toEqual([]);
  });
});

describe('collectDescendants', () => {
  const table: ProcessInfo[] = [
    { pid: 1, ppid: 0, name: 'init' },
    { pid: 10, ppid: 1, name: 'server' },
    { pid: 11, ppid: 10, name: 'worker' },
    { pid: 12, ppid: 10, name: 'worker' },
    { pid: 13, ppid: 11, name: 'helper' },
    { pid: 20, ppid: 1, name: 'other' },
  ];

  it('collects every transitive child breadth-first', () => {
    expect(collectDescendants(table, 10).map((p) => p.pid)).toEqual([11, 12, 13]);
  });

  it('returns nothing for a leaf', () => {
    expect(collectDescendants(table, 13)).toEqual([]);
  });

  it('survives a parent cycle', () => {
    const cyclic: ProcessInfo[] = [
      { pid: 2, ppid: 3, name: 'a' },
      { pid: 3, ppid: 2, name: 'b' },
    ];
    expect(collectDescendants(cyclic, 2).map((p) => p.pid)).toEqual([3]);
  });
});

describe('createPlatform', () => {
  it('derives directories from the home directory', () => {
    const platform = createPlatform('linux', { processes: new FakeProcessTable(), home: '/home/player' });

    expect(platform.name).toBe('linux');
    expect(platform.defaultModelsDir()).toBe('/home/player/models');
    expect(platform.defaultLogDir()).toBe('/home/player/.local/log');
  });

  it('rejects unsupported platforms', () => {
    expect(() => createPlatform('aix')).toThrow('Unsupported platform: aix');
  });
});

describe('SystemProcessTable', () => {
  const processes = new SystemProcessTable('linux');

  function spawnSleeper(ms: number): { pid: number; exited: Promise<void>; kill: () => void } {
    const child = spawn(process.execPath, ['-e', `setTimeout(() => {}, ${ms})`], { stdio: 'ignore' });
    const pid = child.pid;
    if (pid === undefined) {
      throw new Error('child did not start');
    }
    const exited = new Promise<void>((resolve) => child.once('exit', () => resolve()));
    return { pid, exited, kill: () => child.kill('SIGKILL') };
  }

  it('waits for a child to exit, then misses it when signalling', async () => {
    const sleeper = spawnSleeper(100);
    expect(processes.isAlive(sleeper.pid)).toBe(true);

    expect(await processes.waitForExit(sleeper.pid, { timeoutMs: 10_000 })).toBe(true);
    await sleeper.exited;

    expect(processes.isAlive(sleeper.pid)).toBe(false);
    expect(processes.signal(sleeper.pid, 'SIGTERM')).toBe(false);
  });

  it('stops waiting at the timeout', async () => {
    const sleeper = spawnSleeper(10_000);
    try {
      expect(await processes.waitForExit(sleeper.pid, { timeoutMs: 50 })).toBe(false);
    } finally {
      sleeper.kill();
      await sleeper.exited;
    }
  });

  it('stops waiting when aborted', async () => {
    const sleeper = spawnSleeper(10_000);
    const controller = new AbortController();
    try {
      const waiting = processes.waitForExit(sleeper.pid, { signal: controller.signal });
      controller.abort();
      expect(await waiting).toBe(false);
    } finally {
      sleeper.kill();
      await sleeper.exited;
    }
  });
});
