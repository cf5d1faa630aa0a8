import { appendFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ActivityMonitor, parseLaunchPid } from '../../src/watcher/activity-monitor.js';
import type { GameSession } from '../../src/watcher/types.js';
import { FakeProcessTable } from '../helpers/fake-process-table.js';
import { makeTempDir, removeDir } from '../helpers/fixtures.js';

const launchLine = (pid: number) =>
  `[2024-01-01 20:00:00] AppID 440 adding PID ${pid} as a tracked process "/games/hl2.sh"\n`;

describe('parseLaunchPid', () => {
  it('extracts the PID from a launch line', () => {
    expect(parseLaunchPid(launchLine(4242))).toBe(4242);
  });

  it('ignores other lines', () => {
    expect(parseLaunchPid('[2024-01-01 20:00:00] AppID 440 no longer tracking PID 4242')).toBeNull();
  });
});

describe('ActivityMonitor', () => {
  let dir: string;
  let logPath: string;
  let table: FakeProcessTable;
  let monitor: ActivityMonitor;
  const onLaunch = vi.fn((_session: GameSession): void => undefined);
  const onExit = vi.fn((_session: GameSession, _remaining: number): void => undefined);

  beforeEach(async () => {
    dir = await makeTempDir();
    logPath = join(dir, 'gameprocess_log.txt');
    await writeFile(logPath, '');
    table = new FakeProcessTable();
    onLaunch.mockReset();
    onExit.mockReset();
    monitor = new ActivityMonitor({ logPath, processes: table, watch: false }, { onLaunch, onExit });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    monitor.stop();
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('reports one launch and one exit for a tracked game', async () => {
    table.add(4242, 'hl2_linux');
    await writeFile(logPath, launchLine(4242));

    await monitor.start();

    expect(onLaunch).toHaveBeenCalledTimes(1);
    expect(onLaunch.mock.calls[0]?.[0]).toMatchObject({ pid: 4242, name: 'hl2_linux' });
    expect(monitor.activeCount()).toBe(1);

    table.exit(4242);

    await vi.waitFor(() => expect(onExit).toHaveBeenCalledTimes(1));
    expect(onExit.mock.calls[0]?.[0]).toMatchObject({ pid: 4242 });
    expect(onExit.mock.calls[0]?.[1]).toBe(0);
    expect(monitor.activeCount()).toBe(0);
    expect(onLaunch).toHaveBeenCalledTimes(1);
  });

  it('counts down overlapping sessions', async () => {
    table.add(100, 'game-a');
    table.add(200, 'game-b');
    await writeFile(logPath, launchLine(100) + launchLine(200));

    await monitor.start();
    expect(monitor.activeSessions().map((s) => s.pid)).toEqual([100, 200]);

    table.exit(100);
    await vi.waitFor(() => expect(onExit).toHaveBeenCalledTimes(1));
    expect(onExit.mock.calls[0]?.[1]).toBe(1);

    table.exit(200);
    await vi.waitFor(() => expect(onExit).toHaveBeenCalledTimes(2));
    expect(onExit.mock.calls[1]?.[1]).toBe(0);
  });

  it('does nothing when notified without new bytes', async () => {
    table.add(4242, 'hl2_linux');
    await writeFile(logPath, launchLine(4242));
    await monitor.start();
    const offset = monitor.offset;

    await monitor.poll();
    await monitor.poll();

    expect(onLaunch).toHaveBeenCalledTimes(1);
    expect(onExit).not.toHaveBeenCalled();
    expect(monitor.offset).toBe(offset);
  });

  it('picks up lines appended after start', async () => {
    await monitor.start();
    expect(onLaunch).not.toHaveBeenCalled();

    table.add(4242, 'hl2_linux');
    await appendFile(logPath, launchLine(4242));
    await monitor.poll();

    expect(onLaunch).toHaveBeenCalledTimes(1);
  });

  it('drops PIDs that are already gone', async () => {
    await writeFile(logPath, launchLine(999));

    await monitor.start();

    expect(onLaunch).not.toHaveBeenCalled();
    expect(monitor.activeCount()).toBe(0);
  });

  it('tracks a PID once even if the log repeats it', async () => {
    table.add(4242, 'hl2_linux');
    await writeFile(logPath, launchLine(4242) + launchLine(4242));

    await monitor.start();

    expect(onLaunch).toHaveBeenCalledTimes(1);
    expect(monitor.activeCount()).toBe(1);
  });

  it('keeps going after a hook throws', async () => {
    onLaunch.mockImplementationOnce(() => {
      throw new Error('hook failed');
    });
    table.add(100, 'game-a');
    table.add(200, 'game-b');
    await writeFile(logPath, launchLine(100) + launchLine(200));

    await monitor.start();

    expect(onLaunch).toHaveBeenCalledTimes(2);
    expect(monitor.activeCount()).toBe(2);
  });

  it('follows appends through file notifications', async () => {
    const watched = new ActivityMonitor({ logPath, processes: table }, { onLaunch, onExit });
    try {
      await watched.start();

      table.add(4242, 'hl2_linux');
      await appendFile(logPath, launchLine(4242));

      await vi.waitFor(() => expect(onLaunch).toHaveBeenCalledTimes(1), { timeout: 2_000 });
      expect(watched.hasSession(4242)).toBe(true);
    } finally {
      watched.stop();
    }
  });

  it('ignores notifications for other files in the directory', async () => {
    const watched = new ActivityMonitor({ logPath, processes: table }, { onLaunch, onExit });
    const poll = vi.spyOn(watched, 'poll');
    try {
      await watched.start();
      poll.mockClear();

      await writeFile(join(dir, 'content_log.txt'), 'unrelated\n');
      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(poll).not.toHaveBeenCalled();
    } finally {
      watched.stop();
    }
  });

  it('does not watch for exits when stopped during the launch hook', async () => {
    onLaunch.mockImplementationOnce(() => {
      monitor.stop();
    });
    table.add(4242, 'hl2_linux');
    await writeFile(logPath, launchLine(4242));
    await monitor.start();

    table.exit(4242);
    await new Promise((resolve) => setTimeout(resolve, 20));
    await monitor.idle();

    expect(monitor.isRunning()).toBe(false);
    expect(onExit).not.toHaveBeenCalled();
  });

  it('tracks a reused PID whose previous exit is still queued', async () => {
    table.add(4242, 'game-a');
    await writeFile(logPath, launchLine(4242));
    await monitor.start();

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    onLaunch.mockImplementationOnce(() => gate);
    table.add(5151, 'game-c');
    await appendFile(logPath, launchLine(5151) + launchLine(4242));

    // Hold the queue inside game-c's launch hook
    const polling = monitor.poll();
    await vi.waitFor(() => expect(onLaunch).toHaveBeenCalledTimes(2));

    table.exit(4242);
    table.add(4242, 'game-b');
    await new Promise((resolve) => setTimeout(resolve, 20));
    release();
    await polling;
    await monitor.idle();

    expect(onLaunch).toHaveBeenCalledTimes(3);
    expect(onLaunch.mock.calls[2]?.[0]).toMatchObject({ pid: 4242, name: 'game-b' });
    expect(onExit).not.toHaveBeenCalled();
    expect(monitor.activeSessions().map((s) => s.name)).toEqual(['game-b', 'game-c']);
  });

  it('stops watching for exits after stop()', async () => {
    table.add(4242, 'hl2_linux');
    await writeFile(logPath, launchLine(4242));
    await monitor.start();

    monitor.stop();
    table.exit(4242);
    await new Promise((resolve) => setTimeout(resolve, 20));
    await monitor.idle();

    expect(onExit).not.toHaveBeenCalled();
  });
});
