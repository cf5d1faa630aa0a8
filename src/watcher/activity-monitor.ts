/**
 * Activity Monitor
 *
 * Tails Steam's game process log for launch lines, verifies each PID
 * against the process table and waits for every verified game to exit.
 *
 * File notifications, the startup drain and exit watchers all funnel
 * through one SerialQueue. The session map is only touched from queued
 * tasks, and launch/exit hooks never overlap.
 */

import { watch, type FSWatcher } from 'node:fs';
import { basename, dirname } from 'node:path';
import { errorLogFields } from '../errors.js';
import type { ProcessTable } from '../platform/types.js';
import { clockTime, formatElapsed } from '../utils/duration.js';
import { createLogger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { LogTail } from './log-tail.js';
import type { ActivityHooks, GameSession } from './types.js';

const logger = createLogger('activity');

export const LAUNCH_PATTERN = /adding PID (\d+) as a tracked process/;

export interface ActivityMonitorOptions {
  logPath: string;
  processes: ProcessTable;
  /** Subscribe to directory change notifications (default true) */
  watch?: boolean;
}

export function parseLaunchPid(line: string): number | null {
  const match = LAUNCH_PATTERN.exec(line);
  if (!match?.[1]) {
    return null;
  }
  const pid = Number(match[1]);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

export class ActivityMonitor {
  private readonly options: ActivityMonitorOptions;
  private readonly hooks: ActivityHooks;
  private readonly tail: LogTail;
  private readonly queue = new SerialQueue('activity');
  private readonly sessions = new Map<number, GameSession>();
  private readonly exitWatchers = new Map<number, AbortController>();
  private fsWatcher: FSWatcher | null = null;
  private running = false;

  constructor(options: ActivityMonitorOptions, hooks: ActivityHooks) {
    this.options = options;
    this.hooks = hooks;
    this.tail = new LogTail(options.logPath);
  }

  get logPath(): string {
    return this.options.logPath;
  }

  /** Current byte offset into the log */
  get offset(): number {
    return this.tail.offset;
  }

  isRunning(): boolean {
    return this.running;
  }

  activeSessions(): GameSession[] {
    return [...this.sessions.values()];
  }

  activeCount(): number {
    return this.sessions.size;
  }

  hasSession(pid: number): boolean {
    return this.sessions.has(pid);
  }

  /**
   * Drain what the log already contains, then follow it.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    // Subscribe before draining so a line written in between is not missed
    if (this.options.watch !== false) {
      const file = basename(this.options.logPath);
      this.fsWatcher = watch(dirname(this.options.logPath), (_event, filename) => {
        if (filename === null || filename === file) {
          this.notifyChange();
        }
      });
      this.fsWatcher.on('error', (error) => {
        logger.error('File watcher failed', errorLogFields(error));
      });
    }

    await this.poll();

    logger.debug(`Watching ${this.options.logPath}`);
  }

  /**
   * Stop following the log and cancel exit watchers. Tasks already on the
   * queue finish on their own; nothing is joined here.
   */
  stop(): void {
    this.running = false;

    this.fsWatcher?.close();
    this.fsWatcher = null;

    for (const controller of this.exitWatchers.values()) {
      controller.abort();
    }
    this.exitWatchers.clear();

    logger.debug('Activity monitor stopped');
  }

  /**
   * File change notification. Safe to call any number of times: a read
   * that finds no new bytes does nothing.
   */
  notifyChange(): void {
    void this.poll();
  }

  /**
   * Queue a read of newly appended lines; resolves once it (and anything
   * queued before it) has been handled.
   */
  poll(): Promise<void> {
    return this.queue.run(async () => {
      let lines: string[];
      try {
        lines = await this.tail.readNewLines();
      } catch (error) {
        logger.error(`Failed to read ${this.options.logPath}`, errorLogFields(error));
        return;
      }

      for (const line of lines) {
        const pid = parseLaunchPid(line);
        if (pid !== null) {
          await this.handleLaunch(pid);
        }
      }
    });
  }

  /**
   * Resolves when every queued task has run.
   */
  idle(): Promise<void> {
    return this.queue.drain();
  }

  private async handleLaunch(pid: number): Promise<void> {
    if (!this.running) {
      return;
    }
    // A session whose exit is already queued does not block a reused PID
    if (this.sessions.has(pid) && this.exitWatchers.has(pid)) {
      return;
    }

    let proc;
    try {
      proc = await this.options.processes.get(pid);
    } catch (error) {
      logger.warn(`Could not verify PID ${pid}`, errorLogFields(error));
      return;
    }
    if (!proc) {
      // Exited between the log write and our check (or an old line)
      logger.debug(`PID ${pid} is not running, ignoring`);
      return;
    }
    if (!this.running) {
      return;
    }

    const previous = this.sessions.get(pid);
    if (previous) {
      logger.debug(`PID ${pid} reused by ${proc.name}, replacing ${previous.name}`);
    }

    const session: GameSession = { pid, name: proc.name, startedAt: new Date() };
    this.sessions.set(pid, session);
    logger.info(`[${clockTime(session.startedAt)}] Game launched: ${session.name} (PID ${pid})`);

    try {
      await this.hooks.onLaunch(session);
    } catch (error) {
      logger.error(`Launch handler failed for PID ${pid}`, errorLogFields(error));
    }

    // stop() may have run while the hook was in flight
    if (this.running) {
      this.watchExit(session);
    }
  }

  private watchExit(session: GameSession): void {
    const controller = new AbortController();
    this.exitWatchers.set(session.pid, controller);

    this.options.processes
      .waitForExit(session.pid, { signal: controller.signal })
      .catch((error: unknown) => {
        // Without a working wait there is no way to see the exit; treat it as gone
        logger.error(`Exit watcher for PID ${session.pid} failed`, errorLogFields(error));
        return true;
      })
      .then((exited) => {
        if (this.exitWatchers.get(session.pid) === controller) {
          this.exitWatchers.delete(session.pid);
        }
        if (!exited || controller.signal.aborted) {
          return;
        }
        return this.queue.run(() => this.handleExit(session));
      })
      .catch((error: unknown) => {
        logger.error(`Exit handling failed for PID ${session.pid}`, errorLogFields(error));
      });
  }

  private async handleExit(session: GameSession): Promise<void> {
    if (!this.running || this.sessions.get(session.pid) !== session) {
      return;
    }
    this.sessions.delete(session.pid);

    const remaining = this.sessions.size;
    logger.info(`[${clockTime()}] Game closed: ${session.name} (PID ${session.pid}) after ${formatElapsed(session.startedAt)}`);

    try {
      await this.hooks.onExit(session, remaining);
    } catch (error) {
      logger.error(`Exit handler failed for PID ${session.pid}`, errorLogFields(error));
    }
  }
}
