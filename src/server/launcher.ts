/**
 * Spawns the llama-server binary.
 */

import { spawn, type StdioOptions } from 'node:child_process';
import { closeSync, mkdirSync, openSync } from 'node:fs';
import { dirname } from 'node:path';
import { ProcessError } from '../errors.js';

export interface LaunchRequest {
  command: string;
  args: string[];
  /** Detached with output appended to `logFile`; inherits stdio otherwise */
  background: boolean;
  logFile: string;
}

/**
 * Starts the process and resolves with its PID once the OS has created
 * it. Rejects with ProcessError when spawning fails (e.g. missing binary).
 */
export type ServerLauncher = (request: LaunchRequest) => Promise<number>;

export const spawnServer: ServerLauncher = (request) => {
  let logFd: number | null = null;
  let stdio: StdioOptions = 'inherit';

  if (request.background) {
    mkdirSync(dirname(request.logFile), { recursive: true });
    logFd = openSync(request.logFile, 'a');
    stdio = ['ignore', logFd, logFd];
  }

  const closeLog = (): void => {
    if (logFd !== null) {
      closeSync(logFd);
      logFd = null;
    }
  };

  return new Promise<number>((resolve, reject) => {
    const child = spawn(request.command, request.args, {
      stdio,
      detached: request.background,
      windowsHide: true,
    });

    child.once('spawn', () => {
      // The child holds its own copy of the descriptor
      closeLog();
      if (request.background) {
        child.unref();
      }
      if (child.pid === undefined) {
        reject(new ProcessError(`${request.command} started without a PID`));
        return;
      }
      resolve(child.pid);
    });

    child.once('error', (error) => {
      closeLog();
      reject(new ProcessError(`Failed to spawn ${request.command}: ${error.message}`, null, error));
    });
  });
};
