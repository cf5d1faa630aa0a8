/**
 * OS process table backed by the platform's own tools:
 * `ps`/`lsof` on Linux and macOS, PowerShell CIM queries on Windows.
 */

import { execFile } from 'node:child_process';
import { basename } from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { sleep, TIMEOUTS } from '../utils/timeout.js';
import type { PlatformName, ProcessInfo, ProcessTable, WaitForExitOptions } from './types.js';

const execFileAsync = promisify(execFile);

const logger = createLogger('processes');

const PS_LINE = /^\s*(\d+)\s+(\d+)\s+(.+?)\s*$/;

const CimProcessSchema = z.object({
  ProcessId: z.number(),
  ParentProcessId: z.number(),
  Name: z.string().nullable(),
});

const CimProcessListSchema = z.union([z.array(CimProcessSchema), CimProcessSchema]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function parsePsOutput(stdout: string): ProcessInfo[] {
  const result: ProcessInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = PS_LINE.exec(line);
    if (!match) continue;
    const [, pid, ppid, comm] = match;
    if (pid === undefined || ppid === undefined || comm === undefined) continue;
    // macOS reports the full executable path in `comm`
    result.push({ pid: Number(pid), ppid: Number(ppid), name: basename(comm) });
  }
  return result;
}

export function parseCimOutput(stdout: string): ProcessInfo[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  const parsed = CimProcessListSchema.safeParse(JSON.parse(trimmed));
  if (!parsed.success) {
    logger.warn('Unexpected process list format', { issues: parsed.error.issues.length });
    return [];
  }

  const items = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return items.map((item) => ({
    pid: item.ProcessId,
    ppid: item.ParentProcessId,
    name: item.Name ?? '',
  }));
}

/**
 * Walk the parent links breadth-first and collect every transitive child.
 */
export function collectDescendants(table: ProcessInfo[], rootPid: number): ProcessInfo[] {
  const byParent = new Map<number, ProcessInfo[]>();
  for (const proc of table) {
    const siblings = byParent.get(proc.ppid) ?? [];
    siblings.push(proc);
    byParent.set(proc.ppid, siblings);
  }

  const result: ProcessInfo[] = [];
  const seen = new Set<number>([rootPid]);
  const frontier = [rootPid];

  while (frontier.length > 0) {
    const current = frontier.shift();
    if (current === undefined) break;
    for (const child of byParent.get(current) ?? []) {
      if (seen.has(child.pid)) continue;
      seen.add(child.pid);
      result.push(child);
      frontier.push(child.pid);
    }
  }

  return result;
}

export class SystemProcessTable implements ProcessTable {
  private readonly platform: PlatformName;

  constructor(platform: PlatformName) {
    this.platform = platform;
  }

  async get(pid: number): Promise<ProcessInfo | null> {
    if (!this.isAlive(pid)) {
      return null;
    }

    try {
      const processes =
        this.platform === 'win32'
          ? parseCimOutput(await this.powershell(
              `Get-CimInstance Win32_Process -Filter "ProcessId = ${pid}" | Select-Object ProcessId,ParentProcessId,Name | ConvertTo-Json -Compress`
            ))
          : parsePsOutput(await this.run('ps', ['-o', 'pid=,ppid=,comm=', '-p', String(pid)]));
      return processes.find((p) => p.pid === pid) ?? null;
    } catch (error) {
      // ps exits 1 when the PID is gone between the liveness check and the query
      logger.debug(`Process ${pid} lookup failed`, { error: error instanceof Error ? error.message : error });
      return null;
    }
  }

  async list(): Promise<ProcessInfo[]> {
    try {
      if (this.platform === 'win32') {
        return parseCimOutput(await this.powershell(
          'Get-CimInstance Win32_Process | Select-Object ProcessId,ParentProcessId,Name | ConvertTo-Json -Compress'
        ));
      }
      return parsePsOutput(await this.run('ps', ['-A', '-o', 'pid=,ppid=,comm=']));
    } catch (error) {
      logger.warn('Could not list processes', { error: error instanceof Error ? error.message : error });
      return [];
    }
  }

  async descendants(pid: number): Promise<ProcessInfo[]> {
    return collectDescendants(await this.list(), pid);
  }

  async findListener(port: number): Promise<number | null> {
    try {
      const stdout =
        this.platform === 'win32'
          ? await this.powershell(
              `(Get-NetTCPConnection -LocalPort ${port} -State Listen -ErrorAction SilentlyContinue | Select-Object -First 1 -ExpandProperty OwningProcess)`
            )
          : await this.run('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-t']);
      const first = stdout.trim().split(/\s+/)[0] ?? '';
      const pid = Number(first);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
      // lsof exits 1 when nothing listens on the port
      return null;
    }
  }

  signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ESRCH') {
        return false;
      }
      throw error;
    }
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: exists but belongs to another user
      return errorCode(error) === 'EPERM';
    }
  }

  async waitForExit(pid: number, options: WaitForExitOptions = {}): Promise<boolean> {
    const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : Infinity;

    while (this.isAlive(pid)) {
      if (options.signal?.aborted || Date.now() >= deadline) {
        return false;
      }
      await sleep(TIMEOUTS.PROCESS_POLL_INTERVAL, options.signal);
    }
    return true;
  }

  private async run(command: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(command, args, {
      timeout: TIMEOUTS.PROCESS_QUERY,
      windowsHide: true,
    });
    return stdout;
  }

  private powershell(script: string): Promise<string> {
    return this.run('powershell', ['-NoProfile', '-Command', script]);
  }
}
