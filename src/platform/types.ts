/**
 * Platform capability types.
 *
 * Everything OS-specific the manager needs is reached through a Platform
 * object that the entry point builds once and injects.
 */

export type PlatformName = 'linux' | 'darwin' | 'win32';

export interface ProcessInfo {
  pid: number;
  ppid: number;
  /** Executable name as reported by the OS (`comm` on POSIX, image name on Windows) */
  name: string;
}

export interface WaitForExitOptions {
  /** Give up and resolve false after this long; unbounded when omitted */
  timeoutMs?: number;
  /** Cancels the wait; resolves false */
  signal?: AbortSignal;
}

/**
 * Read and act on the OS process table.
 */
export interface ProcessTable {
  /** The process if it exists, null otherwise */
  get(pid: number): Promise<ProcessInfo | null>;
  list(): Promise<ProcessInfo[]>;
  /** All transitive children of `pid` */
  descendants(pid: number): Promise<ProcessInfo[]>;
  /** PID of the process listening on a local TCP port */
  findListener(port: number): Promise<number | null>;
  /**
   * Deliver a signal. Returns false when the process no longer exists;
   * throws on any other failure (e.g. EPERM).
   */
  signal(pid: number, signal: NodeJS.Signals): boolean;
  isAlive(pid: number): boolean;
  /** Resolves true once `pid` is gone */
  waitForExit(pid: number, options?: WaitForExitOptions): Promise<boolean>;
}

export interface Platform {
  readonly name: PlatformName;
  readonly processes: ProcessTable;
  defaultModelsDir(): string;
  defaultCacheDir(): string;
  defaultLogDir(): string;
  defaultConfigDir(): string;
  /** First existing llama-server binary in the usual places, or the bare name for PATH lookup */
  llamaServerPath(): string;
  /** Steam's logs directory if one is installed */
  steamLogsDir(): string | null;
}
