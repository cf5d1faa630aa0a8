/**
 * Error taxonomy for the manager.
 *
 * Most supervisor operations report failure by returning false and logging;
 * these types are thrown where a caller has to react (config loading,
 * generation) and are attached as log data everywhere else.
 */

export type ManagerErrorKind =
  | 'configuration_error'
  | 'process_error'
  | 'network_error'
  | 'stale_state'
  | 'server_not_running';

export class ManagerError extends Error {
  readonly kind: ManagerErrorKind;
  readonly retryable: boolean;

  constructor(
    kind: ManagerErrorKind,
    message: string,
    opts: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = opts.retryable ?? false;
  }
}

/** Invalid or missing configuration: model path, config file contents. */
export class ConfigurationError extends ManagerError {
  constructor(message: string, cause?: unknown) {
    super('configuration_error', message, { cause });
  }
}

/** Spawn failure, signal failure, or a stop that needed SIGKILL and still failed. */
export class ProcessError extends ManagerError {
  readonly pid: number | null;

  constructor(message: string, pid: number | null = null, cause?: unknown) {
    super('process_error', message, { cause });
    this.pid = pid;
  }
}

/** Connection refused, timeout or non-2xx answer from the server. */
export class TransientNetworkError extends ManagerError {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null, cause?: unknown) {
    super('network_error', message, { retryable: true, cause });
    this.url = url;
    this.status = status;
  }
}

/** PID record naming a dead or foreign process. */
export class StaleStateError extends ManagerError {
  readonly pid: number;

  constructor(pid: number, reason: string) {
    super('stale_state', `Stale PID record ${pid}: ${reason}`);
    this.pid = pid;
  }
}

export class ServerNotRunningError extends ManagerError {
  constructor() {
    super('server_not_running', 'Server is not running');
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === 'string') return new Error(e);
  if (e === null || e === undefined) return new Error('Unknown error');
  try {
    return new Error(String(e));
  } catch {
    return new Error('Unknown error');
  }
}

export function isManagerError(e: unknown): e is ManagerError {
  return e instanceof ManagerError;
}

/**
 * Plain object suitable for the logger's data argument.
 */
export function errorLogFields(e: unknown): Record<string, unknown> {
  const err = asError(e);
  const fields: Record<string, unknown> = {
    name: err.name,
    message: err.message,
  };
  if (isManagerError(err)) {
    fields.kind = err.kind;
    fields.retryable = err.retryable;
  }
  if (err.cause !== undefined) {
    fields.cause = asError(err.cause).message;
  }
  return fields;
}
