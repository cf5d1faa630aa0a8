import { TransientNetworkError, asError, isManagerError } from '../errors.js';

export interface FetchWithTimeoutInit extends RequestInit {
  timeoutMs: number;
}

/**
 * fetch() bounded by an AbortController. The bound covers the request and
 * `read`, so a server that sends headers and then stalls still times out.
 * Connection, body and timeout failures surface as TransientNetworkError;
 * errors thrown by `read` itself pass through unchanged.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: FetchWithTimeoutInit,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { timeoutMs, ...rest } = init;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...rest, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (isManagerError(error)) {
      throw error;
    }
    const err = asError(error);
    const reason = err.name === 'AbortError' || controller.signal.aborted ? `timed out after ${timeoutMs}ms` : err.message;
    throw new TransientNetworkError(`Request to ${url} failed: ${reason}`, url, null, error);
  } finally {
    clearTimeout(timeoutId);
  }
}
