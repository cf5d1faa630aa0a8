import { DateTime, Duration } from 'luxon';

/**
 * Human-readable elapsed time between `from` and `to`, e.g. "1h 05m" or "42s".
 */
export function formatElapsed(from: Date, to: Date = new Date()): string {
  const diff = DateTime.fromJSDate(to).diff(DateTime.fromJSDate(from));
  const ms = Math.max(0, diff.toMillis());

  if (ms < 60_000) {
    return Duration.fromMillis(ms).toFormat("s's'");
  }
  if (ms < 3_600_000) {
    return Duration.fromMillis(ms).toFormat("m'm' ss's'");
  }
  return Duration.fromMillis(ms).toFormat("h'h' mm'm'");
}

/**
 * Wall-clock time as shown in monitor output.
 */
export function clockTime(date: Date = new Date()): string {
  return DateTime.fromJSDate(date).toFormat('HH:mm:ss');
}
