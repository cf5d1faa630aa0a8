export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  data?: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return null;
}

/**
 * Get log level from environment.
 * Default: 'info'
 */
function getLogLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
}

let globalLogLevel: LogLevel = getLogLevel();

/**
 * Change the minimum level for every logger. LOG_LEVEL from the
 * environment still wins when it is set.
 */
export function setLogLevel(level: LogLevel): void {
  globalLogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? level;
}

function serializeData(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data instanceof Error) {
    return data.stack ?? `${data.name}: ${data.message}`;
  }
  return JSON.stringify(data, null, 2);
}

export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(globalLogLevel);
  }

  private formatEntry(entry: LogEntry): string {
    const color = LOG_COLORS[entry.level];
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const contextStr = entry.context.padEnd(12);

    let output = `${color}[${entry.timestamp}] ${levelStr}${RESET} [${contextStr}] ${entry.message}`;

    if (entry.data !== undefined) {
      output += `\n${color}${serializeData(entry.data)}${RESET}`;
    }

    return output;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatEntry({
      timestamp: new Date().toISOString().slice(11, 23),
      level,
      context: this.context,
      message,
      data,
    });

    if (level === 'error') {
      console.error(formatted);
    } else if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
