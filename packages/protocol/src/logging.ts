// Logger contract used by record containers and document import/export

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Structured logger. Callers inject one (a console wrapper, pino, ...);
 * nothing logs through a global.
 */
export type RecordLogger = Record<LogLevel, (message: string, data?: LogData) => void>;

const noop = (): void => {};

/**
 * Default for library calls
 */
export const silentLogger: RecordLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
};

/**
 * Logger that keeps every entry, for assertions in tests
 */
export function createCapturingLogger(): RecordLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const capture =
    (level: LogLevel) =>
    (message: string, data?: LogData): void => {
      entries.push({ level, message, data });
    };

  return {
    entries,
    debug: capture('debug'),
    info: capture('info'),
    warn: capture('warn'),
    error: capture('error'),
  };
}
