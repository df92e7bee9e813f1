/**
 * Levelled, subsystem-scoped logging.
 *
 * Lines go to the matching console method as
 *   2026-01-01T00:00:00.000Z [WARN][game:track] message
 * Tests pass their own writer to capture entries instead.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  /** Milliseconds since the epoch */
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger for a nested subsystem, e.g. game -> game:track */
  child(subsystem: string): Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: () => number;
  /** Entries below this level are dropped */
  readonly minLevel?: LogLevel;
}

export function formatLogEntry(entry: LogEntry): string {
  const iso = new Date(entry.timestamp).toISOString();
  return `${iso} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;
}

export const consoleLogWriter: LogWriter = (entry) => {
  const line = formatLogEntry(entry);
  const hasContext = entry.context !== undefined && Object.keys(entry.context).length > 0;

  switch (entry.level) {
    case 'debug':
      if (hasContext) console.debug(line, entry.context);
      else console.debug(line);
      break;
    case 'info':
      if (hasContext) console.info(line, entry.context);
      else console.info(line);
      break;
    case 'warn':
      if (hasContext) console.warn(line, entry.context);
      else console.warn(line);
      break;
    case 'error':
      if (hasContext) console.error(line, entry.context);
      else console.error(line);
      break;
  }
};

function normalizeSubsystem(subsystem: string): string {
  return subsystem.trim() || 'unknown';
}

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleLogWriter;
  const now = options.now ?? Date.now;
  const threshold = LEVEL_ORDER[options.minLevel ?? 'debug'];
  const name = normalizeSubsystem(subsystem);

  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    writer({ level, subsystem: name, message, timestamp: now(), context });
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (suffix) => createLogger(`${name}:${normalizeSubsystem(suffix)}`, options),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger('silent', { writer: () => {} });
