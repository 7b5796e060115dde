/**
 * Leveled console logger
 *
 * Every line is prefixed with the component tag (`[Dispatcher] ...`).
 * Tests and embedders can redirect output with setLogHandler().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  tag: string;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Format an entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const line = `[${entry.tag}] ${entry.message}`;
  if (!entry.context || Object.keys(entry.context).length === 0) {
    return line;
  }
  return `${line} ${JSON.stringify(entry.context)}`;
}

const consoleHandler: LogHandler = (entry) => {
  const line = formatLogEntry(entry);
  switch (entry.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

let currentHandler: LogHandler = consoleHandler;
let currentLevel: LogLevel = 'info';

/**
 * Replace the log sink. Pass null to restore console output.
 */
export function setLogHandler(handler: LogHandler | null): void {
  currentHandler = handler ?? consoleHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function write(
  level: LogLevel,
  tag: string,
  message: string,
  context: Record<string, unknown>
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
  currentHandler({
    level,
    tag,
    message,
    context: Object.keys(context).length > 0 ? context : undefined,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Create a tagged logger, optionally with context fields attached to every entry
 */
export function createLogger(tag: string, baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => write('debug', tag, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => write('info', tag, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => write('warn', tag, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => write('error', tag, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger(tag, { ...baseContext, ...childCtx }),
  };
}
