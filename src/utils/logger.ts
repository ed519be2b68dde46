/**
 * Leveled stderr logging for the retrieval pipeline.
 *
 * Each module logs through `createLogger('<module>')`. Stage summaries
 * (variants expanded, snapshot loaded, retrieval complete with per-stage
 * timings) go out at debug. Degradations the caller still gets a response
 * for go out at warn: expansion falling back to the original query, failed
 * relevance judgments scored as neutral, and a backend whose calls failed.
 * Nothing is written to stdout.
 *
 * `NOTE_RECALL_LOG_LEVEL` sets the starting level (default `info`) and
 * `NOTE_RECALL_LOG_JSON=true` switches to one JSON object per line;
 * `setLogLevel()` and `setJsonMode()` change them at run time.
 */

/** Log level type */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Log entry structure */
export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger interface */
export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// Level priority (higher = more severe)
const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

const envLevel = process.env.NOTE_RECALL_LOG_LEVEL;

// Current log level
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

// JSON output mode (for machine parsing)
let jsonMode = process.env.NOTE_RECALL_LOG_JSON === 'true';

/**
 * Set the log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Get the current log level.
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Enable or disable JSON output mode.
 */
export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/**
 * Format a log entry for output.
 */
function formatEntry(entry: LogEntry, asJson: boolean = jsonMode): string {
  if (asJson) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, meta } = entry;
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp; // HH:MM:SS
  const levelTag = level.toUpperCase().padEnd(5);

  let output = `[${time}] ${levelTag} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    const metaStr = Object.entries(meta)
      .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
      .join(' ');
    output += ` (${metaStr})`;
  }

  return output;
}

function log(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: msg,
    meta,
  };

  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Main logger instance.
 */
export const logger: Logger = {
  debug: (msg, meta) => log('debug', msg, meta),
  info: (msg, meta) => log('info', msg, meta),
  warn: (msg, meta) => log('warn', msg, meta),
  error: (msg, meta) => log('error', msg, meta),
};

/**
 * Create a child logger with a fixed prefix.
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (msg, meta) => log('debug', `[${prefix}] ${msg}`, meta),
    info: (msg, meta) => log('info', `[${prefix}] ${msg}`, meta),
    warn: (msg, meta) => log('warn', `[${prefix}] ${msg}`, meta),
    error: (msg, meta) => log('error', `[${prefix}] ${msg}`, meta),
  };
}

export default logger;
