/**
 * Levelled logging for kmeans-lab.
 *
 * Lines go to stderr so that clustering output on stdout stays
 * machine-readable. Severity order: debug < info < warn < error; `silent`
 * sits above all of them and mutes everything.
 *
 * Initial settings come from KMEANS_LAB_LOG_LEVEL and KMEANS_LAB_LOG_JSON;
 * the CLI overrides them from the resolved config via configureLogging().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels a message can be written at. */
export type MessageLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: MessageLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export type LogMethod = (msg: string, meta?: Record<string, unknown>) => void;

export type Logger = Record<MessageLevel, LogMethod>;

export interface LoggingSettings {
  level: LogLevel;
  /** One JSON object per line instead of text */
  json: boolean;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

const envLevel = process.env.KMEANS_LAB_LOG_LEVEL;

const settings: LoggingSettings = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  json: process.env.KMEANS_LAB_LOG_JSON === 'true',
};

/**
 * Apply the given settings; fields left out keep their current value.
 */
export function configureLogging(next: Partial<LoggingSettings>): void {
  if (next.level !== undefined) settings.level = next.level;
  if (next.json !== undefined) settings.json = next.json;
}

export function setLogLevel(level: LogLevel): void {
  configureLogging({ level });
}

export function getLogLevel(): LogLevel {
  return settings.level;
}

export function setJsonMode(enabled: boolean): void {
  configureLogging({ json: enabled });
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

/**
 * Render an entry as one output line (without the trailing newline).
 * Text form: `[HH:MM:SS] LEVEL message (key=value ...)`.
 */
export function formatEntry(entry: LogEntry, asJson: boolean = settings.json): string {
  if (asJson) {
    return JSON.stringify(entry);
  }

  const line = `[${entry.timestamp.slice(11, 19)}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (!entry.meta || Object.keys(entry.meta).length === 0) {
    return line;
  }
  return `${line} (${formatMeta(entry.meta)})`;
}

function write(level: MessageLevel, message: string, meta?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[settings.level]) return;

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Create a logger. With a prefix, every message is tagged `[prefix] `.
 */
export function createLogger(prefix?: string): Logger {
  const tag = prefix === undefined ? '' : `[${prefix}] `;
  const method =
    (level: MessageLevel): LogMethod =>
    (msg, meta) =>
      write(level, tag + msg, meta);

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

/** Untagged process-wide logger. */
export const logger: Logger = createLogger();

export default logger;
