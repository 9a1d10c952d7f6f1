/**
 * Logger abstraction.
 *
 * Structured, level-based JSON logging with per-component context. Secrets
 * registered with `configureLogging` are masked in every message and string
 * context value before an entry reaches the handler. Tests capture entries
 * through `setLogHandler`.
 */

import { maskSecretsInMessage } from './domain/errors';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
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

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Writes one JSON line per entry; warn and error go to stderr. */
const jsonLineHandler: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  if (LEVEL_RANK[entry.level] >= LEVEL_RANK[LogLevel.Warn]) {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
};

const state: { handler: LogHandler; minLevel: LogLevel; secrets: string[] } = {
  handler: jsonLineHandler,
  minLevel: LogLevel.Info,
  secrets: [],
};

/** Apply startup settings: minimum level and the secret values to redact. */
export function configureLogging(options: { level?: LogLevel; secrets?: Array<string | undefined> }): void {
  if (options.level) state.minLevel = options.level;
  if (options.secrets) {
    state.secrets = options.secrets.filter((s): s is string => typeof s === 'string' && s.length > 0);
  }
}

export function setLogHandler(handler: LogHandler): void {
  state.handler = handler;
}

export function setLogLevel(level: LogLevel): void {
  state.minLevel = level;
}

/** Restore the JSON-line handler, the info level and an empty secret list. */
export function resetLogging(): void {
  state.handler = jsonLineHandler;
  state.minLevel = LogLevel.Info;
  state.secrets = [];
}

/** Parse a level name, e.g. from the LOG_LEVEL environment variable. */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return fallback;
  }
}

function redact(text: string): string {
  return state.secrets.length > 0 ? maskSecretsInMessage(text, state.secrets) : text;
}

function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  if (state.secrets.length === 0) return context;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'string' ? redact(value) : value;
  }
  return out;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[state.minLevel]) return;
  state.handler({
    level,
    message: redact(message),
    context: redactContext(context),
    timestamp: new Date().toISOString(),
  });
}

/** Create a logger whose entries all carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...baseContext, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'identity-risk-engine' });
