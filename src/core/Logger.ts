/**
 * Logger configuration using Pino
 * Structured logging with configurable levels and human-friendly terminal output
 */
import pino, { type Logger, type LoggerOptions } from 'pino';
import { PinoPretty } from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

interface CreateLoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

const defaultOptions: CreateLoggerOptions = {
  level: levelFromEnv(),
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

/**
 * Format a value for inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    if (keys.length === 0) return '{}';
    return `{${keys.length} fields}`;
  }

  return String(value);
}

// Keys holding service-side IDs are shortened
const ID_KEYS = new Set(['zoneId', 'recordSetId', 'id']);

/**
 * Format context data, most useful fields first
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = ['zone', 'name', 'type', 'ttl', 'records', 'cloud', 'count'];

  const sortedKeys = contextKeys.sort((a, b) => {
    const aIdx = priorityKeys.indexOf(a);
    const bIdx = priorityKeys.indexOf(b);
    if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
    if (aIdx >= 0) return -1;
    if (bIdx >= 0) return 1;
    return 0;
  });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key], ID_KEYS.has(key) ? 12 : 40);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

/**
 * Pretty stream writing to stderr, so stdout only carries the summary
 */
function createPrettyStream() {
  return PinoPretty({
    colorize: true,
    destination: 2,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const rawLevel = log['level'];
      const rawService = log['service'];
      const rawMsg = log[messageKey];
      const level = typeof rawLevel === 'string' ? rawLevel : 'info';
      const service = typeof rawService === 'string' ? rawService : undefined;
      const msg = typeof rawMsg === 'string' ? rawMsg : '';
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = service ? `[${service}] ` : '';
      output += msg;

      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', 'provider', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: CreateLoggerOptions = defaultOptions): Logger {
  const baseConfig: LoggerOptions = {
    level: options.level,
    base: {
      app: 'dnssync',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig, pino.destination(2));
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

export default logger;
