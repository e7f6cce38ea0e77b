import type { LogLevel } from '@tfguard/shared-types';

const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credentials',
  'credential',
  'accesstoken',
  'access_token',
  'privatekey',
  'private_key',
  'servicetoken',
]);

const REDACTED = '[REDACTED]';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function sanitize(value: unknown, seen = new WeakSet<object>()): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object') return value;

  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Map) return sanitize(Object.fromEntries(value), seen);
  if (value instanceof Set) return sanitize([...value], seen);
  if (value instanceof Error) return { name: value.name, message: sanitizeString(value.message) };

  if (Array.isArray(value)) {
    return value.map(item => sanitize(item, seen));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : sanitize(entry, seen);
  }
  return sanitized;
}

// Credentials embedded in URLs and key=value pairs
const SENSITIVE_PATTERNS = [
  /(?<=:\/\/[^:/\s]+:)[^@\s]+(?=@)/g,
  /(?<=password[=:])\s*\S+/gi,
  /(?<=secret[=:])\s*\S+/gi,
  /(?<=token[=:])\s*\S+/gi,
  /(?<=authorization[=:])\s*\S+/gi,
];

export function sanitizeString(str: string): string {
  let result = str;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

function safeContext(context: unknown): string {
  if (context instanceof Error) {
    return sanitizeString(context.stack ?? context.message);
  }
  return JSON.stringify(sanitize(context));
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LEVELS as readonly string[]).includes(value);
}

type LogSink = (line: string) => void;

/**
 * Level-filtered line logger. Context objects are serialized as JSON with
 * credential-looking keys redacted; errors are written with their stack.
 */
class Logger {
  private level: LogLevel;
  private readonly scope?: string;
  private readonly sinks: Record<LogLevel, LogSink>;

  constructor(level: LogLevel = 'info', scope?: string, sinks?: Partial<Record<LogLevel, LogSink>>) {
    this.level = level;
    this.scope = scope;
    this.sinks = {
      debug: sinks?.debug ?? (line => console.log(line)),
      info: sinks?.info ?? (line => console.log(line)),
      warn: sinks?.warn ?? (line => console.warn(line)),
      error: sinks?.error ?? (line => console.error(line)),
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string, context?: unknown) {
    this.write('debug', message, context);
  }

  info(message: string, context?: unknown) {
    this.write('info', message, context);
  }

  warn(message: string, context?: unknown) {
    this.write('warn', message, context);
  }

  error(message: string, context?: unknown) {
    this.write('error', message, context);
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Logger sharing this logger's sinks whose lines carry `[scope]`
   */
  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, childScope, this.sinks);
  }

  private write(level: LogLevel, message: string, context?: unknown) {
    if (!this.shouldLog(level)) return;
    this.sinks[level](this.format(level, message, context));
  }

  format(level: LogLevel, message: string, context?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const scope = this.scope ? ` [${this.scope}]` : '';
    if (context === undefined) {
      return `[${timestamp}] [${levelStr}]${scope} ${message}`;
    }
    return `[${timestamp}] [${levelStr}]${scope} ${message} ${safeContext(context)}`;
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export { Logger };
export type { LogSink };
