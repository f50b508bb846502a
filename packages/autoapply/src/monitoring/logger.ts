import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  attemptId?: string;
  url?: string;
  iteration?: number;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  attemptId?: string;
  /** Receives each serialized line; defaults to the console method for the level */
  sink?: (level: LogLevel, line: string) => void;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret redaction ---

const SENSITIVE_KEYS = new Set([
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apikey',
  'api-key',
  'authorization',
  'cookie',
  'session',
  'credential',
  'private_key',
  'privatekey',
  'access_token',
  'accesstoken',
  'refresh_token',
  'refreshtoken',
  'ssn',
  'social_security',
  'credit_card',
  'card_number',
  'cvv',
]);

const SENSITIVE_PATTERNS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /(?:ws|wss):\/\/[^\s"']+/g, // CDP endpoints
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
  /\b\d{3}-\d{2}-\d{4}\b/g, // SSN format (xxx-xx-xxxx)
  /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g, // Credit card numbers
];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  for (const sensitive of SENSITIVE_KEYS) {
    if (lowerKey.includes(sensitive)) return true;
  }
  return false;
}

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    if (isSensitiveKey(key)) return '[REDACTED]';
    let redacted = value;
    for (const pattern of SENSITIVE_PATTERNS) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value instanceof Error) {
      result[key] = redactValue(key, value.message);
    } else if (isRecord(value)) {
      result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? redactObject(item) : redactValue(key, item)));
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

function defaultLevel(): LogLevel {
  const env = getEnv();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'production') return 'info';
  if (env.NODE_ENV === 'test') return 'error';
  return 'debug';
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

// --- Logger class ---

export class Logger {
  private level: LogLevel;
  private service: string;
  private sink: (level: LogLevel, line: string) => void;
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? defaultLevel();
    this.service = opts.service ?? 'autoapply';
    this.sink = opts.sink ?? consoleSink;
    this.context = {};

    if (opts.attemptId) this.context.attemptId = opts.attemptId;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
      sink: this.sink,
    });
    child.context = { ...this.context, ...redactObject(bindings) };
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...(data ? redactObject(data) : {}),
    };

    this.sink(level, JSON.stringify(entry));
  }
}

// --- Singleton for convenience ---

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (!_defaultLogger || opts) {
    _defaultLogger = new Logger(opts);
  }
  return _defaultLogger;
}
