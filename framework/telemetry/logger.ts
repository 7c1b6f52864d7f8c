/**
 * Structured Logging
 *
 * Leveled JSON or pretty output. A logger can be scoped to a request, so
 * every entry written while handling it carries the request id and, once
 * the router has matched, the route template.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

/**
 * The request an entry was written for
 */
export interface RequestScope {
  requestId: string;
  method: string;
  path: string;
  ip?: string;
  /** Matched route template, e.g. `/api/notes/{id:number}` */
  route?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  request?: RequestScope;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  request?: RequestScope;
  output?: LogOutput;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Leveled logger. Children share the parent's output and level at creation.
 */
export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly context: Record<string, unknown>;
  private readonly request?: RequestScope;
  private readonly output: LogOutput;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.request = options.request;
    this.output = options.output ?? ((entry) => writeEntry(entry, this.format));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  /**
   * `error` may be anything thrown; non-Error values are wrapped
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, context, toError(error));
  }

  /**
   * Logger with extra context fields
   */
  child(context: Record<string, unknown>): Logger {
    return this.derive({ context: { ...this.context, ...context } });
  }

  /**
   * Logger whose entries are tagged with the given request
   */
  forRequest(request: RequestScope): Logger {
    return this.derive({ request });
  }

  /**
   * Request logger tagged with the matched route. Unscoped loggers are returned as is.
   */
  forRoute(route: string): Logger {
    if (!this.request) return this;
    return this.derive({ request: { ...this.request, route } });
  }

  get scope(): RequestScope | undefined {
    return this.request;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private derive(overrides: Pick<LoggerOptions, 'context' | 'request'>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: this.context,
      request: this.request,
      output: this.output,
      ...overrides,
    });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (this.request) {
      entry.request = this.request;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    this.output(entry);
  }
}

function toError(value: unknown): Error | undefined {
  if (value === undefined) return undefined;
  return value instanceof Error ? value : new Error(String(value));
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function writeEntry(entry: LogEntry, format: LogFormat): void {
  const write = entry.level === 'error' ? console.error : console.log;

  if (format === 'json') {
    write(JSON.stringify(entry));
    return;
  }

  write(formatPretty(entry));
  if (entry.error?.stack) {
    write(DIM + entry.error.stack + RESET);
  }
}

/**
 * `<time> LEVEL [request-id METHOD /path] message {context}`
 */
export function formatPretty(entry: LogEntry, colors = true): string {
  const dim = (text: string) => (colors ? DIM + text + RESET : text);
  const level = entry.level.toUpperCase().padEnd(5);

  let line = `${dim(entry.timestamp)} ${colors ? COLORS[entry.level] + level + RESET : level}`;

  if (entry.request) {
    const { requestId, method, route, path } = entry.request;
    line += ` [${requestId.slice(0, 8)} ${method} ${route ?? path}]`;
  }

  line += ` ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${dim(JSON.stringify(entry.context))}`;
  }

  return line;
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger, created on first use from NODE_ENV
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger(defaultLoggerOptions(process.env.NODE_ENV ?? 'development'));
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Level and format for a given NODE_ENV
 */
export function defaultLoggerOptions(env: string): LoggerOptions {
  switch (env) {
    case 'production':
      return { level: 'info', format: 'json' };
    case 'test':
      return { level: 'warn', format: 'json' };
    default:
      return { level: 'debug', format: 'pretty' };
  }
}
