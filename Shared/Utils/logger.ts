/**
 * Line logger for the bot process.
 *
 * Every entry is `[time] [LEVEL] [context] message {json}` on one line so a
 * container log driver keeps it whole. debug and info go to stdout; warn and
 * error go to stderr, where the supervisor's restart notices also land.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Narrows a raw `LOG_LEVEL` value. */
export function isValidLogLevel(value: string | undefined): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

// DispatchError and AggregationError carry `code` and `cause`; keep both in the line.
function serializeErrors(_key: string, value: unknown): unknown {
  if (!(value instanceof Error)) return value;

  const entry: Record<string, unknown> = { name: value.name, message: value.message };
  if ('code' in value) entry.code = value.code;
  if ('cause' in value && value.cause !== undefined) entry.cause = value.cause;
  if (value.stack) entry.stack = value.stack;
  return entry;
}

export class Logger {
  private level: LogLevel;
  private readonly context: string;

  /** Starts at `LOG_LEVEL` from the environment, or `info`. */
  constructor(context: string = 'day-profile') {
    this.context = context;
    const fromEnv = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(fromEnv) ? fromEnv : 'info';
  }

  debug(message: string, data?: unknown): void {
    if (this.enabled('debug')) console.log(this.line('debug', message, data));
  }

  info(message: string, data?: unknown): void {
    if (this.enabled('info')) console.log(this.line('info', message, data));
  }

  warn(message: string, data?: unknown): void {
    if (this.enabled('warn')) console.error(this.line('warn', message, data));
  }

  error(message: string, data?: unknown): void {
    if (this.enabled('error')) console.error(this.line('error', message, data));
  }

  /**
   * Logger for one component, e.g. `day-profile:scheduler`. It takes the
   * parent's current level; later `setLevel` calls on the parent do not follow.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`);
    child.level = this.level;
    return child;
  }

  /** Applied once the validated config is loaded. */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private line(level: LogLevel, message: string, data?: unknown): string {
    const head = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    return data === undefined ? head : `${head} ${JSON.stringify(data, serializeErrors)}`;
  }
}
