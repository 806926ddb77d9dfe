// All output goes to stderr: stdout belongs to the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string) => void;

export class Logger {
  private static root: Logger | undefined;

  private constructor(
    private readonly scope: string,
    private readonly state: { level: LogLevel; sink: LogSink },
  ) {}

  static getInstance(): Logger {
    if (!Logger.root) {
      const envLevel = process.env.REVIEW_NAVIGATOR_LOG_LEVEL;
      Logger.root = new Logger('', {
        level: isLogLevel(envLevel) ? envLevel : 'info',
        sink: (line) => console.error(line),
      });
    }
    return Logger.root;
  }

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  /** Redirect output, e.g. to capture lines in tests. Returns the previous sink. */
  setSink(sink: LogSink): LogSink {
    const previous = this.state.sink;
    this.state.sink = sink;
    return previous;
  }

  debug(message: string, ...params: unknown[]): void { this.append('debug', message, params); }
  info(message: string, ...params: unknown[]): void { this.append('info', message, params); }
  warn(message: string, ...params: unknown[]): void { this.append('warn', message, params); }
  error(message: string, ...params: unknown[]): void { this.append('error', message, params); }

  private append(level: LogLevel, message: string, params: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) return;
    const ts = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    const extra = params.length ? ' ' + params.map(safe).join(' ') : '';
    this.state.sink(`[${ts}] [${level.toUpperCase()}]${scope} ${message}${extra}`);
  }
}

function safe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack ?? value.message;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export const logger = Logger.getInstance();
