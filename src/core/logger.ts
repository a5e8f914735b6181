export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

function formatTimestamp(d: Date): string {
  const h = String(d.getHours()).padStart(2, '0');
  const m = String(d.getMinutes()).padStart(2, '0');
  const s = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Leveled logger writing one line per entry to stderr (stdout stays free for
 * the REPL and for the stdio tool protocol).
 */
export class Logger {
  private readonly state: { level: LogLevel };

  constructor(
    minLevel: LogLevel | { level: LogLevel } = 'info',
    private readonly sink: LogSink = stderrSink,
    private readonly scope?: string
  ) {
    this.state = typeof minLevel === 'string' ? { level: minLevel } : minLevel;
  }

  get level(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  /** Flips between debug and info; returns whether debug is now on. */
  toggleDebug(): boolean {
    this.state.level = this.state.level === 'debug' ? 'info' : 'debug';
    return this.state.level === 'debug';
  }

  /** Child loggers share the sink and the level with their parent. */
  child(scope: string): Logger {
    return new Logger(this.state, this.sink, this.scope ? `${this.scope}/${scope}` : scope);
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.state.level]) return;

    const parts = [formatTimestamp(new Date()), `[${level.toUpperCase().padEnd(5)}]`];
    if (this.scope) parts.push(`(${this.scope})`);
    parts.push(message);
    if (meta && Object.keys(meta).length > 0) parts.push(safeStringify(meta));

    this.sink(parts.join(' '));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }
}

function safeStringify(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}
