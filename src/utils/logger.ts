/**
 * Leveled console logging for the CLI and pipeline diagnostics.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Structured fields appended to a log line as key=value pairs. */
export type LogData = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Emitter = (line: string) => void;

interface LevelStyle {
  tag: string;
  paint: (text: string) => string;
  emit: Emitter;
}

// stdout carries results and info lines; debug diagnostics, warnings and errors go to stderr
const STYLES: Record<Exclude<LogLevel, 'silent'>, LevelStyle> = {
  debug: { tag: 'DEBUG', paint: (t) => chalk.gray(t), emit: (line) => console.error(line) },
  info: { tag: 'INFO', paint: (t) => chalk.blue(t), emit: (line) => console.log(line) },
  warn: { tag: 'WARN', paint: (t) => chalk.yellow(t), emit: (line) => console.warn(line) },
  error: { tag: 'ERROR', paint: (t) => chalk.red(t), emit: (line) => console.error(line) },
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Render structured fields as ` key=value key2=value2`.
 */
export function formatLogData(data: LogData): string {
  return Object.entries(data)
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join('');
}

/**
 * Logger with a level shared by every child created from it, so setting
 * the level on the root logger also applies to module loggers.
 */
class Logger {
  private readonly state: { level: LogLevel };
  private prefix: string;

  constructor(prefix: string = '', state: { level: LogLevel } = { level: 'info' }) {
    this.prefix = prefix;
    this.state = state;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) return;
    const style = STYLES[level];
    const scope = this.prefix ? `[${this.prefix}] ` : '';
    const fields = data ? formatLogData(data) : '';
    style.emit(style.paint(`[${style.tag}] ${scope}${message}${fields}`));
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  /**
   * Log an error. An Error's stack follows on its own line.
   */
  error(message: string, cause?: Error | LogData): void {
    if (cause instanceof Error) {
      this.write('error', message);
      if (this.isEnabled('error')) {
        STYLES.error.emit(STYLES.error.paint(cause.stack ?? cause.message));
      }
      return;
    }
    this.write('error', message, cause);
  }

  /** Unprefixed ✓ line at info level. */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /** Unprefixed ✗ line at info level. */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Logger for a sub-scope, e.g. `codeprint:pipeline`.
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.state);
  }
}

export const logger = new Logger();

export { Logger };
