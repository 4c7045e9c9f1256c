import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Emitter = Exclude<LogLevel, 'silent'>;

const FORMATS: Record<Emitter, (message: string) => string> = {
  debug: (message) => chalk.gray(`[DEBUG] ${message}`),
  info: (message) => chalk.blue(`[INFO] ${message}`),
  warn: (message) => chalk.yellow(`⚠ ${message}`),
  error: (message) => chalk.red(`✗ ${message}`),
};

/**
 * Diagnostics go to stderr; stdout is reserved for command output
 * (the effective patch, JSON documents).
 */
class Logger {
  private _level: LogLevel = 'info';

  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  set level(level: LogLevel) {
    this._level = level;
  }

  get level(): LogLevel {
    return this._level;
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: Emitter, message: string): void {
    if (SEVERITY[level] < SEVERITY[this._level]) return;
    this.stream.write(FORMATS[level](message) + '\n');
  }
}

export const logger = new Logger();
