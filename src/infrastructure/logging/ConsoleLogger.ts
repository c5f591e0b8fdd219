import dayjs from 'dayjs';
import type { LoggerPort, LogLevel } from '../../application/ports/LoggerPort.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

type ConsoleSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope?: string,
    private readonly sink: ConsoleSink = console,
  ) {}

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope, this.sink);
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

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    const line = `${dayjs().format('YYYY-MM-DD HH:mm:ss')} ${LEVEL_PREFIX[level]}${scope} ${message}`;
    const args: unknown[] = context && Object.keys(context).length > 0 ? [line, context] : [line];

    switch (level) {
      case 'debug':
        this.sink.debug(...args);
        break;
      case 'info':
        this.sink.log(...args);
        break;
      case 'warn':
        this.sink.warn(...args);
        break;
      case 'error':
        this.sink.error(...args);
        break;
    }
  }
}
