import { default as chalk } from 'chalk';

import { ConsoleLogHandler, LogLevel, LogMethod } from '../models';

export interface LoggerOptions {
  level?: LogLevel;
  logMethod?: LogMethod;
  prefix?: string;
  noColor?: boolean;
}

interface CollectedMessage {
  level: LogLevel;
  params: unknown[];
}

const levelLabels: Record<LogLevel, string> = {
  [LogLevel.trace]: 'trace',
  [LogLevel.debug]: 'debug',
  [LogLevel.info]: 'info',
  [LogLevel.warn]: 'warn',
  [LogLevel.error]: 'error',
  [LogLevel.none]: 'none',
};

export class Logger implements ConsoleLogHandler {
  private collectCache: Array<CollectedMessage> | undefined;

  constructor(
    readonly options: LoggerOptions = {},
    private readonly parentLogger?: Logger
  ) {}

  get level(): LogLevel {
    return this.options.level ?? this.parentLogger?.level ?? LogLevel.info;
  }

  child(prefix: string): Logger {
    const fullPrefix = this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix;
    return new Logger({ ...this.options, prefix: fullPrefix }, this);
  }

  /**
   * Buffer every message until `flush` is called. Used while a progress bar owns the terminal.
   */
  collectMessages(): void {
    if (this.parentLogger) {
      this.parentLogger.collectMessages();
      return;
    }
    this.collectCache = this.collectCache || [];
  }

  flush(): void {
    if (this.parentLogger) {
      this.parentLogger.flush();
      return;
    }
    const cache = this.collectCache;
    this.collectCache = undefined;
    cache?.forEach(message => this.output(message.level, message.params));
  }

  clear(): void {
    if (this.parentLogger) {
      this.parentLogger.clear();
      return;
    }
    if (this.collectCache) {
      this.collectCache.length = 0;
    }
  }

  private writeLog(level: LogLevel, params: unknown[]) {
    if (level < this.level) {
      return;
    }
    const prefixed = this.options.prefix ? [this.formatPrefix(this.options.prefix), ...params] : params;
    if (this.parentLogger) {
      this.parentLogger.forward(level, prefixed);
      return;
    }
    this.forward(level, prefixed);
  }

  private forward(level: LogLevel, params: unknown[]) {
    if (this.parentLogger) {
      this.parentLogger.forward(level, params);
      return;
    }
    if (this.collectCache) {
      this.collectCache.push({ level, params });
      return;
    }
    this.output(level, params);
  }

  private output(level: LogLevel, params: unknown[]) {
    if (this.options.logMethod) {
      this.options.logMethod(level, ...params);
      return;
    }
    switch (level) {
      case LogLevel.error:
        console.error(this.formatLevel(level), ...params);
        break;
      case LogLevel.warn:
        console.warn(this.formatLevel(level), ...params);
        break;
      case LogLevel.debug:
      case LogLevel.trace:
        console.debug(this.formatLevel(level), ...params);
        break;
      default:
        console.info(...params);
        break;
    }
  }

  private formatPrefix(prefix: string) {
    return this.options.noColor ? `[${prefix}]` : chalk.dim(`[${prefix}]`);
  }

  private formatLevel(level: LogLevel) {
    const label = levelLabels[level];
    if (this.options.noColor) {
      return label;
    }
    switch (level) {
      case LogLevel.error:
        return chalk.red(label);
      case LogLevel.warn:
        return chalk.yellow(label);
      default:
        return chalk.gray(label);
    }
  }

  info(...params: unknown[]): void {
    this.writeLog(LogLevel.info, params);
  }

  log(...params: unknown[]): void {
    this.writeLog(LogLevel.info, params);
  }

  trace(...params: unknown[]): void {
    this.writeLog(LogLevel.trace, params);
  }

  debug(...params: unknown[]): void {
    this.writeLog(LogLevel.debug, params);
  }

  error(...params: unknown[]): void {
    this.writeLog(LogLevel.error, params);
  }

  warn(...params: unknown[]): void {
    this.writeLog(LogLevel.warn, params);
  }
}
