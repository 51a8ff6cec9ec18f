import { LogLevel } from './logLevel';

export interface LogHandler {
  info(...params: unknown[]): void;
  log(...params: unknown[]): void;
  trace(...params: unknown[]): void;
  debug(...params: unknown[]): void;
  error(...params: unknown[]): void;
  warn(...params: unknown[]): void;
}

export interface ConsoleLogHandler extends LogHandler {
  collectMessages?(): void;
  flush?(): void;
  clear(): void;
}

export type LogMethod = (level: LogLevel, ...params: unknown[]) => void;
