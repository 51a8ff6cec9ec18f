export enum LogLevel {
  trace = 1,
  debug = 2,
  info = 5,
  warn = 10,
  error = 100,
  none = 1000,
}

export function toLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case 'trace':
      return LogLevel.trace;
    case 'debug':
      return LogLevel.debug;
    case 'info':
      return LogLevel.info;
    case 'warn':
    case 'warning':
      return LogLevel.warn;
    case 'error':
      return LogLevel.error;
    case 'none':
    case 'silent':
      return LogLevel.none;
    default:
      return undefined;
  }
}
