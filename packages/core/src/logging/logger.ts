import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  debug(...params: unknown[]): void;
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
}

export const createLogger = (scope: string): Logger => log.scope(scope);

export interface LogFileOptions {
  filePath: string;
  level: LogLevel;
  console?: boolean;
}

export const configureLogging = (options: LogFileOptions) => {
  log.transports.file.resolvePathFn = () => options.filePath;
  log.transports.file.level = options.level;
  log.transports.console.level = options.console === false ? false : options.level;
};

export const silenceLogging = () => {
  log.transports.file.level = false;
  log.transports.console.level = false;
};

export const currentLogFilePath = () => log.transports.file.getFile().path;
