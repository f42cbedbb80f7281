// stdout carries the MCP transport, so every log line goes to stderr.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(debugEnabled: boolean): Logger {
  const write = (level: LogLevel, message: string): void => {
    console.error(`[mac-automation] ${level}: ${message}`);
  };
  return {
    debug: (message) => {
      if (debugEnabled) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
