import type { LogLevel } from './config';

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

/** `[scope] message` в консоль, как в остальных сервисах. */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, extra: unknown[]) => {
    if (ORDER[level] < ORDER[minLevel]) return;
    const line = `[${scope}] ${message}`;
    if (level === 'error') console.error(line, ...extra);
    else if (level === 'warn') console.warn(line, ...extra);
    else console.log(line, ...extra);
  };

  return {
    debug: (message, ...extra) => write('debug', message, extra),
    info: (message, ...extra) => write('info', message, extra),
    warn: (message, ...extra) => write('warn', message, extra),
    error: (message, ...extra) => write('error', message, extra),
  };
}
