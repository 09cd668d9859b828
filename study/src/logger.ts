/**
 * Console logger with `[module]` prefixes and a level threshold.
 *
 * The scheduling core never logs; only the study orchestration does.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

type WritableLevel = Exclude<LogLevel, 'silent'>;

function formatLine(level: WritableLevel, module: string, message: string): string {
  const time = new Date().toISOString().split('T')[1]?.slice(0, 12) ?? '';
  return `[${time}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}`;
}

/**
 * Creates a logger for one module. Messages below `threshold` are dropped.
 */
export function createLogger(module: string, threshold: LogLevel = 'info'): Logger {
  const log = (level: WritableLevel, message: string, data?: unknown) => {
    if (SEVERITY[level] < SEVERITY[threshold]) return;

    const line = formatLine(level, module, message);
    const args = data !== undefined ? [line, data] : [line];
    switch (level) {
      case 'debug':
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
