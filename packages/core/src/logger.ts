/**
 * Console logging with a bracketed component prefix, e.g.
 * `[EvolutionTracker] collapse at #12`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function createLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (
    messageLevel: Exclude<LogLevel, 'silent'>,
    message: string,
    details: unknown[]
  ): void => {
    if (LEVEL_RANK[messageLevel] < threshold) return;

    const line = `[${scope}] ${message}`;
    switch (messageLevel) {
      case 'debug':
        console.debug(line, ...details);
        break;
      case 'info':
        console.info(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      case 'error':
        console.error(line, ...details);
        break;
    }
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
