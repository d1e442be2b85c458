import { pino, destination, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** File descriptor to write to; the dump script keeps stdout for the screen. */
  fd?: number;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = { name: options.name ?? 'gridline', level: options.level ?? 'info' };
  if (options.fd !== undefined) {
    return pino(settings, destination(options.fd));
  }
  return pino(settings);
}

export const silentLogger: Logger = pino({ level: 'silent' });
