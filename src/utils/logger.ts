import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

/**
 * Console logger with chalk-coloured prefixes.
 * Warnings and errors go to stderr, everything else to stdout.
 */
export const createLogger = ({
  level = 'info',
  color = true,
  stdout = process.stdout,
  stderr = process.stderr,
}: {
  level?: LogLevel;
  color?: boolean;
  stdout?: LogSink;
  stderr?: LogSink;
} = {}): Logger => {
  const paint: ChalkInstance = color ? chalk : new Chalk({ level: 0 });
  const minRank = LEVEL_RANK[level];

  const write = (messageLevel: LogLevel, sink: LogSink, line: string): void => {
    if (LEVEL_RANK[messageLevel] < minRank) return;
    sink.write(`${line}\n`);
  };

  return {
    debug: (message) => write('debug', stdout, paint.dim(`· ${message}`)),
    info: (message) => write('info', stdout, message),
    warn: (message) => write('warn', stderr, paint.yellow(`⚠ ${message}`)),
    error: (message) => write('error', stderr, paint.red(`✗ ${message}`)),
    success: (message) => write('info', stdout, paint.green(`✓ ${message}`)),
  };
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  success: noop,
});

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);
