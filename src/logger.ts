import { pino, type Logger as PinoLogger } from 'pino';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type Logger = PinoLogger;

let root: Logger | undefined;

function levelFromEnv(): LogLevel {
  return LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? 'info';
}

/** Process-wide logger; LOG_LEVEL is read when it is first created. */
export function getLogger(): Logger {
  if (root === undefined) {
    root = pino({
      name: 'code-audit',
      level: levelFromEnv(),
      ...(process.env.NODE_ENV === 'development'
        ? { transport: { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } } }
        : {}),
    });
  }
  return root;
}

export function createLogger(component: string): Logger {
  return getLogger().child({ component });
}

export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export function resetLogger(): void {
  root = undefined;
}
