/**
 * Structured logging
 *
 * Pino logger writing JSON lines to stderr so that user-facing output on
 * stdout stays readable. Module loggers are children of a single root and
 * follow its level when it changes (e.g. `--verbose`).
 */

import pino, { type Logger } from 'pino';
import { LOG_LEVEL_ENV } from '@kneeboard/ipc';

export type LogLevel = pino.LevelWithSilent;

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Resolve the log level from the environment. Tests run silent.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env[LOG_LEVEL_ENV]?.toLowerCase();
  const match = VALID_LEVELS.find((level) => level === requested);
  if (match) return match;
  return env['NODE_ENV'] === 'test' ? 'silent' : 'warn';
}

let rootLogger: Logger | null = null;
const moduleLoggers = new Map<string, Logger>();

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        level: getLogLevel(),
        base: { service: 'kneeboard' },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }
  return rootLogger;
}

/**
 * Module-scoped logger
 *
 * @example
 * const log = createLogger('display');
 * log.warn({ kind: 'failed', output: 'HDMI-1' }, 'Rotation failed');
 */
export function createLogger(moduleName: string): Logger {
  const existing = moduleLoggers.get(moduleName);
  if (existing) return existing;

  const child = getRootLogger().child({ module: moduleName });
  moduleLoggers.set(moduleName, child);
  return child;
}

/**
 * Change the level of the root logger and every module logger
 */
export function setLogLevel(level: LogLevel): void {
  const root = getRootLogger();
  root.level = level;
  for (const child of moduleLoggers.values()) {
    child.level = level;
  }
}
