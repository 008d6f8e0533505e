/**
 * Structured logging using pino
 *
 * Logs go to stderr so command output on stdout stays clean.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';
import { LOG_LEVELS, type LogLevel } from '@gitship/contracts';

export type { Logger };

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level from `GITSHIP_LOG_LEVEL`. An unknown value falls back to `info`;
 * the config loader reports it as a `ConfigError`.
 */
export function resolveLogLevel(source: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = source['GITSHIP_LOG_LEVEL'] ?? '';
  return isLogLevel(value) ? value : 'info';
}

function createBaseLogger(): Logger {
  const options: LoggerOptions = {
    name: 'gitship',
    level: resolveLogLevel(),
    base: {
      pid: undefined,
      hostname: undefined,
    },
  };

  // Pretty output only for humans watching a terminal
  if (process.stderr.isTTY) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        destination: 2,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
      },
    };
    return pino(options);
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

export const logger: Logger = createBaseLogger();

/**
 * Child logger tagged with the module name
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
