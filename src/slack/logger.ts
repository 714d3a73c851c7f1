import { LogLevel, type Logger as SlackLogger } from '@slack/logger';
import type { Level } from 'pino';
import type { Logger } from '../logger.js';

const slackToPinoLevel: Record<LogLevel, Level> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

const serializeArgs = (args: unknown[]): string => {
  return args
    .map((value) => {
      if (typeof value === 'string') return value;
      if (value instanceof Error) return value.stack || value.message;
      try {
        return JSON.stringify(value);
      } catch {
        return String(value);
      }
    })
    .join(' ');
};

/** Route WebClient logging into a pino child logger. */
export const createSlackLogger = (logger: Logger): SlackLogger => {
  let currentLevel: LogLevel = LogLevel.INFO;
  let name = 'slack:web-api';

  const logWith = (level: Level) => (...msg: unknown[]): void => {
    logger[level]({ logger: name }, serializeArgs(msg));
  };

  return {
    debug: logWith('debug'),
    info: logWith('info'),
    warn: logWith('warn'),
    error: logWith('error'),
    setLevel(level: LogLevel) {
      currentLevel = level;
      logger.level = slackToPinoLevel[level];
    },
    getLevel() {
      return currentLevel;
    },
    setName(value: string) {
      name = value;
    },
  };
};
