import pino from 'pino';
import pretty from 'pino-pretty';
import { env } from './env';

const defaultLevel = (): string => {
  if (env.logLevel) return env.logLevel;
  if (env.nodeEnv === 'production') return 'info';
  if (env.nodeEnv === 'test') return 'silent';
  return 'debug';
};

const stream = env.nodeEnv === 'development'
  ? pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    })
  : undefined;

export const logger = pino(
  {
    name: 'lexigloss',
    level: defaultLevel(),
  },
  stream,
);

// Shortens text leaves before they go into a log line
export const safeLogText = (text: string, maxLength = 100): string => {
  if (!text) return '';
  return text.length > maxLength ? text.substring(0, maxLength) + '...' : text;
};
