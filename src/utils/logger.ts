import { pino, type Logger, type LevelWithSilent } from 'pino';
import { config } from '../config.js';

export type { Logger };

function level(): LevelWithSilent {
  return config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL;
}

export const logger: Logger = pino({
  level: level(),
  ...(config.NODE_ENV === 'development'
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
});
