import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'rover-cam' },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
