import { pino, type Logger, type LevelWithSilent } from 'pino';

/**
 * Root logger. Fastify takes this same instance, so request logs and
 * engine logs share one stream and level.
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'story-agent' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export type { Logger };
