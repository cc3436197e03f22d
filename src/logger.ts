import pino from 'pino';

// O logger é criado antes do config, por isso lê o nível direto do ambiente
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'hls-rendition-worker', pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
