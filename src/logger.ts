import pino, { type Logger } from 'pino';

export const logger: Logger = pino({
  name: 'xmgame-autorenew',
  level: process.env.LOG_LEVEL ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  base: null,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
