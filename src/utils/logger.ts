import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { app: 'tts-gateway' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label })
  }
});

export type Logger = pino.Logger;

/**
 * Child logger tagged with the owning module, e.g. createLogger({ service: 'TTSProviderRegistry' })
 */
export function createLogger(bindings: { service: string } & Record<string, unknown>): Logger {
  return logger.child(bindings);
}
