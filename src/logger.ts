import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Root logger for a process. Modules receive it (or a child) by
 * injection rather than importing a shared instance.
 */
export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: 'market-pilot' },
  });
}
