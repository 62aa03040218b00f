import { destination, type Logger, pino } from 'pino';

import { environment } from '@/shared/config/environment.js';

// stdout belongs to the CLI output, logs go to stderr.
export const logger: Logger = pino(
  {
    name: 'pixel-unscale',
    level: environment.LOG_LEVEL,
  },
  destination(2),
);

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
