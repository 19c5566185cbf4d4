// Root pino logger. Components log through per-module children.
import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../config/secrets';

export type { Logger };

export const logger: Logger = pino({
  name: 'degree-attestation',
  level: config.logLevel,
  base: null
});

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
