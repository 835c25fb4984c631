import { pino } from 'pino';
import type { Logger } from 'pino';
import { loadLogLevel } from './config.js';
import type { LogLevel } from './config.js';

const REDACT_PATHS = [
  'authorization',
  'signature',
  '*.authorization',
  '*.signature',
  '*.secret',
  '*.privateKey',
];

export function createLogger(level: LogLevel): Logger {
  return pino({
    name: 'signet-http-signatures',
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  });
}

export const logger = createLogger(loadLogLevel());

export type { Logger };
