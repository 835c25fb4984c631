/**
 * Environment configuration for signers and verifiers.
 */

import { z } from 'zod';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import type { Logger } from './logging.js';
import type { Charset } from './types.js';

/**
 * Default configuration values
 */
export const CONFIG_DEFAULTS = {
  logLevel: 'info',
  clockSkewSeconds: 300,
  charset: 'utf8',
} as const;

const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default(CONFIG_DEFAULTS.logLevel),
  SIGNET_CLOCK_SKEW_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(CONFIG_DEFAULTS.clockSkewSeconds),
  SIGNET_CHARSET: z.enum(['utf8', 'latin1', 'ascii']).default(CONFIG_DEFAULTS.charset),
});

export type LogLevel = z.infer<typeof ConfigSchema>['LOG_LEVEL'];

export interface SignetConfig {
  logLevel: LogLevel;
  /** Tolerated distance between a signed date header and now */
  clockSkewSeconds: number;
  charset: Charset;
}

function envInput(env: NodeJS.ProcessEnv) {
  // Empty strings count as unset
  return {
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    SIGNET_CLOCK_SKEW_SECONDS: env.SIGNET_CLOCK_SKEW_SECONDS || undefined,
    SIGNET_CHARSET: env.SIGNET_CHARSET || undefined,
  };
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> {
  const parsed = schema.safeParse(envInput(env));
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new HttpSignatureError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${fields.join('; ')}`
    );
  }
  return parsed.data;
}

/**
 * Read and validate every setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SignetConfig {
  const config = parseEnv(ConfigSchema, env);
  return {
    logLevel: config.LOG_LEVEL,
    clockSkewSeconds: config.SIGNET_CLOCK_SKEW_SECONDS,
    charset: config.SIGNET_CHARSET,
  };
}

// Single-setting readers only validate the variable they read.

export function loadLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseEnv(ConfigSchema.pick({ LOG_LEVEL: true }), env).LOG_LEVEL;
}

export function loadClockSkewSeconds(env: NodeJS.ProcessEnv = process.env): number {
  return parseEnv(ConfigSchema.pick({ SIGNET_CLOCK_SKEW_SECONDS: true }), env)
    .SIGNET_CLOCK_SKEW_SECONDS;
}

export function loadCharset(env: NodeJS.ProcessEnv = process.env): Charset {
  return parseEnv(ConfigSchema.pick({ SIGNET_CHARSET: true }), env).SIGNET_CHARSET;
}

/**
 * SIGNET_CHARSET, or the default when it is invalid. Used where
 * construction must not fail; the rejected value is logged.
 */
export function charsetOrDefault(log: Logger, env: NodeJS.ProcessEnv = process.env): Charset {
  try {
    return loadCharset(env);
  } catch (error) {
    log.warn({ err: error }, 'Ignoring invalid SIGNET_CHARSET');
    return CONFIG_DEFAULTS.charset;
  }
}
