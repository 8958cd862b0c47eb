/**
 * Runtime configuration
 *
 * Environment variables are validated once at startup; anything invalid
 * stops the process with a ValidationError listing every bad field.
 */

import {
  envSchema,
  trackerConfigSchema,
  type EnvConfig,
  type TrackerConfig,
  type TrackerConfigInput,
} from '@dnspresence/shared';
import { ValidationError } from './utils/errors.js';

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: EnvConfig['LOG_LEVEL'];
}

export interface AppConfig {
  tracker: TrackerConfig;
  server: ServerConfig;
}

/**
 * Validate a tracker configuration supplied directly (e.g. by a test or embedding host)
 */
export function resolveTrackerConfig(input: TrackerConfigInput): TrackerConfig {
  const parsed = trackerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid tracker configuration');
  }
  return parsed.data;
}

/**
 * Load configuration from environment variables
 *
 * @example
 * const { tracker, server } = loadConfig(process.env);
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid configuration');
  }

  const vars = parsed.data;
  return {
    tracker: {
      host: vars.PIHOLE_HOST,
      password: vars.PIHOLE_PASSWORD,
      pollIntervalSeconds: vars.POLL_INTERVAL_SECONDS,
      awayThresholdSeconds: vars.AWAY_THRESHOLD_SECONDS,
      requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
      maxBackoffSeconds: vars.MAX_BACKOFF_SECONDS,
      recentQueryLimit: vars.RECENT_QUERY_LIMIT,
    },
    server: {
      port: vars.PORT,
      host: vars.HOST,
      logLevel: vars.LOG_LEVEL,
    },
  };
}
