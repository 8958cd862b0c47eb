/**
 * Zod validation schemas for configuration and API requests
 */

import { z } from 'zod';
import { APPLIANCE_LIMITS, POLLING_DEFAULTS } from './constants.js';

// Empty strings from .env files mean "not set"
const optionalSecret = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val === '' ? undefined : val));

// Tracker configuration (validated once at startup)
export const trackerConfigSchema = z.object({
  host: z.string().trim().min(1, 'Appliance host is required'),
  password: optionalSecret,
  pollIntervalSeconds: z
    .number()
    .int()
    .min(POLLING_DEFAULTS.MIN_INTERVAL_SECONDS)
    .default(POLLING_DEFAULTS.INTERVAL_SECONDS),
  awayThresholdSeconds: z.number().int().min(0).default(POLLING_DEFAULTS.AWAY_THRESHOLD_SECONDS),
  requestTimeoutMs: z.number().int().positive().default(APPLIANCE_LIMITS.REQUEST_TIMEOUT_MS),
  maxBackoffSeconds: z.number().int().positive().default(POLLING_DEFAULTS.MAX_BACKOFF_SECONDS),
  recentQueryLimit: z
    .number()
    .int()
    .positive()
    .max(100000)
    .default(APPLIANCE_LIMITS.RECENT_QUERY_LIMIT),
});

export type TrackerConfigInput = z.input<typeof trackerConfigSchema>;

// Environment variables, mapped onto the tracker configuration
export const envSchema = z.object({
  PIHOLE_HOST: z.string().trim().min(1, 'PIHOLE_HOST is required'),
  PIHOLE_PASSWORD: optionalSecret,
  POLL_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .min(POLLING_DEFAULTS.MIN_INTERVAL_SECONDS)
    .default(POLLING_DEFAULTS.INTERVAL_SECONDS),
  AWAY_THRESHOLD_SECONDS: z.coerce
    .number()
    .int()
    .min(0)
    .default(POLLING_DEFAULTS.AWAY_THRESHOLD_SECONDS),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(APPLIANCE_LIMITS.REQUEST_TIMEOUT_MS),
  MAX_BACKOFF_SECONDS: z.coerce.number().int().positive().default(POLLING_DEFAULTS.MAX_BACKOFF_SECONDS),
  RECENT_QUERY_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .max(100000)
    .default(APPLIANCE_LIMITS.RECENT_QUERY_LIMIT),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

// Route params
export const deviceKeyParamSchema = z.object({
  key: z.string().min(1).max(128),
});

export type DeviceKeyParam = z.infer<typeof deviceKeyParamSchema>;

// Resume polling after an authentication pause
export const resumeBodySchema = z.object({
  password: z.string().min(1).optional(),
});

export type ResumeBody = z.infer<typeof resumeBodySchema>;
