/**
 * @dnspresence/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  Presence,
  PresenceTransition,
  DeviceKey,
  SessionStatus,
  SchedulerState,
  PollFailureKind,
  DeviceAttributes,
  SinkRecord,
  ApplianceAvailability,
  SchedulerStatus,
  TrackerConfig,
  ApiError,
} from './types.js';

// Schema exports
export {
  trackerConfigSchema,
  envSchema,
  deviceKeyParamSchema,
  resumeBodySchema,
  type TrackerConfigInput,
  type EnvConfig,
  type DeviceKeyParam,
  type ResumeBody,
} from './schemas.js';

// Constant exports
export {
  POLLING_DEFAULTS,
  APPLIANCE_LIMITS,
  APPLIANCE_API,
  DEVICE_KEY,
  POLLER_EVENTS,
  API_VERSION,
  API_BASE_PATH,
} from './constants.js';
