/**
 * Provider API module
 *
 * Exports the Uptime Robot client, its codec, and supporting utilities.
 */

export {
  createClient,
  DEFAULT_BASE_URL,
  type UptimeRobotClient,
} from './client.js';

export {
  MONITOR_TYPES,
  CUSTOM_PORT_SUB_TYPE,
  decodeContact,
  decodeMonitor,
  encodeAlertContacts,
  encodeContact,
  encodeMonitor,
  encodeMonitorUpdate,
  portSubType,
} from './codec.js';

export {
  ApiRequestError,
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  withRetry,
  type RetryOptions,
} from './retry.js';

export {
  ApiLogger,
  createLogger,
  logger,
  redactPatterns,
  redactRecord,
  redactString,
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';

export type {
  AlertContactSpec,
  ContactRecord,
  ContactSpec,
  FormParams,
  MonitorRecord,
  MonitorSpec,
  ProviderApi,
  RetryConfig,
  RetryResult,
  UptimeRobotClientConfig,
} from './types.js';
