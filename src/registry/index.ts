/**
 * Declaration builder exports
 */

export {
  UptimeConfig,
  type HttpMonitorOptions,
  type KeywordMonitorOptions,
  type MonitorOptions,
  type PlanResult,
  type SyncOptions,
  type UptimeConfigOptions,
} from './config.js';
