/**
 * Provider API types
 *
 * The reconciler depends only on `ProviderApi`. The Uptime Robot client in
 * client.ts implements it over HTTP; tests substitute an in-process fake.
 */

import type { MonitorSettings } from '../model/settings.js';

// =============================================================================
// Provider Boundary
// =============================================================================

/**
 * Contact as sent to the provider
 */
export interface ContactSpec {
  /** Provider contact type code */
  type: number;
  value: string;
  friendlyName: string;
}

/**
 * Contact as reported by the provider
 */
export interface ContactRecord extends ContactSpec {
  id: string;
}

/**
 * Alert contact attached to a monitor, by remote id
 */
export interface AlertContactSpec {
  id: string;
  threshold: number;
  recurrence: number;
}

/**
 * Monitor as sent to the provider
 */
export interface MonitorSpec {
  friendlyName: string;
  settings: MonitorSettings;
  /** Polling interval in minutes */
  interval: number;
  alertContacts: AlertContactSpec[];
}

/**
 * Monitor as reported by the provider
 */
export interface MonitorRecord extends MonitorSpec {
  id: string;
}

/**
 * Operations the reconciler needs from the monitoring provider
 */
export interface ProviderApi {
  listContacts(): Promise<ContactRecord[]>;
  listMonitors(): Promise<MonitorRecord[]>;
  /** Returns the id of the new contact */
  createContact(spec: ContactSpec): Promise<string>;
  deleteContact(id: string): Promise<void>;
  /** Returns the id of the new monitor */
  createMonitor(spec: MonitorSpec): Promise<string>;
  updateMonitor(id: string, spec: MonitorSpec): Promise<void>;
  deleteMonitor(id: string): Promise<void>;
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Uptime Robot client configuration
 */
export interface UptimeRobotClientConfig {
  /** Main API key of the account (not a monitor-specific key) */
  apiKey: string;
  /** Base URL for the API (defaults to https://api.uptimerobot.com/v2/) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Retry behaviour for transient failures */
  retry?: RetryConfig;
}

/**
 * Form parameters of a single API call
 */
export type FormParams = Record<string, string | number>;

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };
