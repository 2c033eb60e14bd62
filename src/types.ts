/**
 * Shared types and interfaces for the uptime-sync CLI
 */

import type { ProviderApi } from './api/types.js';
import type { ApiLogger } from './api/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Uptime Robot main API key */
  apiKey?: string;
  /** API base URL */
  baseUrl?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  logger: ApiLogger;
  /** Build the provider client from the resolved settings */
  createApi: () => ProviderApi;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
