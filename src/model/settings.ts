/**
 * Monitor settings variants
 *
 * Each declarable monitor type has its own settings shape. Adding a type means
 * adding a variant here, a branch in `settingsFields`/`validateSettings`, and
 * its wire mapping in the API codec; the reconciler only sees field maps.
 */

import { ValidationError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export interface KeywordSettings {
  kind: 'keyword';
  url: string;
  keyword: string;
  /** Alert when the keyword is missing (true) or when it appears (false) */
  shouldExist: boolean;
  httpUsername: string;
  httpPassword: string;
}

export interface PortSettings {
  kind: 'port';
  host: string;
  port: number;
}

export interface HttpSettings {
  kind: 'http';
  url: string;
  httpUsername: string;
  httpPassword: string;
}

/**
 * A monitor type that exists remotely but cannot be declared
 */
export interface OtherSettings {
  kind: 'other';
  typeCode: number;
  target: string;
}

export type MonitorSettings = KeywordSettings | PortSettings | HttpSettings | OtherSettings;

export type DeclarableSettings = Exclude<MonitorSettings, OtherSettings>;

export type MonitorKind = MonitorSettings['kind'];

export type FieldValue = string | number | boolean;

/**
 * Settings fields whose values never appear in plans or logs
 */
export const SENSITIVE_FIELDS: ReadonlySet<string> = new Set(['httpPassword']);

// =============================================================================
// Field Access
// =============================================================================

/**
 * Flatten settings into the fields the differ compares, in display order
 */
export function settingsFields(settings: MonitorSettings): Record<string, FieldValue> {
  switch (settings.kind) {
    case 'keyword':
      return {
        url: settings.url,
        keyword: settings.keyword,
        shouldExist: settings.shouldExist,
        httpUsername: settings.httpUsername,
        httpPassword: settings.httpPassword,
      };
    case 'port':
      return { host: settings.host, port: settings.port };
    case 'http':
      return {
        url: settings.url,
        httpUsername: settings.httpUsername,
        httpPassword: settings.httpPassword,
      };
    case 'other':
      return { typeCode: settings.typeCode, target: settings.target };
  }
}

/**
 * Short description of what a monitor checks
 */
export function settingsTarget(settings: MonitorSettings): string {
  switch (settings.kind) {
    case 'keyword':
      return `${settings.url} ${settings.shouldExist ? 'contains' : 'lacks'} "${settings.keyword}"`;
    case 'port':
      return `${settings.host}:${settings.port}`;
    case 'http':
      return settings.url;
    case 'other':
      return settings.target;
  }
}

// =============================================================================
// Validation
// =============================================================================

function requireHttpUrl(url: string, path: string): void {
  if (url.trim() === '') {
    throw ValidationError.single('MISSING_REQUIRED_FIELD', path, 'URL is required');
  }
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw ValidationError.single('INVALID_FIELD', path, `"${url}" is not a valid URL`);
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw ValidationError.single(
      'INVALID_FIELD',
      path,
      `URL must use http or https, got "${protocol}"`
    );
  }
}

/**
 * Check that the settings of a declared monitor are consistent with its type
 *
 * @param path - Prefix for issue paths, e.g. "monitors.ssh"
 */
export function validateSettings(settings: DeclarableSettings, path: string): void {
  switch (settings.kind) {
    case 'keyword':
      requireHttpUrl(settings.url, `${path}.url`);
      if (settings.keyword === '') {
        throw ValidationError.single(
          'MISSING_REQUIRED_FIELD',
          `${path}.keyword`,
          'Keyword monitors require keyword text'
        );
      }
      return;
    case 'http':
      requireHttpUrl(settings.url, `${path}.url`);
      return;
    case 'port':
      if (settings.host.trim() === '') {
        throw ValidationError.single('MISSING_REQUIRED_FIELD', `${path}.host`, 'Host is required');
      }
      if (!Number.isInteger(settings.port) || settings.port < 1 || settings.port > 65535) {
        throw ValidationError.single(
          'INVALID_FIELD',
          `${path}.port`,
          `Port must be an integer between 1 and 65535, got ${settings.port}`
        );
      }
      return;
  }
}
