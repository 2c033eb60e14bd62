/**
 * Uptime Robot v2 wire codec
 *
 * Translates provider specs into form parameters and API responses back
 * into records. Parameter names follow https://uptimerobot.com/api
 */

import { ApiError } from '../errors.js';
import type { MonitorSettings } from '../model/settings.js';
import type {
  AlertContactSpec,
  ContactRecord,
  ContactSpec,
  FormParams,
  MonitorRecord,
  MonitorSpec,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Monitor type codes
 */
export const MONITOR_TYPES = {
  http: 1,
  keyword: 2,
  ping: 3,
  port: 4,
} as const;

/**
 * Port monitor sub types for well-known ports; anything else is custom
 */
const PORT_SUB_TYPES = new Map<number, number>([
  [80, 1],
  [443, 2],
  [21, 3],
  [25, 4],
  [110, 5],
  [143, 6],
]);
export const CUSTOM_PORT_SUB_TYPE = 99;

/** keyword_type: alert when the keyword exists */
const KEYWORD_ALERT_IF_EXISTS = 1;
/** keyword_type: alert when the keyword does not exist */
const KEYWORD_ALERT_IF_MISSING = 2;

// =============================================================================
// Response Helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function readInt(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value === 'number') return Math.trunc(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return 0;
}

function malformed(what: string, raw: unknown): ApiError {
  return new ApiError(`Malformed ${what} in API response: ${JSON.stringify(raw)}`, {
    code: 'MALFORMED_RESPONSE',
  });
}

// =============================================================================
// Contacts
// =============================================================================

export function encodeContact(spec: ContactSpec): FormParams {
  return {
    type: spec.type,
    value: spec.value,
    friendly_name: spec.friendlyName,
  };
}

export function decodeContact(raw: unknown): ContactRecord {
  if (!isRecord(raw) || readString(raw, 'id') === '') {
    throw malformed('alert contact', raw);
  }
  return {
    // leading zeroes matter, so ids stay strings
    id: readString(raw, 'id'),
    type: readInt(raw, 'type'),
    value: readString(raw, 'value'),
    friendlyName: readString(raw, 'friendly_name'),
  };
}

// =============================================================================
// Monitors
// =============================================================================

/**
 * Port sub type for a port number
 */
export function portSubType(port: number): number {
  return PORT_SUB_TYPES.get(port) ?? CUSTOM_PORT_SUB_TYPE;
}

function portForSubType(subType: number): number {
  for (const [port, code] of PORT_SUB_TYPES) {
    if (code === subType) return port;
  }
  return 0;
}

/**
 * Encode alert contacts as `id_threshold_recurrence` joined by `-`
 */
export function encodeAlertContacts(contacts: AlertContactSpec[]): string {
  return contacts
    .map((c) => `${c.id}_${c.threshold}_${c.recurrence}`)
    .sort()
    .join('-');
}

function encodeSettings(settings: MonitorSettings): FormParams {
  switch (settings.kind) {
    case 'keyword':
      return {
        type: MONITOR_TYPES.keyword,
        url: settings.url,
        keyword_type: settings.shouldExist ? KEYWORD_ALERT_IF_MISSING : KEYWORD_ALERT_IF_EXISTS,
        keyword_value: settings.keyword,
        http_username: settings.httpUsername,
        http_password: settings.httpPassword,
      };
    case 'port':
      return {
        type: MONITOR_TYPES.port,
        url: settings.host,
        sub_type: portSubType(settings.port),
        port: settings.port,
      };
    case 'http':
      return {
        type: MONITOR_TYPES.http,
        url: settings.url,
        http_username: settings.httpUsername,
        http_password: settings.httpPassword,
      };
    case 'other':
      throw new ApiError(
        `Monitors of type ${settings.typeCode} cannot be created or edited`,
        { code: 'UNSUPPORTED_MONITOR_TYPE' }
      );
  }
}

/**
 * Parameters for newMonitor
 */
export function encodeMonitor(spec: MonitorSpec): FormParams {
  return {
    friendly_name: spec.friendlyName,
    ...encodeSettings(spec.settings),
    interval: spec.interval * 60,
    alert_contacts: encodeAlertContacts(spec.alertContacts),
  };
}

/**
 * Parameters for editMonitor; the monitor type cannot be edited
 */
export function encodeMonitorUpdate(id: string, spec: MonitorSpec): FormParams {
  const { type: _type, ...params } = encodeMonitor(spec);
  return { id, ...params };
}

function decodeSettings(raw: Record<string, unknown>): MonitorSettings {
  const type = readInt(raw, 'type');
  switch (type) {
    case MONITOR_TYPES.keyword:
      return {
        kind: 'keyword',
        url: readString(raw, 'url'),
        keyword: readString(raw, 'keyword_value'),
        shouldExist: readInt(raw, 'keyword_type') !== KEYWORD_ALERT_IF_EXISTS,
        httpUsername: readString(raw, 'http_username'),
        httpPassword: readString(raw, 'http_password'),
      };
    case MONITOR_TYPES.port:
      return {
        kind: 'port',
        host: readString(raw, 'url'),
        port: readInt(raw, 'port') || portForSubType(readInt(raw, 'sub_type')),
      };
    case MONITOR_TYPES.http:
      return {
        kind: 'http',
        url: readString(raw, 'url'),
        httpUsername: readString(raw, 'http_username'),
        httpPassword: readString(raw, 'http_password'),
      };
    default:
      return { kind: 'other', typeCode: type, target: readString(raw, 'url') };
  }
}

function decodeAlertContacts(raw: unknown): AlertContactSpec[] {
  if (!Array.isArray(raw)) return [];
  return raw.filter(isRecord).map((contact) => ({
    id: readString(contact, 'id'),
    threshold: readInt(contact, 'threshold'),
    recurrence: readInt(contact, 'recurrence'),
  }));
}

export function decodeMonitor(raw: unknown): MonitorRecord {
  if (!isRecord(raw) || readString(raw, 'id') === '') {
    throw malformed('monitor', raw);
  }
  return {
    id: readString(raw, 'id'),
    friendlyName: readString(raw, 'friendly_name'),
    settings: decodeSettings(raw),
    interval: Math.round(readInt(raw, 'interval') / 60),
    alertContacts: decodeAlertContacts(raw.alert_contacts),
  };
}
