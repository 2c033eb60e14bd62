/**
 * Declaration file loading
 *
 * Reads a YAML or JSON declaration and replays it through an `UptimeConfig`:
 *
 * ```yaml
 * contacts:
 *   - id: ops
 *     type: email
 *     value: ops@example.com
 *     name: Ops team
 * monitors:
 *   - name: Homepage
 *     type: keyword
 *     url: https://example.com
 *     keyword: Welcome
 *     interval: 5
 *     contacts:
 *       - ops
 *       - { contact: ops, threshold: 5, recurrence: 30 }
 * ```
 *
 * Every problem in the file is collected and raised as one ValidationError
 * with code INVALID_DECLARATION.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ValidationError, errorMessage, type ValidationIssue } from '../errors.js';
import { isRecord } from '../api/codec.js';
import { isContactTypeName, type Contact, type ContactTypeName } from '../model/contact.js';
import type { AlertSettings, Monitor } from '../model/monitor.js';
import type { UptimeConfig } from '../registry/config.js';

/** Monitor types a declaration file can use */
export const DECLARABLE_MONITOR_TYPES = ['keyword', 'port', 'http'] as const;
export type DeclarableMonitorType = (typeof DECLARABLE_MONITOR_TYPES)[number];

function isDeclarableMonitorType(value: string): value is DeclarableMonitorType {
  return DECLARABLE_MONITOR_TYPES.some((type) => type === value);
}

const TOP_LEVEL_KEYS = new Set(['contacts', 'monitors']);

type Entry = Record<string, unknown>;

// =============================================================================
// Field Readers
// =============================================================================

/**
 * Collects issues while reading one declaration
 */
class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  report(path: string, message: string): void {
    this.issues.push({ code: 'INVALID_DECLARATION', path, message });
  }

  /**
   * Run a builder call, keeping its validation issues instead of throwing
   */
  capture<T>(fn: () => T): T | undefined {
    try {
      return fn();
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.issues.push(...err.issues);
      return undefined;
    }
  }

  requiredString(entry: Entry, key: string, path: string): string | undefined {
    const value = entry[key];
    if (typeof value === 'string' && value.length > 0) return value;
    this.report(`${path}.${key}`, value === undefined ? `"${key}" is required` : `"${key}" must be a string`);
    return undefined;
  }

  optionalString(entry: Entry, key: string, path: string): string | undefined {
    const value = entry[key];
    if (value === undefined || typeof value === 'string') return value;
    this.report(`${path}.${key}`, `"${key}" must be a string`);
    return undefined;
  }

  optionalNumber(entry: Entry, key: string, path: string): number | undefined {
    const value = entry[key];
    if (value === undefined || typeof value === 'number') return value;
    this.report(`${path}.${key}`, `"${key}" must be a number`);
    return undefined;
  }

  optionalBoolean(entry: Entry, key: string, path: string): boolean | undefined {
    const value = entry[key];
    if (value === undefined || typeof value === 'boolean') return value;
    this.report(`${path}.${key}`, `"${key}" must be true or false`);
    return undefined;
  }

  list(data: Entry, key: string): unknown[] {
    const value = data[key];
    if (value === undefined || value === null) return [];
    if (Array.isArray(value)) return value;
    this.report(key, `"${key}" must be a list`);
    return [];
  }
}

// =============================================================================
// Contacts
// =============================================================================

function declareContacts(
  config: UptimeConfig,
  data: Entry,
  collector: IssueCollector
): Map<string, Contact> {
  const contacts = new Map<string, Contact>();

  collector.list(data, 'contacts').forEach((entry, index) => {
    const path = `contacts[${index}]`;
    if (!isRecord(entry)) {
      collector.report(path, 'Contact must be a mapping');
      return;
    }

    const before = collector.issues.length;
    const id = collector.requiredString(entry, 'id', path);
    const value = collector.requiredString(entry, 'value', path);
    const name = collector.optionalString(entry, 'name', path);
    const type = readContactType(entry.type, `${path}.type`, collector);

    if (id !== undefined && contacts.has(id)) {
      collector.report(`${path}.id`, `Contact id "${id}" is used more than once`);
    }
    if (id === undefined || value === undefined || type === undefined) return;
    if (collector.issues.length > before) return;

    const contact = collector.capture(() =>
      type === 'email' ? config.emailContact(value, name) : config.contact(type, value, name)
    );
    if (contact) contacts.set(id, contact);
  });

  return contacts;
}

function readContactType(
  value: unknown,
  path: string,
  collector: IssueCollector
): ContactTypeName | number | undefined {
  if (typeof value === 'string' && isContactTypeName(value)) return value;
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
  collector.report(
    path,
    value === undefined
      ? '"type" is required'
      : `Unknown contact type ${JSON.stringify(value)}; use a type name or a numeric provider code`
  );
  return undefined;
}

// =============================================================================
// Monitors
// =============================================================================

interface ContactAssignmentEntry {
  contact: Contact;
  alert: Partial<AlertSettings>;
}

function readMonitorContacts(
  entry: Entry,
  path: string,
  contacts: Map<string, Contact>,
  collector: IssueCollector
): ContactAssignmentEntry[] {
  const raw = entry.contacts;
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    collector.report(`${path}.contacts`, '"contacts" must be a list');
    return [];
  }

  const assignments: ContactAssignmentEntry[] = [];
  raw.forEach((item: unknown, index) => {
    const itemPath = `${path}.contacts[${index}]`;
    let id: string | undefined;
    let alert: Partial<AlertSettings> = {};

    if (typeof item === 'string') {
      id = item;
    } else if (isRecord(item)) {
      id = collector.requiredString(item, 'contact', itemPath);
      alert = {
        threshold: collector.optionalNumber(item, 'threshold', itemPath),
        recurrence: collector.optionalNumber(item, 'recurrence', itemPath),
      };
    } else {
      collector.report(itemPath, 'Contact reference must be an id or a mapping');
      return;
    }

    if (id === undefined) return;
    const contact = contacts.get(id);
    if (!contact) {
      collector.report(itemPath, `Unknown contact id "${id}"`);
      return;
    }
    assignments.push({ contact, alert });
  });

  return assignments;
}

function declareMonitor(
  config: UptimeConfig,
  entry: Entry,
  path: string,
  type: DeclarableMonitorType,
  collector: IssueCollector
): (() => Monitor) | undefined {
  const name = collector.requiredString(entry, 'name', path);
  const interval = collector.optionalNumber(entry, 'interval', path);
  if (name === undefined) return undefined;

  switch (type) {
    case 'keyword': {
      const url = collector.requiredString(entry, 'url', path);
      const keyword = collector.requiredString(entry, 'keyword', path);
      const options = {
        interval,
        shouldExist: collector.optionalBoolean(entry, 'shouldExist', path),
        httpUsername: collector.optionalString(entry, 'httpUsername', path),
        httpPassword: collector.optionalString(entry, 'httpPassword', path),
      };
      if (url === undefined || keyword === undefined) return undefined;
      return () => config.keywordMonitor(name, url, keyword, options);
    }
    case 'port': {
      const host = collector.requiredString(entry, 'host', path);
      const port = entry.port;
      if (typeof port !== 'number') {
        collector.report(`${path}.port`, port === undefined ? '"port" is required' : '"port" must be a number');
        return undefined;
      }
      if (host === undefined) return undefined;
      return () => config.portMonitor(name, host, port, { interval });
    }
    case 'http': {
      const url = collector.requiredString(entry, 'url', path);
      const options = {
        interval,
        httpUsername: collector.optionalString(entry, 'httpUsername', path),
        httpPassword: collector.optionalString(entry, 'httpPassword', path),
      };
      if (url === undefined) return undefined;
      return () => config.httpMonitor(name, url, options);
    }
  }
}

function declareMonitors(
  config: UptimeConfig,
  data: Entry,
  contacts: Map<string, Contact>,
  collector: IssueCollector
): void {
  collector.list(data, 'monitors').forEach((entry, index) => {
    const path = `monitors[${index}]`;
    if (!isRecord(entry)) {
      collector.report(path, 'Monitor must be a mapping');
      return;
    }

    const type = entry.type;
    if (typeof type !== 'string' || !isDeclarableMonitorType(type)) {
      collector.report(
        `${path}.type`,
        `Monitor type must be one of ${DECLARABLE_MONITOR_TYPES.join(', ')}, got ${JSON.stringify(type)}`
      );
      return;
    }

    const before = collector.issues.length;
    const build = declareMonitor(config, entry, path, type, collector);
    const assignments = readMonitorContacts(entry, path, contacts, collector);
    if (!build || collector.issues.length > before) return;

    collector.capture(() => {
      const monitor = build();
      for (const { contact, alert } of assignments) {
        monitor.addContactsWith(alert, contact);
      }
    });
  });
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Declare everything described by parsed declaration data on `config`
 *
 * @param source - Name used in the error message, usually the file path
 */
export function applyDeclaration(config: UptimeConfig, data: unknown, source = 'declaration'): void {
  const collector = new IssueCollector();

  if (data === null || data === undefined) {
    // An empty file declares nothing
    return;
  }
  if (!isRecord(data)) {
    collector.report('', 'Declaration must be a mapping with "contacts" and "monitors"');
  } else {
    for (const key of Object.keys(data)) {
      if (!TOP_LEVEL_KEYS.has(key)) {
        collector.report(key, `Unknown top-level key "${key}"`);
      }
    }
    const contacts = declareContacts(config, data, collector);
    declareMonitors(config, data, contacts, collector);
  }

  if (collector.issues.length > 0) {
    throw new ValidationError(
      `${source} has ${collector.issues.length} problem(s)`,
      collector.issues,
      'INVALID_DECLARATION'
    );
  }
}

/**
 * Parse declaration file contents; `.json` files are read as JSON, anything
 * else as YAML
 */
export function parseDeclaration(content: string, filePath: string): unknown {
  try {
    return extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw ValidationError.single(
      'INVALID_DECLARATION',
      filePath,
      `Failed to parse ${filePath}: ${errorMessage(err)}`
    );
  }
}

/**
 * Load a declaration file into `config`
 */
export async function loadDeclaration(config: UptimeConfig, filePath: string): Promise<void> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw ValidationError.single(
      'INVALID_DECLARATION',
      filePath,
      `Failed to read ${filePath}: ${errorMessage(err)}`
    );
  }

  applyDeclaration(config, parseDeclaration(content, filePath), filePath);
}
