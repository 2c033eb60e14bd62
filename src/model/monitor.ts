/**
 * Uptime monitor entity
 *
 * A monitor is identified by its friendly name. Contacts are attached by
 * identity, so a monitor can reference a contact that does not exist remotely
 * yet; ids are resolved by the sync executor.
 */

import { ValidationError } from '../errors.js';
import type { Contact } from './contact.js';
import {
  SENSITIVE_FIELDS,
  settingsFields,
  settingsTarget,
  validateSettings,
  type DeclarableSettings,
  type FieldValue,
  type MonitorKind,
  type MonitorSettings,
} from './settings.js';

// =============================================================================
// Constants
// =============================================================================

/** Polling interval used when a declaration gives none (minutes) */
export const DEFAULT_INTERVAL_MINUTES = 5;
export const MIN_INTERVAL_MINUTES = 1;
export const MAX_INTERVAL_MINUTES = 1440;

// =============================================================================
// Types
// =============================================================================

/**
 * "If down for `threshold` minutes, alert every `recurrence` minutes"
 */
export interface AlertSettings {
  threshold: number;
  recurrence: number;
}

export interface ContactAssignment extends AlertSettings {
  contact: Contact;
}

/**
 * Symbolic reference to a contact, resolved to a remote id at execution time
 */
export interface ContactRef extends AlertSettings {
  key: string;
}

export interface MonitorInit {
  friendlyName: string;
  settings: MonitorSettings;
  /** Polling interval in minutes */
  interval?: number;
}

export interface DeclareMonitorOptions {
  /**
   * Canonicalizes contacts passed to addContacts. The owning configuration
   * uses it to register and deduplicate them.
   */
  registerContact?: (contact: Contact) => Contact;
}

/**
 * A single field that differs between declared and remote state
 */
export interface FieldChange {
  field: string;
  oldValue?: FieldValue;
  newValue?: FieldValue;
}

const REDACTED = '[REDACTED]';

// =============================================================================
// Monitor
// =============================================================================

export class Monitor {
  readonly friendlyName: string;
  readonly settings: MonitorSettings;
  readonly interval: number;
  private readonly assignments = new Map<string, ContactAssignment>();
  private readonly registerContact?: (contact: Contact) => Contact;
  private _remoteId?: string;

  private constructor(init: MonitorInit, options: DeclareMonitorOptions & { remoteId?: string }) {
    this.friendlyName = init.friendlyName;
    this.settings = init.settings;
    this.interval = init.interval ?? DEFAULT_INTERVAL_MINUTES;
    this.registerContact = options.registerContact;
    this._remoteId = options.remoteId;
  }

  /**
   * Declare a monitor, validating its settings and interval
   */
  static create(
    init: MonitorInit & { settings: DeclarableSettings },
    options: DeclareMonitorOptions = {}
  ): Monitor {
    if (init.friendlyName.trim() === '') {
      throw ValidationError.single(
        'MISSING_REQUIRED_FIELD',
        'monitors.<unnamed>.friendlyName',
        'Monitor name is required'
      );
    }

    const path = `monitors.${init.friendlyName}`;
    validateSettings(init.settings, path);

    const interval = init.interval ?? DEFAULT_INTERVAL_MINUTES;
    if (
      !Number.isInteger(interval) ||
      interval < MIN_INTERVAL_MINUTES ||
      interval > MAX_INTERVAL_MINUTES
    ) {
      throw ValidationError.single(
        'INVALID_INTERVAL',
        `${path}.interval`,
        `Interval must be a whole number of minutes between ${MIN_INTERVAL_MINUTES} and ${MAX_INTERVAL_MINUTES}, got ${interval}`
      );
    }

    return new Monitor({ ...init, interval }, options);
  }

  /**
   * Rebuild a monitor reported by the provider. Not validated.
   */
  static restore(
    init: MonitorInit & { remoteId: string; contacts: ContactAssignment[] }
  ): Monitor {
    const monitor = new Monitor(init, { remoteId: init.remoteId });
    for (const assignment of init.contacts) {
      monitor.assignments.set(assignment.contact.key, { ...assignment });
    }
    return monitor;
  }

  get kind(): MonitorKind {
    return this.settings.kind;
  }

  get remoteId(): string | undefined {
    return this._remoteId;
  }

  bindRemoteId(id: string): void {
    this._remoteId = id;
  }

  /**
   * Alert these contacts immediately on every failure
   */
  addContacts(...contacts: Contact[]): this {
    return this.addContactsWith({}, ...contacts);
  }

  /**
   * Alert these contacts with a threshold and recurrence (minutes).
   * Re-adding a contact replaces its alert settings.
   */
  addContactsWith(alert: Partial<AlertSettings>, ...contacts: Contact[]): this {
    const threshold = alert.threshold ?? 0;
    const recurrence = alert.recurrence ?? 0;
    for (const [field, value] of [['threshold', threshold], ['recurrence', recurrence]] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw ValidationError.single(
          'INVALID_FIELD',
          `monitors.${this.friendlyName}.contacts.${field}`,
          `Alert ${field} must be a non-negative integer, got ${value}`
        );
      }
    }

    for (const given of contacts) {
      const contact = this.registerContact ? this.registerContact(given) : given;
      this.assignments.set(contact.key, { contact, threshold, recurrence });
    }
    return this;
  }

  get contacts(): ContactAssignment[] {
    return [...this.assignments.values()];
  }

  /**
   * Contact references sorted by identity key
   */
  contactRefs(): ContactRef[] {
    return this.contacts
      .map(({ contact, threshold, recurrence }) => ({ key: contact.key, threshold, recurrence }))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * Whether two declarations describe the same monitor (contacts excluded)
   */
  sameDeclaration(other: Monitor): boolean {
    if (this.friendlyName !== other.friendlyName || this.interval !== other.interval) {
      return false;
    }
    if (this.kind !== other.kind) return false;
    const mine = settingsFields(this.settings);
    const theirs = settingsFields(other.settings);
    return Object.keys(mine).every((field) => mine[field] === theirs[field]);
  }

  /**
   * Every compared field, in display order
   */
  fields(): Record<string, FieldValue> {
    return {
      ...settingsFields(this.settings),
      interval: this.interval,
      contacts: renderContactRefs(this.contactRefs()),
    };
  }

  toString(): string {
    return `${this.friendlyName} [${this.kind} ${settingsTarget(this.settings)}]`;
  }
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Render contact references as a stable, comparable string
 */
export function renderContactRefs(refs: ContactRef[]): string {
  return refs.map((ref) => `${ref.key} (${ref.threshold}/${ref.recurrence})`).join(', ');
}

function displayValue(field: string, value: FieldValue | undefined): FieldValue | undefined {
  if (value === undefined || !SENSITIVE_FIELDS.has(field)) return value;
  return value === '' ? '' : REDACTED;
}

/**
 * List the fields that differ between a declared and a remote monitor.
 * Sensitive values are redacted in the result.
 */
export function compareMonitors(desired: Monitor, remote: Monitor): FieldChange[] {
  const wanted = desired.fields();
  const actual = remote.fields();
  const changes: FieldChange[] = [];

  const fieldNames = new Set([...Object.keys(wanted), ...Object.keys(actual)]);
  for (const field of fieldNames) {
    if (wanted[field] !== actual[field]) {
      changes.push({
        field,
        oldValue: displayValue(field, actual[field]),
        newValue: displayValue(field, wanted[field]),
      });
    }
  }

  return changes;
}
