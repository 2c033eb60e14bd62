/**
 * Alert contact entity
 *
 * A contact is identified by its type and value, matching the provider's own
 * deduplication. The remote id is attached by the sync executor and never
 * takes part in identity.
 */

import { ValidationError } from '../errors.js';

// =============================================================================
// Contact Types
// =============================================================================

/**
 * Contact type codes accepted by the newAlertContact endpoint
 */
export const CONTACT_TYPES = {
  sms: 1,
  email: 2,
  'twitter-dm': 3,
  boxcar: 4,
  webhook: 5,
  pushbullet: 6,
  pushover: 9,
} as const;

export type ContactTypeName = keyof typeof CONTACT_TYPES;

/** Placeholder code for alert contacts a remote monitor names but the account no longer lists */
const UNRESOLVED_TYPE = 0;

export function isContactTypeName(value: string): value is ContactTypeName {
  return Object.prototype.hasOwnProperty.call(CONTACT_TYPES, value);
}

const TYPE_NAMES = new Map<number, ContactTypeName>();
for (const name of Object.keys(CONTACT_TYPES)) {
  if (isContactTypeName(name)) {
    TYPE_NAMES.set(CONTACT_TYPES[name], name);
  }
}

/**
 * Human-readable label for a type code (`email`, or `type-11` for opaque codes)
 */
export function contactTypeLabel(code: number): string {
  if (code === UNRESOLVED_TYPE) return 'unresolved';
  return TYPE_NAMES.get(code) ?? `type-${code}`;
}

/**
 * Whether contacts of this type can be created through the API
 */
export function isCreatableType(code: number): boolean {
  return TYPE_NAMES.has(code);
}

/**
 * Identity key of a contact: `<type-label>:<value>`
 */
export function contactKey(type: number, value: string): string {
  return `${contactTypeLabel(type)}:${value}`;
}

// =============================================================================
// Contact
// =============================================================================

export interface ContactInit {
  type: number;
  value: string;
  friendlyName?: string;
}

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+$/;

export class Contact {
  readonly type: number;
  readonly value: string;
  readonly friendlyName: string;
  private _remoteId?: string;

  private constructor(init: ContactInit, remoteId?: string) {
    this.type = init.type;
    this.value = init.value;
    this.friendlyName = init.friendlyName ?? '';
    this._remoteId = remoteId;
  }

  /**
   * Declare a contact, validating its fields
   */
  static create(init: ContactInit): Contact {
    const path = `contacts.${init.value || '<empty>'}`;

    if (!Number.isInteger(init.type) || init.type <= 0) {
      throw ValidationError.single(
        'INVALID_FIELD',
        `${path}.type`,
        `Contact type must be a positive integer code, got ${init.type}`,
        [`Use one of: ${Object.keys(CONTACT_TYPES).join(', ')}`]
      );
    }
    if (init.value.trim() === '') {
      throw ValidationError.single(
        'MISSING_REQUIRED_FIELD',
        `${path}.value`,
        `Contact of type ${contactTypeLabel(init.type)} requires a value`
      );
    }
    if (init.type === CONTACT_TYPES.email && !EMAIL_PATTERN.test(init.value)) {
      throw ValidationError.single(
        'INVALID_FIELD',
        `${path}.value`,
        `"${init.value}" is not an e-mail address`
      );
    }

    return new Contact(init);
  }

  /**
   * Rebuild a contact reported by the provider. Not validated.
   */
  static restore(init: ContactInit & { remoteId: string }): Contact {
    return new Contact(init, init.remoteId);
  }

  /**
   * Stand-in for an alert contact id that no listed contact carries
   */
  static unresolved(remoteId: string): Contact {
    return new Contact({ type: UNRESOLVED_TYPE, value: `#${remoteId}` }, remoteId);
  }

  get key(): string {
    return contactKey(this.type, this.value);
  }

  get remoteId(): string | undefined {
    return this._remoteId;
  }

  get creatable(): boolean {
    return isCreatableType(this.type);
  }

  /**
   * Attach the provider id once the contact exists remotely
   */
  bindRemoteId(id: string): void {
    this._remoteId = id;
  }

  /**
   * Identity equality; friendly names are compared separately by the differ
   */
  sameIdentity(other: Contact): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.friendlyName ? `${this.key} (${this.friendlyName})` : this.key;
  }
}
