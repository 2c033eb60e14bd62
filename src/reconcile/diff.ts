/**
 * Contact and monitor diff algorithm
 *
 * Compares declared state with the remote snapshot and produces the
 * operations that bring the account into conformance. Contacts are matched by
 * (type, value), monitors by friendly name. The differ never resolves remote
 * ids; monitor operations carry symbolic contact references.
 */

import type { Contact } from '../model/contact.js';
import { compareMonitors, type Monitor } from '../model/monitor.js';
import type { DesiredState, OperationSet, RemoteSnapshot } from './types.js';

export function emptyOperationSet(): OperationSet {
  return {
    contactsToAdd: [],
    contactsToReplace: [],
    contactsToRemove: [],
    monitorsToAddOrUpdate: [],
    monitorsToRemove: [],
    matched: { contacts: [], monitors: [] },
    warnings: [],
  };
}

/**
 * Compute the operations that turn `remote` into `desired`
 */
export function diff(desired: DesiredState, remote: RemoteSnapshot): OperationSet {
  const operations = emptyOperationSet();
  diffContacts(desired.contacts, remote.contacts, operations);
  diffMonitors(desired.monitors, remote.monitors, operations);
  return operations;
}

/**
 * Whether applying the operations would change anything
 */
export function hasChanges(operations: OperationSet): boolean {
  return (
    operations.contactsToAdd.length > 0 ||
    operations.contactsToReplace.length > 0 ||
    operations.contactsToRemove.length > 0 ||
    operations.monitorsToAddOrUpdate.length > 0 ||
    operations.monitorsToRemove.length > 0
  );
}

/**
 * Number of contacts and monitors the operations delete without replacing
 */
export function countRemovals(operations: OperationSet): number {
  return operations.contactsToRemove.length + operations.monitorsToRemove.length;
}

// =============================================================================
// Contacts
// =============================================================================

function diffContacts(
  desired: readonly Contact[],
  remote: readonly Contact[],
  operations: OperationSet
): void {
  const desiredKeys = new Set(desired.map((contact) => contact.key));
  const remoteByKey = new Map<string, Contact>();

  for (const contact of remote) {
    if (remoteByKey.has(contact.key) || !desiredKeys.has(contact.key)) {
      // Undeclared, or a duplicate of an already matched contact
      operations.contactsToRemove.push({ contact });
      continue;
    }
    remoteByKey.set(contact.key, contact);
  }

  for (const contact of desired) {
    const match = remoteByKey.get(contact.key);

    if (!match) {
      operations.contactsToAdd.push({ contact });
    } else if (match.friendlyName === contact.friendlyName) {
      operations.matched.contacts.push({ desired: contact, remote: match });
    } else if (!contact.creatable) {
      operations.matched.contacts.push({ desired: contact, remote: match });
      operations.warnings.push(
        `Contact ${contact.key} is named "${match.friendlyName}" in the account but ` +
          `"${contact.friendlyName}" in the declaration; contacts of this type can only be renamed in the Uptime Robot UI`
      );
    } else {
      operations.contactsToReplace.push({ desired: contact, remote: match });
    }
  }
}

// =============================================================================
// Monitors
// =============================================================================

function diffMonitors(
  desired: readonly Monitor[],
  remote: readonly Monitor[],
  operations: OperationSet
): void {
  const desiredNames = new Set(desired.map((monitor) => monitor.friendlyName));
  const replacedKeys = new Set(operations.contactsToReplace.map((op) => op.desired.key));
  const remoteByName = new Map<string, Monitor>();

  for (const monitor of remote) {
    if (remoteByName.has(monitor.friendlyName) || !desiredNames.has(monitor.friendlyName)) {
      operations.monitorsToRemove.push({ monitor });
      continue;
    }
    remoteByName.set(monitor.friendlyName, monitor);
  }

  for (const monitor of desired) {
    const contactRefs = monitor.contactRefs();
    const match = remoteByName.get(monitor.friendlyName);

    if (!match) {
      operations.monitorsToAddOrUpdate.push({
        action: 'create',
        monitor,
        changes: [],
        contactRefs,
        reason: 'not present in account',
      });
      continue;
    }

    if (match.kind !== monitor.kind) {
      operations.monitorsToAddOrUpdate.push({
        action: 'recreate',
        monitor,
        remote: match,
        changes: [{ field: 'type', oldValue: match.kind, newValue: monitor.kind }],
        contactRefs,
        reason: 'monitor type cannot be changed in place',
      });
      continue;
    }

    const changes = compareMonitors(monitor, match);
    const replaced = contactRefs.filter((ref) => replacedKeys.has(ref.key)).map((ref) => ref.key);

    if (changes.length === 0 && replaced.length === 0) {
      operations.matched.monitors.push({ desired: monitor, remote: match });
      continue;
    }

    const reasons: string[] = [];
    if (changes.length > 0) {
      reasons.push(`changed: ${changes.map((change) => change.field).join(', ')}`);
    }
    if (replaced.length > 0) {
      reasons.push(`alerts replaced contact(s): ${replaced.join(', ')}`);
    }

    operations.monitorsToAddOrUpdate.push({
      action: 'update',
      monitor,
      remote: match,
      changes,
      contactRefs,
      reason: reasons.join('; '),
    });
  }
}
