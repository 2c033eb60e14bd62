/**
 * Remote state fetcher
 *
 * Reads every contact and monitor from the provider and rebuilds them as
 * entity model instances. A failure aborts the sync: diffing against a
 * partial snapshot could delete live monitors.
 */

import { ApiError, errorMessage } from '../errors.js';
import type { ContactRecord, MonitorRecord, ProviderApi } from '../api/types.js';
import { Contact } from '../model/contact.js';
import { Monitor } from '../model/monitor.js';
import type { RemoteSnapshot } from './types.js';

export async function fetchRemoteSnapshot(api: ProviderApi): Promise<RemoteSnapshot> {
  let contactRecords: ContactRecord[];
  let monitorRecords: MonitorRecord[];
  try {
    contactRecords = await api.listContacts();
    monitorRecords = await api.listMonitors();
  } catch (err) {
    throw new ApiError(`Failed to fetch account state: ${errorMessage(err)}`, {
      code: 'FETCH_FAILED',
      cause: err,
    });
  }

  const contactsById = new Map<string, Contact>();
  const contacts = contactRecords.map((record) => {
    const contact = Contact.restore({
      type: record.type,
      value: record.value,
      friendlyName: record.friendlyName,
      remoteId: record.id,
    });
    contactsById.set(record.id, contact);
    return contact;
  });

  const monitors = monitorRecords.map((record) =>
    Monitor.restore({
      friendlyName: record.friendlyName,
      settings: record.settings,
      interval: record.interval,
      remoteId: record.id,
      contacts: record.alertContacts.map((alert) => ({
        contact: contactsById.get(alert.id) ?? Contact.unresolved(alert.id),
        threshold: alert.threshold,
        recurrence: alert.recurrence,
      })),
    })
  );

  return { contacts, monitors };
}
