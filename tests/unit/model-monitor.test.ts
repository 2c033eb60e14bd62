/**
 * Unit Tests: Monitor entity
 *
 * Tests settings validation, contact assignment and field comparison.
 */

import { describe, it, expect } from 'vitest';
import { Contact } from '../../src/model/contact.js';
import {
  Monitor,
  compareMonitors,
  renderContactRefs,
  DEFAULT_INTERVAL_MINUTES,
} from '../../src/model/monitor.js';
import { captureValidationError, keywordSettings, portSettings } from './helpers.js';

describe('Monitor.create', () => {
  it('defaults the interval', () => {
    const monitor = Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 22) });

    expect(monitor.interval).toBe(DEFAULT_INTERVAL_MINUTES);
    expect(monitor.kind).toBe('port');
    expect(monitor.toString()).toBe('ssh [port h:22]');
  });

  it.each([0, 1441, 2.5])('rejects interval %s', (interval) => {
    const err = captureValidationError(() =>
      Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 22), interval })
    );

    expect(err.code).toBe('INVALID_INTERVAL');
    expect(err.issues[0].path).toBe('monitors.ssh.interval');
  });

  it('requires a name', () => {
    const err = captureValidationError(() =>
      Monitor.create({ friendlyName: ' ', settings: portSettings('h', 22) })
    );

    expect(err.code).toBe('MISSING_REQUIRED_FIELD');
  });

  it('requires keyword text for keyword monitors', () => {
    const err = captureValidationError(() =>
      Monitor.create({ friendlyName: 'site', settings: keywordSettings({ keyword: '' }) })
    );

    expect(err.code).toBe('MISSING_REQUIRED_FIELD');
    expect(err.issues[0].path).toBe('monitors.site.keyword');
  });

  it('requires an http(s) URL', () => {
    const err = captureValidationError(() =>
      Monitor.create({ friendlyName: 'site', settings: keywordSettings({ url: 'ftp://example.com' }) })
    );

    expect(err.code).toBe('INVALID_FIELD');
    expect(err.issues[0].message).toBe('URL must use http or https, got "ftp:"');
  });

  it('rejects out of range ports', () => {
    const err = captureValidationError(() =>
      Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 70000) })
    );

    expect(err.code).toBe('INVALID_FIELD');
    expect(err.issues[0].path).toBe('monitors.ssh.port');
  });
});

describe('contact assignment', () => {
  const ops = Contact.create({ type: 2, value: 'ops@x.com' });
  const alerts = Contact.create({ type: 2, value: 'alerts@x.com' });

  it('deduplicates contacts by identity and sorts references', () => {
    const monitor = Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 22) });
    monitor.addContacts(ops, alerts, Contact.create({ type: 2, value: 'ops@x.com' }));

    expect(monitor.contacts).toHaveLength(2);
    expect(monitor.contactRefs()).toEqual([
      { key: 'email:alerts@x.com', threshold: 0, recurrence: 0 },
      { key: 'email:ops@x.com', threshold: 0, recurrence: 0 },
    ]);
  });

  it('overwrites alert settings when a contact is added again', () => {
    const monitor = Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 22) });
    monitor.addContacts(ops).addContactsWith({ threshold: 5, recurrence: 30 }, ops);

    expect(monitor.contactRefs()).toEqual([{ key: 'email:ops@x.com', threshold: 5, recurrence: 30 }]);
  });

  it('rejects negative thresholds', () => {
    const monitor = Monitor.create({ friendlyName: 'ssh', settings: portSettings('h', 22) });
    const err = captureValidationError(() => monitor.addContactsWith({ threshold: -1 }, ops));

    expect(err.code).toBe('INVALID_FIELD');
    expect(err.issues[0].path).toBe('monitors.ssh.contacts.threshold');
  });

  it('canonicalizes contacts through registerContact', () => {
    const canonical = Contact.create({ type: 2, value: 'ops@x.com', friendlyName: 'Ops' });
    const monitor = Monitor.create(
      { friendlyName: 'ssh', settings: portSettings('h', 22) },
      { registerContact: () => canonical }
    );
    monitor.addContacts(ops);

    expect(monitor.contacts[0].contact).toBe(canonical);
  });

  it('renders references with their alert settings', () => {
    expect(
      renderContactRefs([
        { key: 'email:a@x.com', threshold: 0, recurrence: 0 },
        { key: 'sms:+100', threshold: 5, recurrence: 30 },
      ])
    ).toBe('email:a@x.com (0/0), sms:+100 (5/30)');
  });
});

describe('compareMonitors', () => {
  function remoteMonitor(settings: Parameters<typeof Monitor.restore>[0]['settings'], interval = 5) {
    return Monitor.restore({ friendlyName: 'm', settings, interval, remoteId: '1', contacts: [] });
  }

  it('returns no changes for equal monitors', () => {
    const desired = Monitor.create({ friendlyName: 'm', settings: portSettings('h', 22) });

    expect(compareMonitors(desired, remoteMonitor(portSettings('h', 22)))).toEqual([]);
    expect(desired.sameDeclaration(remoteMonitor(portSettings('h', 22)))).toBe(true);
  });

  it('lists changed settings and interval', () => {
    const desired = Monitor.create({ friendlyName: 'm', settings: portSettings('h', 22), interval: 10 });

    expect(compareMonitors(desired, remoteMonitor(portSettings('h', 21)))).toEqual([
      { field: 'port', oldValue: 21, newValue: 22 },
      { field: 'interval', oldValue: 5, newValue: 10 },
    ]);
  });

  it('redacts HTTP passwords', () => {
    const desired = Monitor.create({
      friendlyName: 'm',
      settings: keywordSettings({ httpUsername: 'probe', httpPassword: 'test-secret' }),
    });
    const remote = remoteMonitor(keywordSettings({ httpUsername: 'probe', httpPassword: '' }));

    expect(compareMonitors(desired, remote)).toEqual([
      { field: 'httpPassword', oldValue: '', newValue: '[REDACTED]' },
    ]);
  });

  it('compares contact assignments', () => {
    const desired = Monitor.create({ friendlyName: 'm', settings: portSettings('h', 22) });
    desired.addContacts(Contact.create({ type: 2, value: 'a@x.com' }));

    expect(compareMonitors(desired, remoteMonitor(portSettings('h', 22)))).toEqual([
      { field: 'contacts', oldValue: '', newValue: 'email:a@x.com (0/0)' },
    ]);
  });
});
