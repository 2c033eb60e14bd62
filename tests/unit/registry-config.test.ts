/**
 * Unit Tests: UptimeConfig
 *
 * Tests declaration bookkeeping and full sync runs against the in-memory
 * provider.
 */

import { describe, it, expect } from 'vitest';
import { ApiError, ValidationError } from '../../src/errors.js';
import { Contact } from '../../src/model/contact.js';
import { UptimeConfig } from '../../src/registry/config.js';
import { FakeProvider, captureValidationError, quietLogger } from './helpers.js';

function newConfig(provider: FakeProvider, maxRemovals?: number): UptimeConfig {
  return new UptimeConfig({ api: provider, logger: quietLogger(), maxRemovals });
}

// =============================================================================
// Declarations
// =============================================================================

describe('contacts', () => {
  it('returns the registered contact for a repeated declaration', () => {
    const config = newConfig(new FakeProvider());

    const first = config.emailContact('ops@x.com', 'Ops');
    const second = config.emailContact('ops@x.com', 'Ops');

    expect(second).toBe(first);
    expect(config.desiredState().contacts).toEqual([first]);
  });

  it('names email contacts after their address by default', () => {
    const config = newConfig(new FakeProvider());

    expect(config.emailContact('ops@x.com').friendlyName).toBe('ops@x.com');
    expect(config.emailContact('oncall@x.com', '').friendlyName).toBe('oncall@x.com');
    expect(config.smsContact('+15550100').friendlyName).toBe('');
  });

  it('rejects one contact declared under two names', () => {
    const config = newConfig(new FakeProvider());
    config.emailContact('ops@x.com', 'Ops');

    const err = captureValidationError(() => config.emailContact('ops@x.com', 'Operations'));

    expect(err.code).toBe('CONTACT_CONFLICT');
    expect(err.message).toBe('Contact email:ops@x.com is declared as both "Ops" and "Operations"');
  });

  it('declares opaque contacts by type code', () => {
    const config = newConfig(new FakeProvider());

    expect(config.contact(11, '#ops', 'Slack').key).toBe('type-11:#ops');
    expect(config.contact('webhook', 'https://hooks.example.com/').key).toBe(
      'webhook:https://hooks.example.com/'
    );
  });
});

describe('monitors', () => {
  it('returns the registered monitor for an identical declaration', () => {
    const config = newConfig(new FakeProvider());

    const first = config.portMonitor('ssh', 'db.example.com', 22);
    const second = config.portMonitor('ssh', 'db.example.com', 22);

    expect(second).toBe(first);
    expect(config.desiredState().monitors).toHaveLength(1);
  });

  it('rejects two monitors with one name', () => {
    const config = newConfig(new FakeProvider());
    config.portMonitor('ssh', 'db.example.com', 22);

    const err = captureValidationError(() => config.portMonitor('ssh', 'db.example.com', 2222));

    expect(err.code).toBe('DUPLICATE_MONITOR');
    expect(err.issues[0].path).toBe('monitors.ssh');
  });

  it('registers contacts attached to monitors', () => {
    const config = newConfig(new FakeProvider());
    const ops = config.emailContact('ops@x.com');
    const monitor = config.keywordMonitor('site', 'https://example.com', 'Welcome');

    monitor.addContacts(
      Contact.create({ type: 2, value: 'ops@x.com', friendlyName: 'ops@x.com' }),
      Contact.create({ type: 1, value: '+15550100' })
    );

    expect(monitor.contacts[0].contact).toBe(ops);
    expect(config.desiredState().contacts.map((c) => c.key)).toEqual([
      'email:ops@x.com',
      'sms:+15550100',
    ]);
  });

  it('fills keyword monitor defaults', () => {
    const config = newConfig(new FakeProvider());

    const monitor = config.keywordMonitor('site', 'https://example.com', 'Welcome', { interval: 10 });

    expect(monitor.settings).toEqual({
      kind: 'keyword',
      url: 'https://example.com',
      keyword: 'Welcome',
      shouldExist: true,
      httpUsername: '',
      httpPassword: '',
    });
    expect(monitor.interval).toBe(10);
  });
});

// =============================================================================
// Sync
// =============================================================================

describe('sync', () => {
  it('creates the declaration in an empty account and then has nothing to do', async () => {
    const provider = new FakeProvider();
    const config = newConfig(provider);
    const ops = config.emailContact('ops@x.com', 'Ops');
    config.portMonitor('ssh', 'db.example.com', 22).addContactsWith({ threshold: 5, recurrence: 30 }, ops);

    const report = await config.sync();

    expect(report.success).toBe(true);
    expect(provider.contacts).toEqual([
      { id: '1000', type: 2, value: 'ops@x.com', friendlyName: 'Ops' },
    ]);
    expect(provider.monitors).toEqual([
      {
        id: '1001',
        friendlyName: 'ssh',
        settings: { kind: 'port', host: 'db.example.com', port: 22 },
        interval: 5,
        alertContacts: [{ id: '1000', threshold: 5, recurrence: 30 }],
      },
    ]);

    const { mutations } = await config.plan();
    expect(mutations).toEqual([]);
  });

  it('aborts before any mutation when the account cannot be read', async () => {
    const provider = new FakeProvider();
    provider.failListing = true;
    const config = newConfig(provider);
    config.emailContact('ops@x.com');

    await expect(config.sync()).rejects.toBeInstanceOf(ApiError);
    await expect(config.sync()).rejects.toMatchObject({
      code: 'FETCH_FAILED',
      message: 'Failed to fetch account state: connection reset',
    });
    expect(provider.mutatingCalls()).toEqual([]);
  });

  it('refuses a real sync that removes more than the limit', async () => {
    const provider = new FakeProvider();
    provider.seedContact({ type: 2, value: 'a@x.com', friendlyName: '' });
    provider.seedContact({ type: 2, value: 'b@x.com', friendlyName: '' });
    const config = newConfig(provider, 1);

    await expect(config.sync()).rejects.toMatchObject({ code: 'REMOVAL_LIMIT_EXCEEDED' });
    expect(provider.mutatingCalls()).toEqual([]);
  });

  it('warns about the removal limit in a dry run', async () => {
    const provider = new FakeProvider();
    provider.seedContact({ type: 2, value: 'a@x.com', friendlyName: '' });
    provider.seedContact({ type: 2, value: 'b@x.com', friendlyName: '' });
    const config = newConfig(provider, 1);

    const report = await config.sync({ dryRun: true });

    expect(report.warnings).toEqual([
      'Plan removes 2 contacts and monitors, more than the limit of 1',
    ]);
    expect(report.summary.planned).toBe(2);
  });

  it('rejects a sync while another is running', async () => {
    const config = newConfig(new FakeProvider());

    const running = config.sync();
    const err = await config.sync().catch((e: unknown) => e);
    await running;

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: 'SYNC_IN_PROGRESS' });
    await expect(config.sync()).resolves.toMatchObject({ success: true });
  });
});
