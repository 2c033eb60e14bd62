/**
 * Unit Tests: Contact entity
 *
 * Tests identity keys, type labels and construction-time validation.
 */

import { describe, it, expect } from 'vitest';
import {
  Contact,
  CONTACT_TYPES,
  contactKey,
  contactTypeLabel,
  isContactTypeName,
  isCreatableType,
} from '../../src/model/contact.js';
import { captureValidationError as captureError } from './helpers.js';

describe('contact types', () => {
  it('labels named types by name', () => {
    expect(contactTypeLabel(CONTACT_TYPES.email)).toBe('email');
    expect(contactTypeLabel(3)).toBe('twitter-dm');
    expect(contactTypeLabel(9)).toBe('pushover');
  });

  it('labels opaque codes by number', () => {
    expect(contactTypeLabel(11)).toBe('type-11');
    expect(contactTypeLabel(0)).toBe('unresolved');
  });

  it('only named types are creatable', () => {
    expect(isCreatableType(5)).toBe(true);
    expect(isCreatableType(11)).toBe(false);
  });

  it('recognizes type names', () => {
    expect(isContactTypeName('webhook')).toBe(true);
    expect(isContactTypeName('slack')).toBe(false);
    expect(isContactTypeName('toString')).toBe(false);
  });

  it('builds identity keys from type and value', () => {
    expect(contactKey(2, 'a@x.com')).toBe('email:a@x.com');
    expect(contactKey(11, '#ops')).toBe('type-11:#ops');
  });
});

describe('Contact.create', () => {
  it('creates an email contact without a remote id', () => {
    const contact = Contact.create({ type: 2, value: 'a@x.com' });

    expect(contact.key).toBe('email:a@x.com');
    expect(contact.friendlyName).toBe('');
    expect(contact.remoteId).toBeUndefined();
    expect(contact.creatable).toBe(true);
  });

  it('accepts opaque type codes', () => {
    const contact = Contact.create({ type: 11, value: '#ops', friendlyName: 'Slack' });

    expect(contact.key).toBe('type-11:#ops');
    expect(contact.creatable).toBe(false);
  });

  it('rejects malformed email addresses', () => {
    const err = captureError(() => Contact.create({ type: 2, value: 'not-an-email' }));

    expect(err.code).toBe('INVALID_FIELD');
    expect(err.issues[0].path).toBe('contacts.not-an-email.value');
  });

  it('rejects an empty value', () => {
    const err = captureError(() => Contact.create({ type: 1, value: '  ' }));

    expect(err.code).toBe('MISSING_REQUIRED_FIELD');
  });

  it('rejects non-positive type codes', () => {
    const err = captureError(() => Contact.create({ type: 0, value: 'x' }));

    expect(err.code).toBe('INVALID_FIELD');
    expect(err.issues[0].path).toBe('contacts.x.type');
  });
});

describe('remote contacts', () => {
  it('restores without validation and keeps the remote id', () => {
    const contact = Contact.restore({ type: 2, value: 'legacy', friendlyName: '', remoteId: '42' });

    expect(contact.key).toBe('email:legacy');
    expect(contact.remoteId).toBe('42');
  });

  it('represents unknown alert contact ids as unresolved', () => {
    const contact = Contact.unresolved('77');

    expect(contact.key).toBe('unresolved:#77');
    expect(contact.remoteId).toBe('77');
    expect(contact.creatable).toBe(false);
  });
});

describe('identity', () => {
  it('ignores friendly name and remote id', () => {
    const declared = Contact.create({ type: 2, value: 'a@x.com', friendlyName: 'New' });
    const remote = Contact.restore({ type: 2, value: 'a@x.com', friendlyName: 'Old', remoteId: '1' });

    expect(declared.sameIdentity(remote)).toBe(true);
    expect(declared.sameIdentity(Contact.create({ type: 1, value: 'a@x.com' }))).toBe(false);
  });

  it('binds a remote id', () => {
    const contact = Contact.create({ type: 5, value: 'https://hooks.example.com/' });
    contact.bindRemoteId('900');

    expect(contact.remoteId).toBe('900');
  });

  it('renders with its friendly name', () => {
    expect(Contact.create({ type: 2, value: 'a@x.com', friendlyName: 'Ops' }).toString()).toBe(
      'email:a@x.com (Ops)'
    );
    expect(Contact.create({ type: 2, value: 'a@x.com' }).toString()).toBe('email:a@x.com');
  });
});
