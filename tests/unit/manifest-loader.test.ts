/**
 * Unit Tests: Declaration loader
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ValidationError } from '../../src/errors.js';
import { applyDeclaration, loadDeclaration, parseDeclaration } from '../../src/manifest/loader.js';
import { UptimeConfig } from '../../src/registry/config.js';
import { FakeProvider, quietLogger } from './helpers.js';

// =============================================================================
// Fixtures
// =============================================================================

const DECLARATION = `
contacts:
  - id: ops
    type: email
    value: ops@example.com
    name: Ops team
  - id: oncall
    type: email
    value: oncall@example.com
  - id: slack
    type: 11
    value: '#ops'
monitors:
  - name: Homepage
    type: keyword
    url: https://example.com
    keyword: Welcome
    contacts:
      - ops
      - { contact: slack, threshold: 5, recurrence: 30 }
  - name: ssh
    type: port
    host: db.example.com
    port: 22
    interval: 10
`;

function newConfig(): UptimeConfig {
  return new UptimeConfig({ api: new FakeProvider(), logger: quietLogger() });
}

function declarationError(data: unknown): ValidationError {
  try {
    applyDeclaration(newConfig(), data, 'decl.yaml');
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

const tempDirs: string[] = [];

function tempFile(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'uptime-sync-decl-'));
  tempDirs.push(dir);
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

// =============================================================================
// Declarations
// =============================================================================

describe('applyDeclaration', () => {
  it('declares contacts and monitors', () => {
    const config = newConfig();

    applyDeclaration(config, parseDeclaration(DECLARATION, 'decl.yaml'));

    const { contacts, monitors } = config.desiredState();
    expect(contacts.map((c) => [c.key, c.friendlyName])).toEqual([
      ['email:ops@example.com', 'Ops team'],
      ['email:oncall@example.com', 'oncall@example.com'],
      ['type-11:#ops', ''],
    ]);
    expect(monitors.map((m) => m.friendlyName)).toEqual(['Homepage', 'ssh']);
    expect(monitors[0].contactRefs()).toEqual([
      { key: 'email:ops@example.com', threshold: 0, recurrence: 0 },
      { key: 'type-11:#ops', threshold: 5, recurrence: 30 },
    ]);
    expect(monitors[1].settings).toEqual({ kind: 'port', host: 'db.example.com', port: 22 });
    expect(monitors[1].interval).toBe(10);
  });

  it('declares nothing for an empty file', () => {
    const config = newConfig();

    applyDeclaration(config, parseDeclaration('', 'empty.yaml'));

    expect(config.desiredState()).toEqual({ contacts: [], monitors: [] });
  });

  it('collects every problem in the file', () => {
    const err = declarationError({
      extra: true,
      contacts: [
        { id: 'a', type: 'email', value: 'a@x.com' },
        { id: 'a', type: 'email', value: 'b@x.com' },
        { id: 'c', type: 'fax', value: 'x' },
      ],
      monitors: [
        { name: 'm', type: 'ping' },
        { name: 'site', type: 'keyword', url: 'https://example.com', keyword: 'W', contacts: ['ghost'] },
      ],
    });

    expect(err.code).toBe('INVALID_DECLARATION');
    expect(err.message).toBe('decl.yaml has 5 problem(s)');
    expect(err.issues.map((issue) => [issue.path, issue.message])).toEqual([
      ['extra', 'Unknown top-level key "extra"'],
      ['contacts[1].id', 'Contact id "a" is used more than once'],
      ['contacts[2].type', 'Unknown contact type "fax"; use a type name or a numeric provider code'],
      ['monitors[0].type', 'Monitor type must be one of keyword, port, http, got "ping"'],
      ['monitors[1].contacts[0]', 'Unknown contact id "ghost"'],
    ]);
  });

  it('reports missing monitor fields', () => {
    const err = declarationError({ monitors: [{ name: 'ssh', type: 'port' }] });

    expect(err.issues.map((issue) => [issue.path, issue.message])).toEqual([
      ['monitors[0].host', '"host" is required'],
      ['monitors[0].port', '"port" is required'],
    ]);
  });

  it('keeps builder validation issues', () => {
    const err = declarationError({
      monitors: [{ name: 'ssh', type: 'port', host: 'db.example.com', port: 70000 }],
    });

    expect(err.code).toBe('INVALID_DECLARATION');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatchObject({ code: 'INVALID_FIELD', path: 'monitors.ssh.port' });
  });

  it('rejects a declaration that is not a mapping', () => {
    const err = declarationError(['ops@example.com']);

    expect(err.issues).toEqual([
      {
        code: 'INVALID_DECLARATION',
        path: '',
        message: 'Declaration must be a mapping with "contacts" and "monitors"',
      },
    ]);
  });
});

// =============================================================================
// Files
// =============================================================================

describe('files', () => {
  it('parses JSON by extension', () => {
    expect(parseDeclaration('{"contacts": []}', 'decl.json')).toEqual({ contacts: [] });
    expect(() => parseDeclaration('{', 'decl.json')).toThrow(/^Failed to parse decl\.json: /);
  });

  it('loads a declaration file', async () => {
    const config = newConfig();

    await loadDeclaration(config, tempFile('uptime.yaml', DECLARATION));

    expect(config.desiredState().monitors).toHaveLength(2);
  });

  it('reports unreadable files as declaration errors', async () => {
    const missing = path.join(os.tmpdir(), 'uptime-sync-missing', 'nope.yaml');

    await expect(loadDeclaration(newConfig(), missing)).rejects.toMatchObject({
      code: 'INVALID_DECLARATION',
      issues: [{ path: missing }],
    });
  });
});
