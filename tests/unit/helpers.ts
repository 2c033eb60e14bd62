/**
 * Test helpers: an in-memory provider and fixture factories
 */

import type {
  ContactRecord,
  ContactSpec,
  MonitorRecord,
  MonitorSpec,
  ProviderApi,
} from '../../src/api/types.js';
import { createLogger } from '../../src/api/logger.js';
import { ValidationError } from '../../src/errors.js';
import type { KeywordSettings, PortSettings } from '../../src/model/settings.js';

// =============================================================================
// Fake Provider
// =============================================================================

export type ProviderMethod = keyof ProviderApi;
export type MutatingMethod = Exclude<ProviderMethod, 'listContacts' | 'listMonitors'>;

export interface ProviderCall {
  method: ProviderMethod;
  /** Contact value, monitor name or remote id the call acts on */
  target?: string;
}

/**
 * In-memory stand-in for the Uptime Robot account. Records every call and
 * can be told to fail specific ones.
 */
export class FakeProvider implements ProviderApi {
  contacts: ContactRecord[] = [];
  monitors: MonitorRecord[] = [];
  readonly calls: ProviderCall[] = [];
  failListing = false;
  private nextId = 1000;
  private readonly failures = new Set<string>();

  /**
   * Make calls to `method` on `target` fail. Targets are the contact value
   * for createContact, the monitor name for createMonitor and the remote id
   * otherwise.
   */
  failOn(method: MutatingMethod, target: string): this {
    this.failures.add(`${method}:${target}`);
    return this;
  }

  seedContact(spec: ContactSpec): string {
    const id = String(this.nextId++);
    this.contacts.push({ id, ...spec });
    return id;
  }

  seedMonitor(spec: MonitorSpec): string {
    const id = String(this.nextId++);
    this.monitors.push({ id, ...spec });
    return id;
  }

  mutatingCalls(): ProviderCall[] {
    return this.calls.filter((call) => call.method !== 'listContacts' && call.method !== 'listMonitors');
  }

  private record(method: ProviderMethod, target?: string): void {
    this.calls.push({ method, target });
    if (target !== undefined && this.failures.has(`${method}:${target}`)) {
      throw new Error(`${method} rejected for ${target}`);
    }
  }

  async listContacts(): Promise<ContactRecord[]> {
    this.record('listContacts');
    if (this.failListing) throw new Error('connection reset');
    return this.contacts.map((contact) => ({ ...contact }));
  }

  async listMonitors(): Promise<MonitorRecord[]> {
    this.record('listMonitors');
    if (this.failListing) throw new Error('connection reset');
    return structuredClone(this.monitors);
  }

  async createContact(spec: ContactSpec): Promise<string> {
    this.record('createContact', spec.value);
    return this.seedContact(spec);
  }

  async deleteContact(id: string): Promise<void> {
    this.record('deleteContact', id);
    if (!this.contacts.some((contact) => contact.id === id)) {
      throw new Error(`alert contact ${id} not found`);
    }
    this.contacts = this.contacts.filter((contact) => contact.id !== id);
    for (const monitor of this.monitors) {
      monitor.alertContacts = monitor.alertContacts.filter((alert) => alert.id !== id);
    }
  }

  async createMonitor(spec: MonitorSpec): Promise<string> {
    this.record('createMonitor', spec.friendlyName);
    return this.seedMonitor(structuredClone(spec));
  }

  async updateMonitor(id: string, spec: MonitorSpec): Promise<void> {
    this.record('updateMonitor', id);
    const index = this.monitors.findIndex((monitor) => monitor.id === id);
    if (index === -1) throw new Error(`monitor ${id} not found`);
    this.monitors[index] = { id, ...structuredClone(spec) };
  }

  async deleteMonitor(id: string): Promise<void> {
    this.record('deleteMonitor', id);
    if (!this.monitors.some((monitor) => monitor.id === id)) {
      throw new Error(`monitor ${id} not found`);
    }
    this.monitors = this.monitors.filter((monitor) => monitor.id !== id);
  }
}

// =============================================================================
// Fixtures
// =============================================================================

export function keywordSettings(overrides: Partial<KeywordSettings> = {}): KeywordSettings {
  return {
    kind: 'keyword',
    url: 'https://example.com',
    keyword: 'Welcome',
    shouldExist: true,
    httpUsername: '',
    httpPassword: '',
    ...overrides,
  };
}

export function portSettings(host: string, port: number): PortSettings {
  return { kind: 'port', host, port };
}

/**
 * Logger that swallows output below error level
 */
export function quietLogger() {
  return createLogger({ level: 'error' });
}

/**
 * Run `fn` and return the ValidationError it throws
 */
export function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}
