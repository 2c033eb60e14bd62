/**
 * Declaration builder
 *
 * `UptimeConfig` accumulates the contacts and monitors an account should
 * have, then reconciles the account against them:
 *
 * ```ts
 * const config = new UptimeConfig({ api: createClient({ apiKey }) });
 * const ops = config.emailContact('ops@example.com', 'Ops');
 * config.portMonitor('ssh', 'db.example.com', 22).addContacts(ops);
 * const report = await config.sync({ dryRun: true });
 * ```
 *
 * Declarations are idempotent: declaring an identical contact or monitor
 * again returns the instance already registered.
 */

import { ValidationError } from '../errors.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { ProviderApi } from '../api/types.js';
import { CONTACT_TYPES, Contact, type ContactTypeName } from '../model/contact.js';
import { Monitor } from '../model/monitor.js';
import type { DeclarableSettings } from '../model/settings.js';
import { countRemovals, diff } from '../reconcile/diff.js';
import { execute, planMutations } from '../reconcile/executor.js';
import { fetchRemoteSnapshot } from '../reconcile/fetcher.js';
import type { DesiredState, Mutation, OperationSet, SyncReport } from '../reconcile/types.js';

// =============================================================================
// Types
// =============================================================================

export interface UptimeConfigOptions {
  /** Provider the configuration is synced against */
  api: ProviderApi;
  logger?: ApiLogger;
  /**
   * Refuse to sync when the plan deletes more than this many contacts and
   * monitors. Unlimited when unset.
   */
  maxRemovals?: number;
}

export interface MonitorOptions {
  /** Polling interval in minutes */
  interval?: number;
}

export interface HttpMonitorOptions extends MonitorOptions {
  httpUsername?: string;
  httpPassword?: string;
}

export interface KeywordMonitorOptions extends HttpMonitorOptions {
  /** Alert when the keyword is missing (default) rather than present */
  shouldExist?: boolean;
}

export interface SyncOptions {
  dryRun?: boolean;
}

/**
 * Result of diffing the declaration against the account
 */
export interface PlanResult {
  operations: OperationSet;
  mutations: Mutation[];
}

// =============================================================================
// UptimeConfig
// =============================================================================

export class UptimeConfig {
  private readonly api: ProviderApi;
  private readonly log: ApiLogger;
  private readonly maxRemovals?: number;
  private readonly contactsByKey = new Map<string, Contact>();
  private readonly monitorsByName = new Map<string, Monitor>();
  private syncing = false;

  constructor(options: UptimeConfigOptions) {
    this.api = options.api;
    this.log = options.logger ?? defaultLogger;
    this.maxRemovals = options.maxRemovals;
  }

  // ---------------------------------------------------------------------------
  // Contacts
  // ---------------------------------------------------------------------------

  /**
   * Declare a contact by type name or raw provider type code. Opaque codes
   * declare contacts that exist only in the provider UI.
   */
  contact(type: ContactTypeName | number, value: string, friendlyName = ''): Contact {
    const code = typeof type === 'number' ? type : CONTACT_TYPES[type];
    return this.registerContact(Contact.create({ type: code, value, friendlyName }));
  }

  emailContact(email: string, friendlyName?: string): Contact {
    return this.contact('email', email, friendlyName || email);
  }

  smsContact(phoneNumber: string, friendlyName = ''): Contact {
    return this.contact('sms', phoneNumber, friendlyName);
  }

  twitterDmContact(handle: string, friendlyName = ''): Contact {
    return this.contact('twitter-dm', handle, friendlyName);
  }

  boxcarContact(email: string, friendlyName = ''): Contact {
    return this.contact('boxcar', email, friendlyName);
  }

  webhookContact(url: string, friendlyName = ''): Contact {
    return this.contact('webhook', url, friendlyName);
  }

  pushbulletContact(token: string, friendlyName = ''): Contact {
    return this.contact('pushbullet', token, friendlyName);
  }

  pushoverContact(userKey: string, friendlyName = ''): Contact {
    return this.contact('pushover', userKey, friendlyName);
  }

  /**
   * Return the registered contact with the same identity, registering this
   * one if there is none
   */
  private readonly registerContact = (contact: Contact): Contact => {
    const existing = this.contactsByKey.get(contact.key);
    if (!existing) {
      this.contactsByKey.set(contact.key, contact);
      return contact;
    }
    if (existing.friendlyName !== contact.friendlyName) {
      throw ValidationError.single(
        'CONTACT_CONFLICT',
        `contacts.${contact.key}`,
        `Contact ${contact.key} is declared as both "${existing.friendlyName}" and "${contact.friendlyName}"`,
        ['Use one friendly name for each contact']
      );
    }
    return existing;
  };

  // ---------------------------------------------------------------------------
  // Monitors
  // ---------------------------------------------------------------------------

  keywordMonitor(
    name: string,
    url: string,
    keyword: string,
    options: KeywordMonitorOptions = {}
  ): Monitor {
    return this.declareMonitor(
      name,
      {
        kind: 'keyword',
        url,
        keyword,
        shouldExist: options.shouldExist ?? true,
        httpUsername: options.httpUsername ?? '',
        httpPassword: options.httpPassword ?? '',
      },
      options
    );
  }

  portMonitor(name: string, host: string, port: number, options: MonitorOptions = {}): Monitor {
    return this.declareMonitor(name, { kind: 'port', host, port }, options);
  }

  httpMonitor(name: string, url: string, options: HttpMonitorOptions = {}): Monitor {
    return this.declareMonitor(
      name,
      {
        kind: 'http',
        url,
        httpUsername: options.httpUsername ?? '',
        httpPassword: options.httpPassword ?? '',
      },
      options
    );
  }

  private declareMonitor(
    name: string,
    settings: DeclarableSettings,
    options: MonitorOptions
  ): Monitor {
    const monitor = Monitor.create(
      { friendlyName: name, settings, interval: options.interval },
      { registerContact: this.registerContact }
    );

    const existing = this.monitorsByName.get(name);
    if (!existing) {
      this.monitorsByName.set(name, monitor);
      return monitor;
    }
    if (!existing.sameDeclaration(monitor)) {
      throw ValidationError.single(
        'DUPLICATE_MONITOR',
        `monitors.${name}`,
        `Monitor "${name}" is already declared with different settings`,
        ['Monitor names must be unique; rename one of the monitors']
      );
    }
    return existing;
  }

  // ---------------------------------------------------------------------------
  // Sync
  // ---------------------------------------------------------------------------

  desiredState(): DesiredState {
    return {
      contacts: [...this.contactsByKey.values()],
      monitors: [...this.monitorsByName.values()],
    };
  }

  /**
   * Fetch the account and compute the operations a sync would perform
   */
  async plan(): Promise<PlanResult> {
    this.log.debug('Fetching account state');
    const remote = await fetchRemoteSnapshot(this.api);
    const operations = diff(this.desiredState(), remote);
    return { operations, mutations: planMutations(operations) };
  }

  /**
   * Reconcile the account with the declaration. Fetch failures and
   * declaration problems throw; failed mutations are collected in the report.
   */
  async sync(options: SyncOptions = {}): Promise<SyncReport> {
    if (this.syncing) {
      throw ValidationError.single(
        'SYNC_IN_PROGRESS',
        'sync',
        'A sync of this configuration is already running'
      );
    }

    this.syncing = true;
    try {
      const dryRun = options.dryRun ?? false;
      const { operations } = await this.plan();

      const removals = countRemovals(operations);
      if (this.maxRemovals !== undefined && removals > this.maxRemovals) {
        const message = `Plan removes ${removals} contacts and monitors, more than the limit of ${this.maxRemovals}`;
        if (!dryRun) {
          throw ValidationError.single('REMOVAL_LIMIT_EXCEEDED', 'sync', message, [
            'Review the plan with a dry run, then raise the removal limit',
          ]);
        }
        operations.warnings.push(message);
      }

      return await execute(this.api, operations, { dryRun, logger: this.log });
    } finally {
      this.syncing = false;
    }
  }
}
