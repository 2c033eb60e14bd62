/**
 * Sync executor
 *
 * Turns an OperationSet into provider calls, in five stages:
 * 1. contact-additions: new contacts, then the new halves of replacements
 * 2. contact-removals: undeclared contacts
 * 3. monitor-upserts: creates, updates and recreates, with contact ids resolved
 * 4. monitor-removals: undeclared monitors
 * 5. replaced-contact-removals: old halves of replacements, once no monitor
 *    that referenced them is left unsettled
 *
 * A failed call is recorded and the run continues; mutations that depend on
 * it are reported as blocked. Dry-run logs the plan without calling the
 * provider.
 */

import { OperationError, errorMessage } from '../errors.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { AlertContactSpec, MonitorSpec, ProviderApi } from '../api/types.js';
import type { Contact } from '../model/contact.js';
import type { Monitor } from '../model/monitor.js';
import { describeMutation, formatChange } from './report.js';
import type {
  ExecuteOptions,
  ExecutionStage,
  Mutation,
  MonitorUpsertOperation,
  OperationSet,
  SyncReport,
} from './types.js';

// =============================================================================
// Planning
// =============================================================================

type Step =
  | { kind: 'create-contact'; mutation: Mutation; contact: Contact }
  | { kind: 'delete-contact'; mutation: Mutation; contact: Contact; replacedBy?: Contact }
  | { kind: 'upsert-monitor'; mutation: Mutation; operation: MonitorUpsertOperation }
  | { kind: 'delete-monitor'; mutation: Mutation; monitor: Monitor; recreate?: MonitorUpsertOperation };

function createContactStep(contact: Contact, reason: string): Step {
  return {
    kind: 'create-contact',
    contact,
    mutation: {
      id: `create-contact:${contact.key}`,
      stage: 'contact-additions',
      action: 'create',
      entity: 'contact',
      target: contact.key,
      reason,
    },
  };
}

function deleteContactStep(
  stage: ExecutionStage,
  contact: Contact,
  reason: string,
  replacedBy?: Contact
): Step {
  return {
    kind: 'delete-contact',
    contact,
    replacedBy,
    mutation: {
      id: `delete-contact:${contact.remoteId ?? contact.key}`,
      stage,
      action: 'delete',
      entity: 'contact',
      target: contact.key,
      remoteId: contact.remoteId,
      reason,
    },
  };
}

function deleteMonitorStep(
  stage: ExecutionStage,
  monitor: Monitor,
  reason: string,
  recreate?: MonitorUpsertOperation
): Step {
  return {
    kind: 'delete-monitor',
    monitor,
    recreate,
    mutation: {
      id: deleteMonitorId(monitor),
      stage,
      action: 'delete',
      entity: 'monitor',
      target: monitor.friendlyName,
      remoteId: monitor.remoteId,
      reason,
    },
  };
}

function deleteMonitorId(monitor: Monitor): string {
  return `delete-monitor:${monitor.remoteId ?? monitor.friendlyName}`;
}

function buildSteps(operations: OperationSet): Step[] {
  const steps: Step[] = [];

  for (const { contact } of operations.contactsToAdd) {
    steps.push(createContactStep(contact, 'not present in account'));
  }
  for (const { desired, remote } of operations.contactsToReplace) {
    steps.push(createContactStep(desired, `replaces contact named "${remote.friendlyName}"`));
  }

  for (const { contact } of operations.contactsToRemove) {
    steps.push(deleteContactStep('contact-removals', contact, 'not declared'));
  }

  for (const operation of operations.monitorsToAddOrUpdate) {
    const { monitor, remote } = operation;
    if (operation.action === 'recreate' && remote) {
      steps.push(deleteMonitorStep('monitor-upserts', remote, operation.reason, operation));
    }

    const action = operation.action === 'update' ? 'update' : 'create';
    steps.push({
      kind: 'upsert-monitor',
      operation,
      mutation: {
        id: `${action}-monitor:${monitor.friendlyName}`,
        stage: 'monitor-upserts',
        action,
        entity: 'monitor',
        target: monitor.friendlyName,
        remoteId: action === 'update' ? remote?.remoteId : undefined,
        changes: operation.changes,
        reason: operation.reason,
      },
    });
  }

  for (const { monitor } of operations.monitorsToRemove) {
    steps.push(deleteMonitorStep('monitor-removals', monitor, 'not declared'));
  }

  for (const { desired, remote } of operations.contactsToReplace) {
    steps.push(
      deleteContactStep(
        'replaced-contact-removals',
        remote,
        `replaced by contact named "${desired.friendlyName}"`,
        desired
      )
    );
  }

  return steps;
}

/**
 * Every mutation `execute` would attempt, in execution order
 */
export function planMutations(operations: OperationSet): Mutation[] {
  return buildSteps(operations).map((step) => step.mutation);
}

// =============================================================================
// Execution
// =============================================================================

function notCreatableMessage(contact: Contact): string {
  return `Contact ${contact.key} cannot be created through the API; add it in the Uptime Robot UI`;
}

function logMutation(log: ApiLogger, mutation: Mutation, dryRun: boolean): void {
  const prefix = dryRun ? '[dry-run] ' : '';
  log.info(`${prefix}${describeMutation(mutation)}: ${mutation.reason}`);
  for (const change of mutation.changes ?? []) {
    log.info(`${prefix}  ${formatChange(change)}`);
  }
}

/**
 * Attach remote ids to declared entities already present in the account
 */
function bindMatched(operations: OperationSet): void {
  for (const { desired, remote } of operations.matched.contacts) {
    if (remote.remoteId) desired.bindRemoteId(remote.remoteId);
  }
  for (const { desired, remote } of operations.matched.monitors) {
    if (remote.remoteId) desired.bindRemoteId(remote.remoteId);
  }
}

function summarize(report: SyncReport): SyncReport {
  const blocked = report.failures.filter((f) => f.error.code === 'DEPENDENCY_BLOCKED').length;
  report.summary = {
    planned: report.planned.length,
    created: report.created.length,
    updated: report.updated.length,
    deleted: report.deleted.length,
    failed: report.failures.length - blocked,
    blocked,
  };
  report.success = report.failures.length === 0;
  return report;
}

type Attempt<T> = { ok: true; value: T } | { ok: false };

/**
 * Apply an OperationSet to the account
 */
export async function execute(
  api: ProviderApi,
  operations: OperationSet,
  options: ExecuteOptions
): Promise<SyncReport> {
  const log = options.logger ?? defaultLogger;
  const steps = buildSteps(operations);
  const report: SyncReport = {
    dryRun: options.dryRun,
    planned: steps.map((step) => step.mutation),
    created: [],
    updated: [],
    deleted: [],
    failures: [],
    warnings: [...operations.warnings],
    summary: { planned: 0, created: 0, updated: 0, deleted: 0, failed: 0, blocked: 0 },
    success: true,
  };

  if (options.dryRun) {
    for (const step of steps) {
      logMutation(log, step.mutation, true);
      if (step.kind === 'create-contact' && !step.contact.creatable) {
        report.warnings.push(notCreatableMessage(step.contact));
      }
    }
    return summarize(report);
  }

  bindMatched(operations);

  // Contact identity key -> remote id usable in alert_contacts
  const contactIds = new Map<string, string>();
  for (const { desired, remote } of operations.matched.contacts) {
    if (remote.remoteId) contactIds.set(desired.key, remote.remoteId);
  }
  // Contact identity key -> id of the mutation that failed to create it
  const failedContacts = new Map<string, string>();
  const failedMutations = new Set<string>();
  // Remote monitors still pointing at their old contacts
  const unsettled: { monitor: Monitor; mutationId: string }[] = [];

  const fail = (mutation: Mutation, error: OperationError): void => {
    failedMutations.add(mutation.id);
    report.failures.push({ mutation, error });
    if (error.code === 'DEPENDENCY_BLOCKED') {
      log.warn(error.message, { blockedBy: error.blockedBy });
    } else {
      log.error(`Failed to ${describeMutation(mutation)}`, error);
    }
  };

  const block = (mutation: Mutation, blockedBy: string[], why: string): void => {
    fail(
      mutation,
      new OperationError(
        `Skipped ${describeMutation(mutation)}: ${why}`,
        'DEPENDENCY_BLOCKED',
        mutation.id,
        { blockedBy }
      )
    );
  };

  const attempt = async <T>(mutation: Mutation, call: () => Promise<T>): Promise<Attempt<T>> => {
    try {
      return { ok: true, value: await call() };
    } catch (err) {
      fail(
        mutation,
        new OperationError(errorMessage(err), 'PROVIDER_ERROR', mutation.id, { cause: err })
      );
      return { ok: false };
    }
  };

  const missingRemoteId = (mutation: Mutation): void => {
    fail(
      mutation,
      new OperationError(`${describeMutation(mutation)} has no remote id`, 'PROVIDER_ERROR', mutation.id)
    );
  };

  // ---------------------------------------------------------------------------

  const createContact = async (mutation: Mutation, contact: Contact): Promise<void> => {
    if (!contact.creatable) {
      failedContacts.set(contact.key, mutation.id);
      fail(mutation, new OperationError(notCreatableMessage(contact), 'NOT_CREATABLE', mutation.id));
      return;
    }

    const result = await attempt(mutation, () =>
      api.createContact({
        type: contact.type,
        value: contact.value,
        friendlyName: contact.friendlyName,
      })
    );
    if (!result.ok) {
      failedContacts.set(contact.key, mutation.id);
      return;
    }

    contact.bindRemoteId(result.value);
    contactIds.set(contact.key, result.value);
    report.created.push(mutation);
  };

  const deleteContact = async (
    mutation: Mutation,
    contact: Contact,
    replacedBy?: Contact
  ): Promise<void> => {
    if (replacedBy) {
      const blockers: string[] = [];
      const failedCreate = failedContacts.get(replacedBy.key);
      if (failedCreate) blockers.push(failedCreate);
      for (const entry of unsettled) {
        const references = entry.monitor.contacts.some(
          (assignment) => assignment.contact.remoteId === contact.remoteId
        );
        if (references) blockers.push(entry.mutationId);
      }
      if (blockers.length > 0) {
        block(mutation, blockers, 'its replacement or a monitor using it did not settle');
        return;
      }
    }

    const id = contact.remoteId;
    if (!id) {
      missingRemoteId(mutation);
      return;
    }
    const result = await attempt(mutation, () => api.deleteContact(id));
    if (result.ok) report.deleted.push(mutation);
  };

  const resolveContacts = (operation: MonitorUpsertOperation) => {
    const blockers: string[] = [];
    const undeclared: string[] = [];
    const alertContacts: AlertContactSpec[] = [];
    for (const ref of operation.contactRefs) {
      const failedCreate = failedContacts.get(ref.key);
      const id = contactIds.get(ref.key);
      if (failedCreate) {
        blockers.push(failedCreate);
      } else if (id === undefined) {
        undeclared.push(ref.key);
      } else {
        alertContacts.push({ id, threshold: ref.threshold, recurrence: ref.recurrence });
      }
    }
    return { blockers, undeclared, alertContacts };
  };

  const dependencyReason = (undeclared: string[]): string =>
    undeclared.length > 0
      ? `contacts not declared: ${undeclared.join(', ')}`
      : 'a mutation it depends on did not take effect';

  const deleteMonitor = async (
    mutation: Mutation,
    monitor: Monitor,
    recreate?: MonitorUpsertOperation
  ): Promise<void> => {
    if (recreate) {
      // Keep the live monitor when its replacement cannot be created
      const { blockers, undeclared } = resolveContacts(recreate);
      if (blockers.length > 0 || undeclared.length > 0) {
        block(mutation, blockers, dependencyReason(undeclared));
        unsettled.push({ monitor, mutationId: mutation.id });
        return;
      }
    }

    const id = monitor.remoteId;
    if (!id) {
      missingRemoteId(mutation);
      unsettled.push({ monitor, mutationId: mutation.id });
      return;
    }
    const result = await attempt(mutation, () => api.deleteMonitor(id));
    if (result.ok) {
      report.deleted.push(mutation);
    } else {
      unsettled.push({ monitor, mutationId: mutation.id });
    }
  };

  const upsertMonitor = async (
    mutation: Mutation,
    operation: MonitorUpsertOperation
  ): Promise<void> => {
    const { monitor, remote } = operation;
    const { blockers, undeclared, alertContacts } = resolveContacts(operation);

    if (operation.action === 'recreate' && remote) {
      const deletion = deleteMonitorId(remote);
      if (failedMutations.has(deletion)) blockers.push(deletion);
    }

    if (blockers.length > 0 || undeclared.length > 0) {
      block(mutation, blockers, dependencyReason(undeclared));
      if (operation.action === 'update' && remote) {
        unsettled.push({ monitor: remote, mutationId: mutation.id });
      }
      return;
    }

    const spec: MonitorSpec = {
      friendlyName: monitor.friendlyName,
      settings: monitor.settings,
      interval: monitor.interval,
      alertContacts,
    };

    if (operation.action !== 'update') {
      const result = await attempt(mutation, () => api.createMonitor(spec));
      if (result.ok) {
        monitor.bindRemoteId(result.value);
        report.created.push(mutation);
      }
      return;
    }

    const id = remote?.remoteId;
    if (!remote || !id) {
      missingRemoteId(mutation);
      return;
    }
    const result = await attempt(mutation, () => api.updateMonitor(id, spec));
    if (result.ok) {
      monitor.bindRemoteId(id);
      report.updated.push(mutation);
    } else {
      unsettled.push({ monitor: remote, mutationId: mutation.id });
    }
  };

  // ---------------------------------------------------------------------------

  for (const step of steps) {
    logMutation(log, step.mutation, false);
    switch (step.kind) {
      case 'create-contact':
        await createContact(step.mutation, step.contact);
        break;
      case 'delete-contact':
        await deleteContact(step.mutation, step.contact, step.replacedBy);
        break;
      case 'upsert-monitor':
        await upsertMonitor(step.mutation, step.operation);
        break;
      case 'delete-monitor':
        await deleteMonitor(step.mutation, step.monitor, step.recreate);
        break;
    }
  }

  return summarize(report);
}
