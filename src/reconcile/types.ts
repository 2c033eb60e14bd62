/**
 * Types for contact and monitor reconciliation
 *
 * The differ produces an OperationSet from declared and remote state; the
 * executor turns it into ordered mutations and reports what happened.
 */

import type { OperationError } from '../errors.js';
import type { ApiLogger } from '../api/logger.js';
import type { Contact } from '../model/contact.js';
import type { ContactRef, FieldChange, Monitor } from '../model/monitor.js';

// =============================================================================
// State
// =============================================================================

/**
 * Everything a configuration declares. Read-only for the differ.
 */
export interface DesiredState {
  readonly contacts: readonly Contact[];
  readonly monitors: readonly Monitor[];
}

/**
 * Account state as reported by the provider at the start of a sync.
 * Every instance carries its remote id.
 */
export interface RemoteSnapshot {
  readonly contacts: readonly Contact[];
  readonly monitors: readonly Monitor[];
}

// =============================================================================
// Operations
// =============================================================================

export interface ContactAddOperation {
  contact: Contact;
}

/**
 * Contacts cannot be edited: a changed contact is created anew and the old
 * one deleted once no monitor needs it
 */
export interface ContactReplaceOperation {
  desired: Contact;
  remote: Contact;
}

export interface ContactRemoveOperation {
  contact: Contact;
}

export type MonitorUpsertAction = 'create' | 'update' | 'recreate';

export interface MonitorUpsertOperation {
  action: MonitorUpsertAction;
  monitor: Monitor;
  /** Remote monitor being updated or recreated */
  remote?: Monitor;
  changes: FieldChange[];
  /** Contacts to alert, resolved to remote ids by the executor */
  contactRefs: ContactRef[];
  reason: string;
}

export interface MonitorRemoveOperation {
  monitor: Monitor;
}

export interface ContactMatch {
  desired: Contact;
  remote: Contact;
}

export interface MonitorMatch {
  desired: Monitor;
  remote: Monitor;
}

/**
 * Result of diffing declared against remote state
 */
export interface OperationSet {
  contactsToAdd: ContactAddOperation[];
  contactsToReplace: ContactReplaceOperation[];
  contactsToRemove: ContactRemoveOperation[];
  monitorsToAddOrUpdate: MonitorUpsertOperation[];
  monitorsToRemove: MonitorRemoveOperation[];
  /** Entities already in their declared state */
  matched: {
    contacts: ContactMatch[];
    monitors: MonitorMatch[];
  };
  /** Non-blocking issues found while diffing */
  warnings: string[];
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Execution stages, in order
 */
export type ExecutionStage =
  | 'contact-additions'
  | 'contact-removals'
  | 'monitor-upserts'
  | 'monitor-removals'
  | 'replaced-contact-removals';

export const EXECUTION_STAGES: readonly ExecutionStage[] = [
  'contact-additions',
  'contact-removals',
  'monitor-upserts',
  'monitor-removals',
  'replaced-contact-removals',
];

export type MutationAction = 'create' | 'update' | 'delete';

/**
 * One intended provider call
 */
export interface Mutation {
  /** Unique within a plan, e.g. "create-contact:email:a@x.com" */
  id: string;
  stage: ExecutionStage;
  action: MutationAction;
  entity: 'contact' | 'monitor';
  /** Contact identity key or monitor name */
  target: string;
  remoteId?: string;
  changes?: FieldChange[];
  reason: string;
}

export interface OperationFailure {
  mutation: Mutation;
  error: OperationError;
}

export interface ExecuteOptions {
  /** If true, only report the plan without calling the provider */
  dryRun: boolean;
  /** Logger for mutation audit lines */
  logger?: ApiLogger;
}

/**
 * Outcome of executing an OperationSet
 */
export interface SyncReport {
  dryRun: boolean;
  /** Every intended mutation, in execution order */
  planned: Mutation[];
  created: Mutation[];
  updated: Mutation[];
  deleted: Mutation[];
  /** Failed and dependency-blocked mutations */
  failures: OperationFailure[];
  warnings: string[];
  summary: {
    planned: number;
    created: number;
    updated: number;
    deleted: number;
    failed: number;
    blocked: number;
  };
  /** True when no mutation failed or was blocked */
  success: boolean;
}
