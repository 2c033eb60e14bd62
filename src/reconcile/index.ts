/**
 * Reconciliation module - sync between a declaration and the account
 *
 * @module reconcile
 */

export { fetchRemoteSnapshot } from './fetcher.js';
export { countRemovals, diff, emptyOperationSet, hasChanges } from './diff.js';
export { execute, planMutations } from './executor.js';
export { describeMutation, formatChange, formatReport, formatValue } from './report.js';
export { EXECUTION_STAGES } from './types.js';
export type {
  ContactAddOperation,
  ContactMatch,
  ContactRemoveOperation,
  ContactReplaceOperation,
  DesiredState,
  ExecuteOptions,
  ExecutionStage,
  MonitorMatch,
  MonitorRemoveOperation,
  MonitorUpsertAction,
  MonitorUpsertOperation,
  Mutation,
  MutationAction,
  OperationFailure,
  OperationSet,
  RemoteSnapshot,
  SyncReport,
} from './types.js';
