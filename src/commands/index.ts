/**
 * Command exports
 */

export { planCommand, type PlanData, type PlanOptions } from './plan.js';
export { syncCommand, type SyncCommandOptions } from './sync.js';
export { validationFailure } from './result.js';
