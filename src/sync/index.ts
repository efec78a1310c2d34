export { SyncRunner } from './sync-runner.js';
export type { TypedSyncRunnerEmitter } from './sync-runner.js';
export { planSync } from './plan.js';
export type { PlanContext } from './plan.js';
export { buildSyncConfig, validateSyncConfig, DEFAULT_SYNC_CONFIG } from './config.js';
export type { SyncConfig } from './config.js';
export type { Selection, SyncJob, RunReport, RunOptions, SyncRunnerEvents } from './types.js';
