/**
 * Tracker Module
 *
 * Runs the daily check across every source and wires the clients from config.
 */

export { runDailyCheck } from './daily-check.js';
export type { DailyCheckDeps, DailyCheckOptions } from './daily-check.js';
export { createTrackerClients } from './clients.js';
export type { TrackerClients } from './clients.js';
export { SOURCE_NAMES, isSourceName, emptyRunUpdates } from './types.js';
export type { SourceName, SourceError, RunUpdates, RunResult } from './types.js';
