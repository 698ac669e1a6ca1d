/**
 * State Module
 *
 * Persistent snapshot of tracked entities and the change detector that
 * classifies each fetched entity as new, changed or unchanged.
 */

export * from './types.js';
export { SnapshotSchema } from './schema.js';
export {
  SnapshotStore,
  SnapshotWriteError,
  emptySnapshot,
  countEntities,
} from './snapshot-store.js';
export type { SnapshotStoreOptions } from './snapshot-store.js';
export {
  planChanges,
  applyChanges,
  detectAndRecord,
  groupUpdatesByKind,
  fingerprintChanged,
} from './change-detector.js';
export type { DetectOptions } from './change-detector.js';
export {
  billTracking,
  federalRegisterTracking,
  committeeItemTracking,
  committeeMeetingTracking,
  disasterTracking,
  watchlistTracking,
  disasterKey,
} from './trackers.js';
