import type { EntityKind, EntityUpdate } from '../state/index.js';
import type {
  BillInfo,
  CommitteeItem,
  CommitteeMeeting,
  DisasterDeclaration,
  FederalRegisterDocument,
  RegulatoryItem,
  WatchlistBill,
} from '../sources/types.js';
import type { ClosingCommentPeriod } from '../sources/federal-register.js';

/**
 * Sources polled by a daily check, in the order they run
 */
export const SOURCE_NAMES = ['bills', 'federal-register', 'committees', 'meetings', 'disasters', 'watchlist'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}

/**
 * A source that failed or returned nothing usable during a run
 */
export interface SourceError {
  source: SourceName;
  /** fetch: the adapter threw. adapter_contract: every record lacked an identity */
  kind: 'fetch' | 'adapter_contract';
  message: string;
}

/**
 * Updates found in one run, per entity kind
 */
export interface RunUpdates {
  bills: EntityUpdate<BillInfo>[];
  federalRegister: EntityUpdate<FederalRegisterDocument>[];
  committeeItems: EntityUpdate<CommitteeItem>[];
  committeeMeetings: EntityUpdate<CommitteeMeeting>[];
  disasters: EntityUpdate<DisasterDeclaration>[];
  watchlist: EntityUpdate<WatchlistBill>[];
}

export function emptyRunUpdates(): RunUpdates {
  return {
    bills: [],
    federalRegister: [],
    committeeItems: [],
    committeeMeetings: [],
    disasters: [],
    watchlist: [],
  };
}

export interface RunResult {
  /** Run timestamp (ISO-8601) */
  runAt: string;
  updates: RunUpdates;
  closingCommentPeriods: ClosingCommentPeriod[];
  regulatoryItems: RegulatoryItem[];
  /** Tracked entities per kind after the run */
  counts: Record<EntityKind, number>;
  sourceErrors: SourceError[];
  digest: string;
  digestPath: string | null;
  emailSent: boolean;
}
