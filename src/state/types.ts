/**
 * Types for the snapshot store and change detection
 */

import type { z } from 'zod';
import type {
  SnapshotSchema,
  BillRecordSchema,
  FederalRegisterRecordSchema,
  CommitteeItemRecordSchema,
  CommitteeMeetingRecordSchema,
  DisasterRecordSchema,
  WatchlistRecordSchema,
} from './schema.js';

/**
 * Complete persisted state: one mapping per entity kind plus the last run time
 */
export type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * Entity kinds, named by their mapping in the snapshot document
 */
export type EntityKind = Exclude<keyof Snapshot, 'last_run'>;

export const ENTITY_KINDS: readonly EntityKind[] = [
  'bills',
  'federal_register_documents',
  'committee_items',
  'committee_meetings',
  'disaster_declarations',
  'watchlist_bills',
];

/**
 * Timestamps every tracked entry carries.
 * first_seen never changes; last_updated only moves forward.
 */
export interface TrackedTimestamps {
  first_seen: string;
  last_updated: string;
}

/**
 * A tracked entry: the persisted summary plus its timestamps
 */
export type TrackedEntity<TSummary> = TSummary & TrackedTimestamps;

type SummaryOf<TSchema extends z.ZodTypeAny> = Omit<z.infer<TSchema>, keyof TrackedTimestamps>;

export type BillSummary = SummaryOf<typeof BillRecordSchema>;
export type FederalRegisterSummary = SummaryOf<typeof FederalRegisterRecordSchema>;
export type CommitteeItemSummary = SummaryOf<typeof CommitteeItemRecordSchema>;
export type CommitteeMeetingSummary = SummaryOf<typeof CommitteeMeetingRecordSchema>;
export type DisasterSummary = SummaryOf<typeof DisasterRecordSchema>;
export type WatchlistSummary = SummaryOf<typeof WatchlistRecordSchema>;

/**
 * Mapping from identity key to tracked entry for one entity kind
 */
export type TrackedMapping<TSummary> = Record<string, TrackedEntity<TSummary>>;

/**
 * The pair of fields compared to decide whether an entity changed.
 * Typically the latest action text and its date.
 */
export interface Fingerprint {
  primary: string | null;
  secondary: string | null;
}

export type UpdateKind = 'new' | 'status_change';

/**
 * An entity seen for the first time this run
 */
export interface NewEntityUpdate<TEntity> {
  kind: 'new';
  key: string;
  entity: TEntity;
}

/**
 * An entity whose fingerprint differs from the stored one
 */
export interface StatusChangeUpdate<TEntity> {
  kind: 'status_change';
  key: string;
  entity: TEntity;
  /** Fingerprint stored before this run, for display */
  previous: Fingerprint;
}

export type EntityUpdate<TEntity> = NewEntityUpdate<TEntity> | StatusChangeUpdate<TEntity>;

/**
 * Capability contract that lets one detector serve every entity kind
 */
export interface TrackingSpec<TEntity, TSummary> {
  kind: EntityKind;
  /** Human-readable name used in logs and the digest */
  label: string;
  /** Stable key; undefined or empty when the record has none */
  identity(entity: TEntity): string | undefined;
  fingerprint(entity: TEntity): Fingerprint;
  storedFingerprint(summary: TSummary): Fingerprint;
  summarize(entity: TEntity): TSummary;
}

/**
 * Writes computed by planChanges, applied by applyChanges
 */
export interface ChangePlan<TEntity, TSummary> {
  updates: EntityUpdate<TEntity>[];
  /** Keys to insert or overwrite, in input order */
  writes: Array<{ key: string; record: TrackedEntity<TSummary> }>;
  /** Records skipped for lacking an identity key */
  skipped: number;
}

/**
 * Result of detectAndRecord for one entity kind
 */
export interface DetectionResult<TEntity> {
  updates: EntityUpdate<TEntity>[];
  skipped: number;
}

/**
 * Updates split by kind, each list keeping input order
 */
export interface GroupedUpdates<TEntity> {
  new: NewEntityUpdate<TEntity>[];
  status_change: StatusChangeUpdate<TEntity>[];
}
