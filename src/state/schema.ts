import { z } from 'zod';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Entries written before last_updated existed take their first_seen
 */
function fillLastUpdated(value: unknown): unknown {
  if (isRecord(value) && value.last_updated === undefined && typeof value.first_seen === 'string') {
    return { ...value, last_updated: value.first_seen };
  }
  return value;
}

const trackedTimestamps = {
  first_seen: z.string(),
  last_updated: z.string(),
};

const nullableText = z.string().nullable().default(null);

export const BillRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    bill_id: z.string(),
    title: z.string(),
    last_action: nullableText,
    last_action_date: nullableText,
    ...trackedTimestamps,
  })
);

export const FederalRegisterRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    document_number: z.string(),
    title: z.string(),
    doc_type: z.string(),
    publication_date: z.string(),
    ...trackedTimestamps,
  })
);

export const CommitteeItemRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    item_id: z.string(),
    title: z.string(),
    link: z.string(),
    published_date: z.string(),
    source_name: z.string(),
    ...trackedTimestamps,
  })
);

export const CommitteeMeetingRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    event_id: z.string(),
    committee_code: z.string(),
    meeting_type: z.string(),
    title: z.string(),
    date: z.string(),
    time: nullableText,
    ...trackedTimestamps,
  })
);

export const DisasterRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    disaster_number: z.number(),
    state: z.string(),
    designated_area: z.string(),
    declaration_title: z.string(),
    incident_type: z.string(),
    incident_end_date: nullableText,
    ...trackedTimestamps,
  })
);

export const WatchlistRecordSchema = z.preprocess(
  fillLastUpdated,
  z.object({
    bill_id: z.string(),
    title: z.string(),
    category: z.string(),
    last_action: nullableText,
    last_action_date: nullableText,
    ...trackedTimestamps,
  })
);

/**
 * Persisted snapshot document. Mappings missing from older files load as empty.
 */
export const SnapshotSchema = z.object({
  last_run: z.string().nullable().default(null),
  bills: z.record(BillRecordSchema).default({}),
  federal_register_documents: z.record(FederalRegisterRecordSchema).default({}),
  committee_items: z.record(CommitteeItemRecordSchema).default({}),
  committee_meetings: z.record(CommitteeMeetingRecordSchema).default({}),
  disaster_declarations: z.record(DisasterRecordSchema).default({}),
  watchlist_bills: z.record(WatchlistRecordSchema).default({}),
});
