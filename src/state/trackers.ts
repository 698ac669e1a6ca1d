/**
 * Tracking specs: how each entity kind is keyed, fingerprinted and summarized
 */

import type {
  BillInfo,
  CommitteeItem,
  CommitteeMeeting,
  DisasterDeclaration,
  FederalRegisterDocument,
  WatchlistBill,
} from '../sources/types.js';
import type {
  BillSummary,
  CommitteeItemSummary,
  CommitteeMeetingSummary,
  DisasterSummary,
  FederalRegisterSummary,
  TrackingSpec,
  WatchlistSummary,
} from './types.js';

/**
 * Trim an identity value; blank values count as missing
 */
function key(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export const billTracking: TrackingSpec<BillInfo, BillSummary> = {
  kind: 'bills',
  label: 'Bills',
  identity: (bill) => key(bill.billId),
  fingerprint: (bill) => ({ primary: bill.latestAction, secondary: bill.latestActionDate }),
  storedFingerprint: (summary) => ({ primary: summary.last_action, secondary: summary.last_action_date }),
  summarize: (bill) => ({
    bill_id: bill.billId,
    title: bill.title,
    last_action: bill.latestAction,
    last_action_date: bill.latestActionDate,
  }),
};

export const federalRegisterTracking: TrackingSpec<FederalRegisterDocument, FederalRegisterSummary> = {
  kind: 'federal_register_documents',
  label: 'Federal Register documents',
  identity: (doc) => key(doc.documentNumber),
  fingerprint: (doc) => ({ primary: doc.docType, secondary: doc.publicationDate }),
  storedFingerprint: (summary) => ({ primary: summary.doc_type, secondary: summary.publication_date }),
  summarize: (doc) => ({
    document_number: doc.documentNumber,
    title: doc.title,
    doc_type: doc.docType,
    publication_date: doc.publicationDate,
  }),
};

export const committeeItemTracking: TrackingSpec<CommitteeItem, CommitteeItemSummary> = {
  kind: 'committee_items',
  label: 'Committee feed items',
  identity: (item) => key(item.itemId),
  fingerprint: (item) => ({ primary: item.title, secondary: item.publishedDate }),
  storedFingerprint: (summary) => ({ primary: summary.title, secondary: summary.published_date }),
  summarize: (item) => ({
    item_id: item.itemId,
    title: item.title,
    link: item.link,
    published_date: item.publishedDate,
    source_name: item.sourceName,
  }),
};

function meetingWhen(date: string, time: string | null): string {
  return time ? `${date} ${time}` : date;
}

export const committeeMeetingTracking: TrackingSpec<CommitteeMeeting, CommitteeMeetingSummary> = {
  kind: 'committee_meetings',
  label: 'Committee meetings',
  identity: (meeting) => key(meeting.eventId),
  fingerprint: (meeting) => ({ primary: meeting.title, secondary: meetingWhen(meeting.date, meeting.time) }),
  storedFingerprint: (summary) => ({ primary: summary.title, secondary: meetingWhen(summary.date, summary.time) }),
  summarize: (meeting) => ({
    event_id: meeting.eventId,
    committee_code: meeting.committeeCode,
    meeting_type: meeting.meetingType,
    title: meeting.title,
    date: meeting.date,
    time: meeting.time,
  }),
};

/**
 * Composite key: one declaration covers many designated areas
 */
export function disasterKey(declaration: Pick<DisasterDeclaration, 'disasterNumber' | 'state' | 'designatedArea'>): string | undefined {
  if (!declaration.disasterNumber) {
    return undefined;
  }
  return `${declaration.disasterNumber}-${declaration.state}-${declaration.designatedArea}`;
}

export const disasterTracking: TrackingSpec<DisasterDeclaration, DisasterSummary> = {
  kind: 'disaster_declarations',
  label: 'Disaster declarations',
  identity: disasterKey,
  fingerprint: (declaration) => ({ primary: declaration.incidentType, secondary: declaration.incidentEndDate }),
  storedFingerprint: (summary) => ({ primary: summary.incident_type, secondary: summary.incident_end_date }),
  summarize: (declaration) => ({
    disaster_number: declaration.disasterNumber,
    state: declaration.state,
    designated_area: declaration.designatedArea,
    declaration_title: declaration.declarationTitle,
    incident_type: declaration.incidentType,
    incident_end_date: declaration.incidentEndDate,
  }),
};

export const watchlistTracking: TrackingSpec<WatchlistBill, WatchlistSummary> = {
  kind: 'watchlist_bills',
  label: 'Watchlist bills',
  identity: (bill) => key(bill.billId),
  fingerprint: (bill) => ({ primary: bill.latestAction, secondary: bill.latestActionDate }),
  storedFingerprint: (summary) => ({ primary: summary.last_action, secondary: summary.last_action_date }),
  summarize: (bill) => ({
    bill_id: bill.billId,
    title: bill.officialTitle ?? bill.title,
    category: bill.category,
    last_action: bill.latestAction,
    last_action_date: bill.latestActionDate,
  }),
};
