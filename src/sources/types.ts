/**
 * Entity records produced by the source adapters
 */

import type { Priority } from '../types/index.js';

/**
 * A bill from the Congress.gov bill listing
 */
export interface BillInfo {
  /** e.g. "119-hr-1234" */
  billId: string;
  billType: string;
  billNumber: number;
  congress: number;
  title: string;
  introducedDate: string;
  latestAction: string | null;
  latestActionDate: string | null;
  sponsor: string | null;
  sponsorParty: string | null;
  sponsorState: string | null;
  committees: string[];
  policyArea: string | null;
  url: string;
  priority: Priority;
}

/**
 * A Federal Register document (rule, proposed rule, notice)
 */
export interface FederalRegisterDocument {
  documentNumber: string;
  title: string;
  /** "Rule", "Proposed Rule", "Notice", ... */
  docType: string;
  abstract: string | null;
  agencies: string[];
  publicationDate: string;
  htmlUrl: string;
  pdfUrl: string | null;
  commentsCloseOn: string | null;
  docketIds: string[];
}

/**
 * A committee RSS feed item (hearing notice, press release)
 */
export interface CommitteeItem {
  itemId: string;
  title: string;
  link: string;
  publishedDate: string;
  sourceName: string;
  description: string | null;
  priority: Priority;
}

/**
 * A Congress.gov committee meeting (hearing, markup)
 */
export interface CommitteeMeeting {
  eventId: string;
  committeeCode: string;
  committeeName: string;
  meetingType: string;
  title: string;
  date: string;
  time: string | null;
  location: string | null;
  url: string;
  witnesses: string[];
  relatedBills: string[];
}

/**
 * A FEMA disaster declaration for one designated area
 */
export interface DisasterDeclaration {
  disasterNumber: number;
  declarationTitle: string;
  state: string;
  incidentType: string;
  declarationDate: string;
  designatedArea: string;
  incidentBeginDate: string;
  incidentEndDate: string | null;
  url: string;
}

export type WatchlistCategory = 'high_priority' | 'funding' | 'notable';

/**
 * A bill from the priority watchlist, enriched with its Congress.gov status
 */
export interface WatchlistBill {
  billId: string;
  billType: string;
  billNumber: number;
  congress: number;
  title: string;
  category: WatchlistCategory;
  notes: string;
  officialTitle: string | null;
  latestAction: string | null;
  latestActionDate: string | null;
  sponsors: string[];
  committees: string[];
  url: string;
  /** False until Congress.gov details have been fetched for this run */
  statusKnown: boolean;
}

/**
 * A regulatory comment or rule deadline from the watchlist
 */
export interface RegulatoryItem {
  name: string;
  url: string;
  federalRegisterDate: string;
  status: string;
  notes: string;
  commentDeadline: string | null;
  effectiveDate: string | null;
  daysUntil: number | null;
}
