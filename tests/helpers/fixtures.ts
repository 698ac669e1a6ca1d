import { vi } from 'vitest';
import type {
  BillInfo,
  CommitteeItem,
  CommitteeMeeting,
  DisasterDeclaration,
  FederalRegisterDocument,
  WatchlistBill,
} from '../../src/sources/types.js';

/**
 * Logger double whose calls can be asserted
 */
export function createFakeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export type FakeLogger = ReturnType<typeof createFakeLogger>;

/**
 * Clock that always returns the given instant
 */
export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}

export function makeBill(overrides: Partial<BillInfo> = {}): BillInfo {
  return {
    billId: '119-hr-100',
    billType: 'hr',
    billNumber: 100,
    congress: 119,
    title: 'Flood Insurance Modernization Act',
    introducedDate: '2025-01-10',
    latestAction: 'Introduced in House',
    latestActionDate: '2025-01-10',
    sponsor: 'Rep. Example Sponsor',
    sponsorParty: 'D',
    sponsorState: 'LA',
    committees: [],
    policyArea: 'Water Resources Development',
    url: 'https://www.congress.gov/bill/119th-congress/house-bill/100',
    priority: 'normal',
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<FederalRegisterDocument> = {}): FederalRegisterDocument {
  return {
    documentNumber: '2025-01234',
    title: 'Floodplain Management Standard',
    docType: 'Proposed Rule',
    abstract: null,
    agencies: ['Federal Emergency Management Agency'],
    publicationDate: '2025-03-01',
    htmlUrl: 'https://www.federalregister.gov/d/2025-01234',
    pdfUrl: null,
    commentsCloseOn: null,
    docketIds: [],
    ...overrides,
  };
}

export function makeCommitteeItem(overrides: Partial<CommitteeItem> = {}): CommitteeItem {
  return {
    itemId: 'item-1',
    title: 'Hearing on Levee Safety',
    link: 'https://committee.example.gov/hearings/levee-safety',
    publishedDate: '2025-03-02',
    sourceName: 'House Transportation',
    description: null,
    priority: 'normal',
    ...overrides,
  };
}

export function makeMeeting(overrides: Partial<CommitteeMeeting> = {}): CommitteeMeeting {
  return {
    eventId: '118000',
    committeeCode: 'hspw00',
    committeeName: 'Transportation and Infrastructure',
    meetingType: 'Hearing',
    title: 'Water Resources Oversight',
    date: '2025-03-05',
    time: '10:00',
    location: null,
    url: 'https://www.congress.gov/event/119th-congress/house-event/118000',
    witnesses: [],
    relatedBills: [],
    ...overrides,
  };
}

export function makeDisaster(overrides: Partial<DisasterDeclaration> = {}): DisasterDeclaration {
  return {
    disasterNumber: 4800,
    declarationTitle: 'Severe Storms and Flooding',
    state: 'KY',
    incidentType: 'Flood',
    declarationDate: '2025-02-20',
    designatedArea: 'Pike (County)',
    incidentBeginDate: '2025-02-14',
    incidentEndDate: null,
    url: 'https://www.fema.gov/disaster/4800',
    ...overrides,
  };
}

export function makeWatchlistBill(overrides: Partial<WatchlistBill> = {}): WatchlistBill {
  return {
    billId: '119-s-50',
    billType: 's',
    billNumber: 50,
    congress: 119,
    title: 'Watershed Protection Act',
    category: 'high_priority',
    notes: '',
    officialTitle: null,
    latestAction: 'Read twice and referred to committee',
    latestActionDate: '2025-01-20',
    sponsors: [],
    committees: [],
    url: 'https://www.congress.gov/bill/119th-congress/senate-bill/50',
    statusKnown: true,
    ...overrides,
  };
}
