export * from './types.js';
export { BaseApiClient, HttpError, buildUrl, clientOptionsFromConfig, isTransientError } from './base-client.js';
export type { ApiClientOptions, QueryValue } from './base-client.js';
export { determinePriority, sortByPriority } from './priority.js';
export { CongressApiBase, ordinal } from './congress-api.js';
export type { CongressApiOptions } from './congress-api.js';
export {
  CongressClient,
  buildBillInfo,
  billUrl,
  filterBillsByTitleKeywords,
  matchesQuery,
} from './congress.js';
export type { RawBill, BillSubjects, SearchBillsOptions } from './congress.js';
export {
  FederalRegisterClient,
  buildDocument,
  daysUntilCommentClose,
  getClosingCommentPeriods,
  DOC_TYPE_CODES,
} from './federal-register.js';
export type { ClosingCommentPeriod, DocumentSearch } from './federal-register.js';
export { CommitteeMeetingClient, fetchCommitteeMeetings, parseMeeting } from './committee-meetings.js';
export type { Chamber, CommitteeNames } from './committee-meetings.js';
export { CommitteeRssClient, fetchCommitteeItems, parseFeedItem, matchesKeywords } from './committee-rss.js';
export type { FeedSource } from './committee-rss.js';
export { OpenFemaClient, buildDeclaration } from './openfema.js';
export type { DisasterQuery } from './openfema.js';
export { WatchlistClient, parseBillId } from './watchlist.js';
export type { BillDetailsSource, WatchlistFile } from './watchlist.js';
