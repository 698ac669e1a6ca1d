import type { RegulatoryItem } from '../sources/types.js';
import type { ClosingCommentPeriod } from '../sources/federal-register.js';
import type { RunUpdates, SourceError } from '../tracker/types.js';

/**
 * Everything a daily digest shows
 */
export interface DigestInput {
  date: Date;
  updates: RunUpdates;
  closingCommentPeriods: ClosingCommentPeriod[];
  regulatoryItems: RegulatoryItem[];
  sourceErrors: SourceError[];
}
