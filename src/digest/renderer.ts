import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { groupUpdatesByKind, type EntityUpdate, type Fingerprint } from '../state/index.js';
import type {
  BillInfo,
  CommitteeItem,
  CommitteeMeeting,
  DisasterDeclaration,
  FederalRegisterDocument,
  RegulatoryItem,
  WatchlistBill,
  WatchlistCategory,
} from '../sources/types.js';
import type { ClosingCommentPeriod } from '../sources/federal-register.js';
import type { Priority } from '../types/index.js';
import type { SourceError } from '../tracker/types.js';
import type { DigestInput } from './types.js';
import { isoDay } from '../utils/dates.js';
import { createChildLogger } from '../utils/logger.js';
import { escapeLinkText } from './markdown-html.js';

const logger = createChildLogger('digest');

const PRIORITY_HEADINGS: ReadonlyArray<[Priority, string]> = [
  ['critical', 'Critical Priority'],
  ['high', 'High Priority'],
  ['normal', 'Other New Bills'],
];

const CATEGORY_LABELS: Record<WatchlistCategory, string> = {
  high_priority: 'High Priority',
  funding: 'Funding',
  notable: 'Notable',
};

/** A list entry: the bullet text followed by indented detail lines */
type Entry = [string, ...string[]];

/**
 * "March 10, 2025"
 */
export function formatDigestDate(date: Date): string {
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' });
}

function link(text: string, url: string | null): string {
  return url ? `[${escapeLinkText(text)}](${url})` : text;
}

function upcomingDeadlines(items: readonly RegulatoryItem[]): RegulatoryItem[] {
  return items.filter((item) => item.daysUntil !== null && item.daysUntil >= 0);
}

function formatAction(text: string | null, date: string | null): string {
  if (!text) {
    return 'No action recorded';
  }
  return date ? `${text} (${date})` : text;
}

function formatPrevious(previous: Fingerprint): string {
  return formatAction(previous.primary, previous.secondary);
}

function daysLeft(days: number): string {
  if (days === 0) {
    return 'today';
  }
  return days === 1 ? '1 day left' : `${days} days left`;
}

function updatedSuffix(update: EntityUpdate<unknown>): string {
  return update.kind === 'status_change' ? ' (updated)' : '';
}

function renderEntries(entries: readonly Entry[]): string[] {
  const lines: string[] = [];
  for (const [head, ...details] of entries) {
    lines.push(`- ${head}`);
    for (const detail of details) {
      lines.push(`  - ${detail}`);
    }
  }
  return lines;
}

function section(title: string, entries: readonly Entry[]): string[] {
  return [`## ${title}`, '', ...renderEntries(entries)];
}

/**
 * Renders the daily digest as markdown
 */
export class DigestRenderer {
  renderDailyDigest(input: DigestInput): string {
    const { updates } = input;
    const bills = groupUpdatesByKind(updates.bills);

    const upcoming = upcomingDeadlines(input.regulatoryItems);
    const blocks: string[][] = [[`# Legislative Digest: ${formatDigestDate(input.date)}`], this.renderSummary(input)];

    if (!this.hasUpdates(input) && upcoming.length === 0) {
      blocks.push(['_No new updates today._']);
    }

    if (bills.new.length > 0) {
      blocks.push(this.renderNewBills(bills.new.map((update) => update.entity)));
    }
    if (bills.status_change.length > 0) {
      blocks.push(
        section(
          'Bill Status Changes',
          bills.status_change.map((update): Entry => [
            `**${link(update.entity.billId, update.entity.url)}** ${update.entity.title}`,
            `Now: ${formatAction(update.entity.latestAction, update.entity.latestActionDate)}`,
            `Was: ${formatPrevious(update.previous)}`,
          ])
        )
      );
    }
    if (updates.federalRegister.length > 0) {
      blocks.push(section('Federal Register', updates.federalRegister.map((update) => this.documentEntry(update))));
    }
    if (input.closingCommentPeriods.length > 0) {
      blocks.push(section('Comment Periods Closing Soon', input.closingCommentPeriods.map((period) => this.closingEntry(period))));
    }
    if (updates.committeeItems.length > 0) {
      blocks.push(section('Committee Updates', updates.committeeItems.map((update) => this.committeeItemEntry(update))));
    }
    if (updates.committeeMeetings.length > 0) {
      blocks.push(section('Committee Meetings', updates.committeeMeetings.map((update) => this.meetingEntry(update))));
    }
    if (updates.disasters.length > 0) {
      blocks.push(section('Disaster Declarations', updates.disasters.map((update) => this.disasterEntry(update))));
    }
    if (updates.watchlist.length > 0) {
      blocks.push(section('Watchlist Updates', updates.watchlist.map((update) => this.watchlistEntry(update))));
    }

    if (upcoming.length > 0) {
      blocks.push(section('Regulatory Deadlines', upcoming.map((item) => this.regulatoryEntry(item))));
    }
    if (input.sourceErrors.length > 0) {
      blocks.push(section('Source Errors', input.sourceErrors.map((error) => this.errorEntry(error))));
    }

    blocks.push(['---', '', `_Generated by legislative-tracker on ${isoDay(input.date)}._`]);

    return blocks.map((block) => block.join('\n')).join('\n\n') + '\n';
  }

  private hasUpdates(input: DigestInput): boolean {
    return Object.values(input.updates).some((list) => list.length > 0) || input.closingCommentPeriods.length > 0;
  }

  private renderSummary(input: DigestInput): string[] {
    const { updates } = input;
    const bills = groupUpdatesByKind(updates.bills);
    return [
      '## Summary',
      '',
      `- New bills: ${bills.new.length}`,
      `- Bill status changes: ${bills.status_change.length}`,
      `- Federal Register documents: ${updates.federalRegister.length}`,
      `- Comment periods closing soon: ${input.closingCommentPeriods.length}`,
      `- Committee updates: ${updates.committeeItems.length}`,
      `- Committee meetings: ${updates.committeeMeetings.length}`,
      `- Disaster declarations: ${updates.disasters.length}`,
      `- Watchlist changes: ${updates.watchlist.length}`,
    ];
  }

  private renderNewBills(bills: readonly BillInfo[]): string[] {
    const lines = ['## New Bills'];
    for (const [priority, heading] of PRIORITY_HEADINGS) {
      const group = bills.filter((bill) => bill.priority === priority);
      if (group.length === 0) {
        continue;
      }
      lines.push('', `### ${heading}`, '', ...renderEntries(group.map((bill) => this.billEntry(bill))));
    }
    return lines;
  }

  private billEntry(bill: BillInfo): Entry {
    const entry: Entry = [`**${link(bill.billId, bill.url)}** ${bill.title}`];
    if (bill.sponsor) {
      const affiliation = bill.sponsorParty && bill.sponsorState ? ` (${bill.sponsorParty}-${bill.sponsorState})` : '';
      entry.push(`Sponsor: ${bill.sponsor}${affiliation}`);
    }
    entry.push(`Latest action: ${formatAction(bill.latestAction, bill.latestActionDate)}`);
    return entry;
  }

  private documentEntry(update: EntityUpdate<FederalRegisterDocument>): Entry {
    const doc = update.entity;
    const entry: Entry = [`**${link(doc.title, doc.htmlUrl)}** (${doc.docType})${updatedSuffix(update)}`];
    if (doc.agencies.length > 0) {
      entry.push(`Agencies: ${doc.agencies.join(', ')}`);
    }
    entry.push(`Published: ${doc.publicationDate}`);
    if (doc.commentsCloseOn) {
      entry.push(`Comments close: ${doc.commentsCloseOn}`);
    }
    return entry;
  }

  private closingEntry({ document, daysRemaining }: ClosingCommentPeriod): Entry {
    return [`**${link(document.title, document.htmlUrl)}**: closes ${document.commentsCloseOn ?? ''} (${daysLeft(daysRemaining)})`];
  }

  private committeeItemEntry(update: EntityUpdate<CommitteeItem>): Entry {
    const item = update.entity;
    const when = item.publishedDate ? `, ${item.publishedDate}` : '';
    return [`**${link(item.title, item.link || null)}** (${item.sourceName}${when})${updatedSuffix(update)}`];
  }

  private meetingEntry(update: EntityUpdate<CommitteeMeeting>): Entry {
    const meeting = update.entity;
    const when = meeting.time ? `${meeting.date} ${meeting.time}` : meeting.date;
    const entry: Entry = [
      `**${when}** ${link(meeting.title, meeting.url)}${updatedSuffix(update)}`,
      `Committee: ${meeting.committeeName} (${meeting.meetingType})`,
    ];
    if (meeting.location) {
      entry.push(`Location: ${meeting.location}`);
    }
    if (meeting.relatedBills.length > 0) {
      entry.push(`Related bills: ${meeting.relatedBills.join(', ')}`);
    }
    return entry;
  }

  private disasterEntry(update: EntityUpdate<DisasterDeclaration>): Entry {
    const disaster = update.entity;
    const entry: Entry = [
      `**${link(`Disaster ${disaster.disasterNumber}`, disaster.url)}** ${disaster.state}, ${disaster.designatedArea}: ${disaster.incidentType}${updatedSuffix(update)}`,
      `Declared: ${disaster.declarationDate}`,
    ];
    if (disaster.incidentEndDate) {
      entry.push(`Incident period: ${disaster.incidentBeginDate} to ${disaster.incidentEndDate}`);
    }
    return entry;
  }

  private watchlistEntry(update: EntityUpdate<WatchlistBill>): Entry {
    const bill = update.entity;
    const entry: Entry = [
      `**${link(bill.billId, bill.url)}** ${bill.title} (${CATEGORY_LABELS[bill.category]})`,
      `Latest action: ${formatAction(bill.latestAction, bill.latestActionDate)}`,
    ];
    if (update.kind === 'status_change') {
      entry.push(`Previously: ${formatPrevious(update.previous)}`);
    }
    return entry;
  }

  private regulatoryEntry(item: RegulatoryItem): Entry {
    const deadline = item.commentDeadline ? `comment deadline ${item.commentDeadline}` : `effective ${item.effectiveDate ?? ''}`;
    const entry: Entry = [`**${link(item.name, item.url || null)}**: ${deadline} (${daysLeft(item.daysUntil ?? 0)})`];
    if (item.status) {
      entry.push(`Status: ${item.status}`);
    }
    return entry;
  }

  private errorEntry(error: SourceError): Entry {
    const prefix = error.kind === 'adapter_contract' ? 'no usable records: ' : '';
    return [`${error.source}: ${prefix}${error.message}`];
  }
}

/**
 * Write a digest to disk, creating the directory as needed
 */
export async function saveDigest(content: string, dir: string, filename?: string, now: Date = new Date()): Promise<string> {
  const path = join(dir, filename ?? `digest-${isoDay(now)}.md`);
  await mkdir(dir, { recursive: true });
  await writeFile(path, content, 'utf-8');
  logger.info({ path }, 'Digest saved');
  return path;
}
