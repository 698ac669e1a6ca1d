import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { createChildLogger, type ComponentLogger } from '../utils/logger.js';
import { daysUntil } from '../utils/dates.js';
import { billUrl, type RawBill } from './congress.js';
import type { RegulatoryItem, WatchlistBill, WatchlistCategory } from './types.js';

const WatchlistEntrySchema = z.object({
  bill_id: z.string().default(''),
  title: z.string().default(''),
  notes: z.string().default(''),
});

const RegulatoryEntrySchema = z.object({
  name: z.string().default(''),
  url: z.string().default(''),
  federal_register_date: z.string().default(''),
  status: z.string().default(''),
  notes: z.string().default(''),
  comment_deadline: z.string().nullish(),
  effective_date: z.string().nullish(),
});

/**
 * Layout of watchlist.yaml
 */
export const WatchlistFileSchema = z.object({
  high_priority: z.array(WatchlistEntrySchema).nullish(),
  funding_appropriations: z.array(WatchlistEntrySchema).nullish(),
  other_notable: z.array(WatchlistEntrySchema).nullish(),
  regulatory_comments: z.array(RegulatoryEntrySchema).nullish(),
});

export type WatchlistFile = z.infer<typeof WatchlistFileSchema>;

type BillSection = 'high_priority' | 'funding_appropriations' | 'other_notable';

const SECTIONS: ReadonlyArray<[BillSection, WatchlistCategory]> = [
  ['high_priority', 'high_priority'],
  ['funding_appropriations', 'funding'],
  ['other_notable', 'notable'],
];

/**
 * Anything that can look up bill details, normally the CongressClient
 */
export interface BillDetailsSource {
  getBillDetails(congress: number, billType: string, billNumber: number): Promise<RawBill | null>;
}

export interface ParsedBillId {
  congress: number;
  billType: string;
  billNumber: number;
}

/**
 * Split "119-hr-2093" into its parts; null when malformed
 */
export function parseBillId(billId: string): ParsedBillId | null {
  const match = /^(\d+)-([a-z]+)-(\d+)$/.exec(billId.trim().toLowerCase());
  if (!match) {
    return null;
  }
  return { congress: Number(match[1]), billType: match[2], billNumber: Number(match[3]) };
}

export interface WatchlistClientOptions {
  logger?: ComponentLogger;
}

/**
 * Reads the hand-maintained watchlist and enriches its bills with live status
 */
export class WatchlistClient {
  private readonly path: string;
  private readonly congress: BillDetailsSource;
  private readonly logger: ComponentLogger;
  private data: WatchlistFile | null = null;

  constructor(path: string, congress: BillDetailsSource, options: WatchlistClientOptions = {}) {
    this.path = path;
    this.congress = congress;
    this.logger = options.logger ?? createChildLogger('watchlist');
  }

  /**
   * Parsed watchlist, read once. A missing file is an empty watchlist.
   */
  async load(): Promise<WatchlistFile> {
    if (this.data) {
      return this.data;
    }

    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn({ path: this.path }, 'Watchlist file not found');
        return {};
      }
      throw error;
    }

    const result = WatchlistFileSchema.safeParse(yaml.load(raw, { schema: yaml.JSON_SCHEMA }) ?? {});
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Invalid watchlist ${this.path}: ${details}`);
    }
    this.data = result.data;
    return this.data;
  }

  /**
   * Watchlist bills in file order; malformed ids are skipped
   */
  async getWatchlistBills(): Promise<WatchlistBill[]> {
    const data = await this.load();
    const bills: WatchlistBill[] = [];

    for (const [section, category] of SECTIONS) {
      for (const entry of data[section] ?? []) {
        const parsed = parseBillId(entry.bill_id);
        if (!parsed) {
          this.logger.warn({ billId: entry.bill_id, section }, 'Skipping watchlist bill with invalid id');
          continue;
        }
        bills.push({
          billId: entry.bill_id.trim(),
          ...parsed,
          title: entry.title,
          category,
          notes: entry.notes,
          officialTitle: null,
          latestAction: null,
          latestActionDate: null,
          sponsors: [],
          committees: [],
          url: billUrl(parsed.congress, parsed.billType, parsed.billNumber),
          statusKnown: false,
        });
      }
    }

    return bills;
  }

  /**
   * Copy of the bill with its Congress.gov details. On failure the bill is
   * returned unchanged, with statusKnown left false.
   */
  async fetchBillStatus(bill: WatchlistBill): Promise<WatchlistBill> {
    try {
      const details = await this.congress.getBillDetails(bill.congress, bill.billType, bill.billNumber);
      if (!details) {
        return bill;
      }
      return {
        ...bill,
        officialTitle: details.title ?? null,
        latestAction: details.latestAction?.text ?? null,
        latestActionDate: details.latestAction?.actionDate ?? null,
        sponsors: (details.sponsors ?? []).flatMap((sponsor) => {
          const name = sponsor.fullName || sponsor.name;
          return name ? [name] : [];
        }),
        committees: Array.isArray(details.committees)
          ? details.committees.flatMap((committee) => (committee.name ? [committee.name] : []))
          : bill.committees,
        statusKnown: true,
      };
    } catch (error) {
      this.logger.warn(
        { billId: bill.billId, error: error instanceof Error ? error.message : String(error) },
        'Failed to fetch watchlist bill status'
      );
      return bill;
    }
  }

  async getWatchlistBillsWithStatus(): Promise<WatchlistBill[]> {
    const bills = await this.getWatchlistBills();
    this.logger.info({ count: bills.length }, 'Fetching status for watchlist bills');

    const enriched: WatchlistBill[] = [];
    for (const bill of bills) {
      enriched.push(await this.fetchBillStatus(bill));
    }
    return enriched;
  }

  /**
   * Regulatory deadlines, soonest first, undated items last
   */
  async getRegulatoryItems(now: Date = new Date()): Promise<RegulatoryItem[]> {
    const data = await this.load();
    const items: RegulatoryItem[] = (data.regulatory_comments ?? []).map((entry) => {
      const commentDeadline = entry.comment_deadline ?? null;
      const effectiveDate = entry.effective_date ?? null;
      return {
        name: entry.name,
        url: entry.url,
        federalRegisterDate: entry.federal_register_date,
        status: entry.status,
        notes: entry.notes,
        commentDeadline,
        effectiveDate,
        daysUntil: daysUntil(commentDeadline ?? effectiveDate, now),
      };
    });

    return items.sort((a, b) => {
      if (a.daysUntil === null || b.daysUntil === null) {
        return (a.daysUntil === null ? 1 : 0) - (b.daysUntil === null ? 1 : 0);
      }
      return a.daysUntil - b.daysUntil;
    });
  }
}
