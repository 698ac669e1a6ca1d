import { z } from 'zod';
import { CongressApiBase, ordinal, type CongressApiOptions } from './congress-api.js';
import { HttpError } from './base-client.js';
import { determinePriority, sortByPriority } from './priority.js';
import type { BillInfo } from './types.js';
import type { PriorityKeywords, TrackerSettings } from '../types/index.js';

const DEFAULT_CONGRESS = 119;

const BillNumberSchema = z.union([z.number(), z.string()]).transform((value) => Number(value));

/**
 * Bill as returned by the list and detail endpoints. Detail responses carry
 * sponsors, committees and policy area; list responses do not.
 */
export const RawBillSchema = z.object({
  congress: z.number().int().optional(),
  type: z.string().default(''),
  number: BillNumberSchema.optional(),
  title: z.string().optional(),
  introducedDate: z.string().optional(),
  updateDate: z.string().optional(),
  latestAction: z
    .object({
      text: z.string().nullish(),
      actionDate: z.string().nullish(),
    })
    .nullish(),
  sponsors: z
    .array(
      z.object({
        fullName: z.string().optional(),
        name: z.string().optional(),
        party: z.string().optional(),
        state: z.string().optional(),
      })
    )
    .optional(),
  // A list of committees, or a {count, url} reference to fetch separately
  committees: z.union([z.array(z.object({ name: z.string().optional() })), z.object({}).passthrough()]).optional(),
  policyArea: z.object({ name: z.string().optional() }).nullish(),
});

export type RawBill = z.infer<typeof RawBillSchema>;

const BillListResponseSchema = z.object({
  bills: z.array(z.unknown()).default([]),
});

const BillDetailResponseSchema = z.object({
  bill: z.unknown().optional(),
});

const SubjectsResponseSchema = z.object({
  subjects: z
    .object({
      policyArea: z.object({ name: z.string().optional() }).nullish(),
      legislativeSubjects: z.array(z.object({ name: z.string().optional() })).default([]),
    })
    .optional(),
});

export interface BillSubjects {
  policyArea: string | null;
  legislativeSubjects: string[];
}

export interface SearchBillsOptions {
  congress?: number;
  limit?: number;
  offset?: number;
}

const URL_TYPES: Record<string, string> = {
  hr: 'house-bill',
  s: 'senate-bill',
  hjres: 'house-joint-resolution',
  sjres: 'senate-joint-resolution',
  hconres: 'house-concurrent-resolution',
  sconres: 'senate-concurrent-resolution',
  hres: 'house-resolution',
  sres: 'senate-resolution',
};

/**
 * Public congress.gov page for a bill
 */
export function billUrl(congress: number, billType: string, billNumber: number): string {
  const type = billType.toLowerCase();
  return `https://www.congress.gov/bill/${ordinal(congress)}-congress/${URL_TYPES[type] ?? type}/${billNumber}`;
}

/**
 * Normalise a raw bill into a BillInfo with its priority tag
 */
export function buildBillInfo(
  raw: RawBill,
  priorityKeywords?: PriorityKeywords,
  fallbackCongress = DEFAULT_CONGRESS
): BillInfo {
  const congress = raw.congress ?? fallbackCongress;
  const billType = raw.type.toLowerCase();
  const billNumber = raw.number !== undefined && Number.isFinite(raw.number) ? raw.number : 0;
  const title = raw.title ?? 'Untitled';
  const sponsor = raw.sponsors?.[0];
  const committees = Array.isArray(raw.committees)
    ? raw.committees.flatMap((committee) => (committee.name ? [committee.name] : []))
    : [];

  return {
    billId: `${congress}-${billType}-${billNumber}`,
    billType,
    billNumber,
    congress,
    title,
    introducedDate: raw.introducedDate ?? '',
    latestAction: raw.latestAction?.text ?? null,
    latestActionDate: raw.latestAction?.actionDate ?? null,
    sponsor: sponsor ? sponsor.fullName ?? sponsor.name ?? null : null,
    sponsorParty: sponsor?.party ?? null,
    sponsorState: sponsor?.state ?? null,
    committees,
    policyArea: raw.policyArea?.name ?? null,
    url: billUrl(congress, billType, billNumber),
    priority: determinePriority(title, priorityKeywords),
  };
}

/**
 * Bills whose title contains any of the keywords
 */
export function filterBillsByTitleKeywords(bills: readonly RawBill[], keywords: readonly string[]): RawBill[] {
  const lowered = keywords.map((keyword) => keyword.toLowerCase());
  return bills.filter((bill) => {
    const title = (bill.title ?? '').toLowerCase();
    return lowered.some((keyword) => title.includes(keyword));
  });
}

/**
 * Local stand-in for the text search: phrase match first, then all
 * significant words, then a single significant word
 */
export function matchesQuery(title: string, query: string): boolean {
  const lowerTitle = title.toLowerCase();
  const phrase = query.toLowerCase().trim();
  const words = query
    .split(/\s+/)
    .map((word) => word.toLowerCase())
    .filter((word) => word.length > 2);

  if (phrase && lowerTitle.includes(phrase)) {
    return true;
  }
  if (words.length >= 2) {
    return words.every((word) => lowerTitle.includes(word));
  }
  return words.length === 1 && lowerTitle.includes(words[0]);
}

/**
 * Client for the Congress.gov bill endpoints
 */
export class CongressClient extends CongressApiBase {
  constructor(options: CongressApiOptions) {
    super('congress', options);
  }

  /**
   * Most recently updated bills of a congress
   */
  async getRecentBills(congress: number, limit = 250): Promise<RawBill[]> {
    const data = await this.request(`bill/${congress}`, BillListResponseSchema, {
      limit,
      sort: 'updateDate desc',
    });
    return this.parseEach(data.bills, RawBillSchema, 'bill');
  }

  async getBillDetails(congress: number, billType: string, billNumber: number): Promise<RawBill | null> {
    const data = await this.request(
      `bill/${congress}/${billType.toLowerCase()}/${billNumber}`,
      BillDetailResponseSchema
    );
    if (data.bill === undefined) {
      return null;
    }
    const [bill] = this.parseEach([data.bill], RawBillSchema, 'bill detail');
    return bill ?? null;
  }

  /**
   * Policy area and legislative subjects. A failed lookup yields none.
   */
  async getBillSubjects(congress: number, billType: string, billNumber: number): Promise<BillSubjects> {
    try {
      const data = await this.request(
        `bill/${congress}/${billType.toLowerCase()}/${billNumber}/subjects`,
        SubjectsResponseSchema
      );
      return {
        policyArea: data.subjects?.policyArea?.name ?? null,
        legislativeSubjects: (data.subjects?.legislativeSubjects ?? []).flatMap((subject) =>
          subject.name ? [subject.name] : []
        ),
      };
    } catch (error) {
      this.logger.warn(
        { billType, billNumber, error: error instanceof Error ? error.message : String(error) },
        'Could not fetch bill subjects'
      );
      return { policyArea: null, legislativeSubjects: [] };
    }
  }

  /**
   * Text search, falling back to local title matching when the search
   * service is unavailable or finds nothing
   */
  async searchBills(query: string, options: SearchBillsOptions = {}): Promise<RawBill[]> {
    const { congress, limit = 50, offset = 0 } = options;
    try {
      const data = await this.request('bill', BillListResponseSchema, {
        query,
        limit: congress ? limit * 2 : limit,
        offset,
        sort: 'updateDate desc',
      });
      let bills = this.parseEach(data.bills, RawBillSchema, 'bill');
      if (congress) {
        bills = bills.filter((bill) => bill.congress === congress).slice(0, limit);
      }
      if (bills.length > 0) {
        return bills;
      }
    } catch (error) {
      if (!(error instanceof HttpError && error.status === 503)) {
        throw error;
      }
      this.logger.warn({ query }, 'Congress.gov text search unavailable, using local filtering');
    }

    return this.searchBillsLocal(query, congress, limit);
  }

  private async searchBillsLocal(query: string, congress: number | undefined, limit: number): Promise<RawBill[]> {
    const data = await this.request(congress ? `bill/${congress}` : 'bill', BillListResponseSchema, {
      limit: 250,
      sort: 'updateDate desc',
    });
    const matching = this.parseEach(data.bills, RawBillSchema, 'bill')
      .filter((bill) => matchesQuery(bill.title ?? '', query))
      .slice(0, limit);

    this.logger.info({ query, matches: matching.length }, 'Local bill search complete');
    return matching;
  }

  /**
   * Bills whose policy area or any legislative subject contains a relevant term.
   * Subjects are fetched one bill at a time.
   */
  async filterBillsBySubjects(
    bills: readonly RawBill[],
    relevantPolicyAreas: readonly string[],
    relevantSubjects: readonly string[],
    fallbackCongress = DEFAULT_CONGRESS
  ): Promise<RawBill[]> {
    const policyAreas = relevantPolicyAreas.map((area) => area.toLowerCase());
    const subjects = relevantSubjects.map((subject) => subject.toLowerCase());
    const matching: RawBill[] = [];

    for (const bill of bills) {
      const found = await this.getBillSubjects(bill.congress ?? fallbackCongress, bill.type, bill.number ?? 0);
      const policyArea = found.policyArea?.toLowerCase();
      if (policyArea && policyAreas.some((area) => policyArea.includes(area))) {
        matching.push(bill);
        continue;
      }
      const hit = found.legislativeSubjects.some((name) => {
        const lower = name.toLowerCase();
        return subjects.some((subject) => lower.includes(subject));
      });
      if (hit) {
        matching.push(bill);
      }
    }

    return matching;
  }

  /**
   * Recent bills narrowed by title keywords, then by subjects, tagged and
   * sorted critical first
   */
  async findRelevantBills(settings: TrackerSettings['congress']): Promise<BillInfo[]> {
    const congress = settings.current_congress;
    this.logger.info({ congress }, 'Fetching recent bills');

    const recent = await this.getRecentBills(congress, settings.recent_limit);
    const candidates =
      settings.title_keywords.length > 0 ? filterBillsByTitleKeywords(recent, settings.title_keywords) : recent;

    const filtered =
      settings.relevant_policy_areas.length > 0 || settings.relevant_subjects.length > 0
        ? await this.filterBillsBySubjects(
            candidates,
            settings.relevant_policy_areas,
            settings.relevant_subjects,
            congress
          )
        : candidates;

    const bills = sortByPriority(
      filtered.map((bill) => buildBillInfo(bill, settings.priority_keywords, congress))
    );

    this.logger.info(
      { fetched: recent.length, titleMatches: candidates.length, relevant: bills.length },
      'Relevant bill search complete'
    );
    return bills;
  }
}
