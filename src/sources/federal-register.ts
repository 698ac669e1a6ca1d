import { z } from 'zod';
import { BaseApiClient, buildUrl, type ApiClientOptions, type QueryValue } from './base-client.js';
import type { FederalRegisterDocument } from './types.js';
import type { TrackerSettings } from '../types/index.js';
import { daysAgo, daysUntil, isoDay } from '../utils/dates.js';

export const DEFAULT_FEDERAL_REGISTER_API_BASE = 'https://www.federalregister.gov/api/v1';

/**
 * Human-readable document types and their API codes
 */
export const DOC_TYPE_CODES: Readonly<Record<string, string>> = {
  Rule: 'RULE',
  'Proposed Rule': 'PRORULE',
  Notice: 'NOTICE',
  'Presidential Document': 'PRESDOCU',
};

const RawDocumentSchema = z.object({
  document_number: z.string().nullish(),
  title: z.string().nullish(),
  type: z.string().nullish(),
  abstract: z.string().nullish(),
  agencies: z
    .array(z.object({ name: z.string().nullish(), raw_name: z.string().nullish() }))
    .nullish(),
  publication_date: z.string().nullish(),
  html_url: z.string().nullish(),
  pdf_url: z.string().nullish(),
  comments_close_on: z.string().nullish(),
  docket_ids: z.array(z.string()).nullish(),
});

export type RawDocument = z.infer<typeof RawDocumentSchema>;

const SearchResponseSchema = z.object({
  count: z.number().optional(),
  total_pages: z.number().optional(),
  results: z.array(z.unknown()).default([]),
});

export interface DocumentSearch {
  agencies?: readonly string[];
  docTypes?: readonly string[];
  publishedFrom?: string;
  publishedTo?: string;
  perPage?: number;
  page?: number;
}

export interface FederalRegisterOptions extends ApiClientOptions {
  apiBase?: string;
}

export function buildDocument(raw: RawDocument): FederalRegisterDocument {
  return {
    documentNumber: raw.document_number ?? '',
    title: raw.title ?? 'Untitled',
    docType: raw.type ?? 'Unknown',
    abstract: raw.abstract ?? null,
    agencies: (raw.agencies ?? []).map((agency) => agency.name || agency.raw_name || 'Unknown Agency'),
    publicationDate: raw.publication_date ?? '',
    htmlUrl: raw.html_url ?? '',
    pdfUrl: raw.pdf_url ?? null,
    commentsCloseOn: raw.comments_close_on ?? null,
    docketIds: raw.docket_ids ?? [],
  };
}

/**
 * Days left in the comment period; null when the document has none
 */
export function daysUntilCommentClose(doc: Pick<FederalRegisterDocument, 'commentsCloseOn'>, now: Date = new Date()): number | null {
  return daysUntil(doc.commentsCloseOn, now);
}

export interface ClosingCommentPeriod {
  document: FederalRegisterDocument;
  daysRemaining: number;
}

/**
 * Documents whose comment period closes within warningDays (inclusive),
 * most urgent first
 */
export function getClosingCommentPeriods(
  documents: readonly FederalRegisterDocument[],
  warningDays: number,
  now: Date = new Date()
): ClosingCommentPeriod[] {
  const closing: ClosingCommentPeriod[] = [];
  for (const document of documents) {
    const daysRemaining = daysUntilCommentClose(document, now);
    if (daysRemaining !== null && daysRemaining >= 0 && daysRemaining <= warningDays) {
      closing.push({ document, daysRemaining });
    }
  }
  return closing.sort((a, b) => a.daysRemaining - b.daysRemaining);
}

/**
 * Client for the Federal Register documents API. No key required.
 */
export class FederalRegisterClient extends BaseApiClient {
  private readonly apiBase: string;

  constructor(options: FederalRegisterOptions = {}) {
    super('federal-register', options);
    this.apiBase = options.apiBase ?? DEFAULT_FEDERAL_REGISTER_API_BASE;
  }

  /**
   * One page of documents, newest first. Agencies and types become repeated
   * condition parameters; type names are sent as API codes.
   */
  async searchDocuments(search: DocumentSearch = {}): Promise<FederalRegisterDocument[]> {
    const params: Record<string, QueryValue> = {
      per_page: search.perPage ?? 50,
      page: search.page ?? 1,
      order: 'newest',
      'conditions[agencies][]': search.agencies,
      'conditions[type][]': search.docTypes?.map((type) => DOC_TYPE_CODES[type] ?? type),
      'conditions[publication_date][gte]': search.publishedFrom,
      'conditions[publication_date][lte]': search.publishedTo,
    };
    const data = await this.fetchJson(buildUrl(this.apiBase, 'documents.json', params), SearchResponseSchema);
    return this.parseEach(data.results, RawDocumentSchema, 'document').map(buildDocument);
  }

  /**
   * Recent documents for each agency, deduplicated by document number.
   * A failing agency is logged and skipped; if every agency fails the last error is thrown.
   */
  async fetchAgencyDocuments(
    settings: TrackerSettings['federal_register'],
    daysBack: number = settings.days_back,
    now: Date = new Date()
  ): Promise<FederalRegisterDocument[]> {
    if (settings.agencies.length === 0) {
      this.logger.warn('No agencies configured for Federal Register monitoring');
      return [];
    }

    const publishedFrom = daysAgo(now, daysBack);
    const publishedTo = isoDay(now);
    const documents: FederalRegisterDocument[] = [];
    const seen = new Set<string>();
    let failures = 0;
    let lastError: unknown = null;

    for (const agency of settings.agencies) {
      const name = agency.name ?? agency.slug;
      try {
        const results = await this.searchDocuments({
          agencies: [agency.slug],
          docTypes: settings.document_types,
          publishedFrom,
          publishedTo,
        });
        this.logger.info({ agency: name, count: results.length }, 'Fetched Federal Register documents');

        for (const document of results) {
          if (seen.has(document.documentNumber)) {
            continue;
          }
          seen.add(document.documentNumber);
          documents.push(document);
        }
      } catch (error) {
        failures++;
        lastError = error;
        this.logger.error(
          { agency: name, error: error instanceof Error ? error.message : String(error) },
          'Error fetching Federal Register documents'
        );
      }
    }

    if (failures === settings.agencies.length) {
      throw lastError;
    }

    this.logger.info({ count: documents.length }, 'Unique Federal Register documents');
    return documents;
  }
}
