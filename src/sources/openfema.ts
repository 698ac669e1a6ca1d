import { z } from 'zod';
import { BaseApiClient, buildUrl, type ApiClientOptions } from './base-client.js';
import type { DisasterDeclaration } from './types.js';
import { disasterKey } from '../state/trackers.js';
import { daysAgo } from '../utils/dates.js';

export const DEFAULT_OPENFEMA_API_BASE = 'https://www.fema.gov/api/open/v2';

const DisasterResponseSchema = z.object({
  DisasterDeclarationsSummaries: z.array(z.unknown()).default([]),
});

const RawDeclarationSchema = z.object({
  disasterNumber: z.number().int().nullish(),
  declarationTitle: z.string().nullish(),
  state: z.string().nullish(),
  incidentType: z.string().nullish(),
  declarationDate: z.string().nullish(),
  designatedArea: z.string().nullish(),
  incidentBeginDate: z.string().nullish(),
  incidentEndDate: z.string().nullish(),
});

export type RawDeclaration = z.infer<typeof RawDeclarationSchema>;

export interface OpenFemaOptions extends ApiClientOptions {
  apiBase?: string;
}

export interface DisasterQuery {
  daysBack: number;
  limit: number;
}

/**
 * Normalise a declaration summary; null without a disaster number
 */
export function buildDeclaration(raw: RawDeclaration): DisasterDeclaration | null {
  if (!raw.disasterNumber) {
    return null;
  }
  return {
    disasterNumber: raw.disasterNumber,
    declarationTitle: raw.declarationTitle ?? 'Unknown',
    state: raw.state ?? '',
    incidentType: raw.incidentType ?? 'Unknown',
    declarationDate: (raw.declarationDate ?? '').slice(0, 10),
    designatedArea: raw.designatedArea ?? 'Statewide',
    incidentBeginDate: (raw.incidentBeginDate ?? '').slice(0, 10),
    incidentEndDate: raw.incidentEndDate ? raw.incidentEndDate.slice(0, 10) : null,
    url: `https://www.fema.gov/disaster/${raw.disasterNumber}`,
  };
}

/**
 * Client for the OpenFEMA disaster declaration summaries. No key required.
 */
export class OpenFemaClient extends BaseApiClient {
  private readonly apiBase: string;

  constructor(options: OpenFemaOptions = {}) {
    super('openfema', options);
    this.apiBase = options.apiBase ?? DEFAULT_OPENFEMA_API_BASE;
  }

  /**
   * Declarations since the cutoff, newest first, one per number/state/area
   */
  async getRecentDisasters(query: DisasterQuery, now: Date = new Date()): Promise<DisasterDeclaration[]> {
    const cutoff = daysAgo(now, query.daysBack);
    const url = buildUrl(this.apiBase, 'DisasterDeclarationsSummaries', {
      $filter: `declarationDate ge '${cutoff}'`,
      $orderby: 'declarationDate desc',
      $top: query.limit,
    });

    this.logger.info({ daysBack: query.daysBack }, 'Fetching FEMA disaster declarations');
    const data = await this.fetchJson(url, DisasterResponseSchema);

    const declarations: DisasterDeclaration[] = [];
    const seen = new Set<string>();
    for (const raw of this.parseEach(data.DisasterDeclarationsSummaries, RawDeclarationSchema, 'declaration')) {
      const declaration = buildDeclaration(raw);
      const key = declaration ? disasterKey(declaration) : undefined;
      if (!declaration || !key || seen.has(key)) {
        continue;
      }
      seen.add(key);
      declarations.push(declaration);
    }

    this.logger.info({ count: declarations.length }, 'Unique disaster declarations');
    return declarations;
  }

  /**
   * Recent declarations whose incident type is one of the given types
   */
  async getFloodRelatedDisasters(
    query: DisasterQuery,
    incidentTypes: readonly string[],
    now: Date = new Date()
  ): Promise<DisasterDeclaration[]> {
    const relevant = new Set(incidentTypes);
    const all = await this.getRecentDisasters(query, now);
    const filtered = all.filter((declaration) => relevant.has(declaration.incidentType));
    this.logger.info({ count: filtered.length }, 'Filtered to flood-related disasters');
    return filtered;
  }
}
