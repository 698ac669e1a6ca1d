import type { z } from 'zod';
import { BaseApiClient, buildUrl, type ApiClientOptions, type QueryValue } from './base-client.js';

export const DEFAULT_CONGRESS_API_BASE = 'https://api.congress.gov/v3';

export interface CongressApiOptions extends ApiClientOptions {
  apiKey: string | undefined;
  apiBase?: string;
}

/**
 * "119th", "121st", "122nd" as used in congress.gov paths
 */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) {
    return `${n}th`;
  }
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * Shared request plumbing for the Congress.gov v3 endpoints.
 * Every request carries the API key and asks for JSON.
 */
export abstract class CongressApiBase extends BaseApiClient {
  protected readonly apiBase: string;
  private readonly apiKey: string;

  constructor(component: string, options: CongressApiOptions) {
    super(component, options);
    if (!options.apiKey) {
      throw new Error('CONGRESS_API_KEY is not set. Get a key at https://api.congress.gov/sign-up/');
    }
    this.apiKey = options.apiKey;
    this.apiBase = options.apiBase ?? DEFAULT_CONGRESS_API_BASE;
  }

  protected request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params: Record<string, QueryValue> = {}
  ): Promise<z.output<S>> {
    const url = buildUrl(this.apiBase, path, { ...params, format: 'json', api_key: this.apiKey });
    return this.fetchJson(url, schema);
  }
}
