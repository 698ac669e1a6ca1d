import type { z } from 'zod';
import { createChildLogger, type ComponentLogger } from '../utils/logger.js';
import type { Config } from '../types/index.js';

/**
 * Non-2xx response from an upstream API
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/**
 * Statuses worth another attempt
 */
const TRANSIENT_STATUSES = new Set([502, 503, 504]);

export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return TRANSIENT_STATUSES.has(error.status);
  }
  // fetch rejects with TypeError on network failure and AbortError on timeout
  return error instanceof Error && (error.name === 'TypeError' || error.name === 'AbortError');
}

/**
 * Configuration options for API clients
 */
export interface ApiClientOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Extra attempts after the first on transient failures */
  retries?: number;
  /** Fixed delay between attempts in milliseconds */
  retryDelayMs?: number;
  userAgent?: string;
  logger?: ComponentLogger;
}

const DEFAULT_OPTIONS: Required<Omit<ApiClientOptions, 'logger'>> = {
  timeoutMs: 30000,
  retries: 3,
  retryDelayMs: 2000,
  userAgent: 'legislative-tracker/1.0',
};

/**
 * Client options taken from the HTTP section of the environment config
 */
export function clientOptionsFromConfig(http: Config['http']): ApiClientOptions {
  return {
    timeoutMs: http.timeoutMs,
    retries: http.retries,
    retryDelayMs: http.retryDelayMs,
  };
}

export type QueryValue = string | number | readonly string[] | undefined;

/**
 * Join a base URL and path and append query parameters.
 * Array values become repeated parameters; undefined values are dropped.
 */
export function buildUrl(base: string, path: string, params: Record<string, QueryValue> = {}): URL {
  const url = new URL(`${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`);
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === 'string' || typeof value === 'number') {
      url.searchParams.append(name, String(value));
    } else {
      for (const item of value) {
        url.searchParams.append(name, item);
      }
    }
  }
  return url;
}

/**
 * URL without its query string, safe to log when the query carries a key
 */
function displayUrl(url: URL): string {
  return `${url.origin}${url.pathname}`;
}

/**
 * Base class for the upstream API clients
 */
export abstract class BaseApiClient {
  protected readonly options: Required<Omit<ApiClientOptions, 'logger'>>;
  protected readonly logger: ComponentLogger;

  constructor(component: string, options: ApiClientOptions = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      retries: options.retries ?? DEFAULT_OPTIONS.retries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_OPTIONS.retryDelayMs,
      userAgent: options.userAgent ?? DEFAULT_OPTIONS.userAgent,
    };
    this.logger = options.logger ?? createChildLogger(component);
  }

  /**
   * Fetch a URL, retrying transient failures with a fixed delay
   */
  protected async fetchWithRetry(url: URL, accept = 'application/json'): Promise<Response> {
    const target = displayUrl(url);
    const attempts = this.options.retries + 1;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
      try {
        this.logger.debug({ url: target, attempt }, 'Fetching URL');
        const response = await fetch(url, {
          headers: {
            'User-Agent': this.options.userAgent,
            Accept: accept,
          },
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new HttpError(response.status, response.statusText, target);
        }
        return response;
      } catch (error) {
        lastError = error;
        if (!isTransientError(error) || attempt === attempts) {
          throw error;
        }
        this.logger.warn(
          { url: target, attempt, error: error instanceof Error ? error.message : String(error) },
          `Transient failure, retrying in ${this.options.retryDelayMs}ms`
        );
        await this.sleep(this.options.retryDelayMs);
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError;
  }

  /**
   * Fetch and validate a JSON document
   */
  protected async fetchJson<S extends z.ZodTypeAny>(url: URL, schema: S): Promise<z.output<S>> {
    const response = await this.fetchWithRetry(url);
    const body: unknown = await response.json();
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(
        `Unexpected response from ${displayUrl(url)}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`
      );
    }
    return result.data;
  }

  /**
   * Validate list entries one by one, dropping the ones that do not fit
   */
  protected parseEach<S extends z.ZodTypeAny>(items: readonly unknown[], schema: S, what: string): Array<z.output<S>> {
    const parsed: Array<z.output<S>> = [];
    items.forEach((item, index) => {
      const result = schema.safeParse(item);
      if (result.success) {
        parsed.push(result.data);
      } else {
        this.logger.warn({ index, issues: result.error.issues.slice(0, 3) }, `Skipping unparseable ${what}`);
      }
    });
    return parsed;
  }

  protected async fetchText(url: URL, accept = '*/*'): Promise<string> {
    const response = await this.fetchWithRetry(url, accept);
    return response.text();
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
