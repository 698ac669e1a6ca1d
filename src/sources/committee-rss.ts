import Parser from 'rss-parser';
import { BaseApiClient, type ApiClientOptions } from './base-client.js';
import { determinePriority } from './priority.js';
import type { CommitteeItem } from './types.js';
import type { PriorityKeywords, TrackerSettings } from '../types/index.js';
import { hashString } from '../utils/hash.js';

type FeedItemFields = {
  id?: string;
  summary?: string;
};

export type FeedItem = Parser.Item & FeedItemFields;

export interface FeedSource {
  name: string;
  url: string;
  keywords: readonly string[];
}

/**
 * YYYY-MM-DD from the parser's ISO date, else the raw pubDate, else empty
 */
function publishedDate(item: FeedItem): string {
  if (item.isoDate) {
    return item.isoDate.slice(0, 10);
  }
  return item.pubDate ?? '';
}

/**
 * Convert a parsed feed entry. Id preference: guid, then id, then a hash of title and link.
 */
export function parseFeedItem(
  item: FeedItem,
  sourceName: string,
  priorityKeywords?: PriorityKeywords
): CommitteeItem {
  const title = item.title ?? '';
  const link = item.link ?? '';
  const description = item.contentSnippet || item.summary || item.content || null;

  return {
    itemId: item.guid || item.id || hashString(`${title}${link}`),
    title,
    link,
    publishedDate: publishedDate(item),
    sourceName,
    description,
    priority: determinePriority(`${title} ${description ?? ''}`, priorityKeywords),
  };
}

export function matchesKeywords(item: CommitteeItem, keywords: readonly string[]): boolean {
  const text = `${item.title} ${item.description ?? ''}`.toLowerCase();
  return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

/**
 * Reads committee RSS and Atom feeds
 */
export class CommitteeRssClient extends BaseApiClient {
  private readonly parser: Parser<Record<string, unknown>, FeedItemFields>;

  constructor(options: ApiClientOptions = {}) {
    super('committee-rss', options);
    this.parser = new Parser<Record<string, unknown>, FeedItemFields>({
      customFields: { item: ['id', 'summary'] },
    });
  }

  /**
   * Items of one feed, keyword-filtered when keywords are given.
   * A feed that cannot be fetched or parsed yields no items.
   */
  async fetchFeed(source: FeedSource, priorityKeywords?: PriorityKeywords): Promise<CommitteeItem[]> {
    this.logger.info({ source: source.name }, 'Fetching committee feed');

    try {
      const xml = await this.fetchText(
        new URL(source.url),
        'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8'
      );
      const feed = await this.parser.parseString(xml);

      const items = feed.items
        .map((item) => parseFeedItem(item, source.name, priorityKeywords))
        .filter((item) => source.keywords.length === 0 || matchesKeywords(item, source.keywords));

      this.logger.info({ source: source.name, count: items.length }, 'Committee feed parsed');
      return items;
    } catch (error) {
      this.logger.error(
        { source: source.name, error: error instanceof Error ? error.message : String(error) },
        'Error fetching committee feed'
      );
      return [];
    }
  }
}

/**
 * Items from every configured feed, newest first
 */
export async function fetchCommitteeItems(
  client: Pick<CommitteeRssClient, 'fetchFeed'>,
  settings: TrackerSettings
): Promise<CommitteeItem[]> {
  const feeds = settings.committees.rss_feeds;
  if (feeds.length === 0) {
    return [];
  }

  const all: CommitteeItem[] = [];
  for (const feed of feeds) {
    all.push(...(await client.fetchFeed(feed, settings.congress.priority_keywords)));
  }
  return all.sort((a, b) => b.publishedDate.localeCompare(a.publishedDate));
}
