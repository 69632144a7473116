/**
 * Google News Tool - news discovery through the Google News RSS feeds
 */

import Parser from 'rss-parser';
import { Logger, stripHtml } from '../utils';
import { HttpTool } from './http';
import { SearchResultItemSchema, type SearchResultItem } from '../schemas';

export interface GoogleNewsQuery {
  keyword?: string;
  topNews?: boolean;
  maxResults?: number;
  language?: string;
  country?: string;
}

/**
 * Google News titles end with " - Publisher"
 */
export function splitGoogleNewsTitle(title: string): { headline: string; publisher: string | null } {
  const index = title.lastIndexOf(' - ');
  if (index <= 0) {
    return { headline: title.trim(), publisher: null };
  }
  return {
    headline: title.slice(0, index).trim(),
    publisher: title.slice(index + 3).trim() || null,
  };
}

export function buildGoogleNewsUrl(query: GoogleNewsQuery): string {
  const language = query.language || 'en';
  const country = query.country || 'US';
  const params = `hl=${language}-${country}&gl=${country}&ceid=${country}:${language}`;

  // top news wins over a keyword
  if (query.topNews || !query.keyword) {
    return `https://news.google.com/rss?${params}`;
  }
  return `https://news.google.com/rss/search?q=${encodeURIComponent(query.keyword)}&${params}`;
}

export class GoogleNewsTool {
  private parser: Parser;

  constructor() {
    this.parser = new Parser({ timeout: 10000 });
  }

  async discover(query: GoogleNewsQuery): Promise<SearchResultItem[]> {
    if (!query.keyword && !query.topNews) {
      throw new Error('Either keyword or topNews must be provided');
    }

    const maxResults = query.maxResults ?? 5;
    const url = buildGoogleNewsUrl(query);
    Logger.info('📰 Google News discovery', { keyword: query.keyword, topNews: !!query.topNews });

    const response = await HttpTool.fetch(url, { timeout: 15000, maxRetries: 2 });
    return this.parse(response.text, maxResults);
  }

  async parse(xml: string, maxResults: number): Promise<SearchResultItem[]> {
    const feed = await this.parser.parseString(xml);
    const items: SearchResultItem[] = [];

    for (const item of feed.items) {
      if (items.length >= maxResults) break;
      if (!item.link || !item.title) continue;

      const { headline, publisher } = splitGoogleNewsTitle(item.title);
      items.push(
        SearchResultItemSchema.parse({
          url: item.link,
          title: headline,
          description: stripHtml(item.contentSnippet || item.content || headline),
          source_name: publisher || 'google_news',
          tool_used: 'google_news_discovery',
          published_date: item.isoDate || item.pubDate || '',
          is_scrapping_required: true,
        })
      );
    }

    return items;
  }
}
