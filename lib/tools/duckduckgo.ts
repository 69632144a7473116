/**
 * DuckDuckGo Tool - web search through the DuckDuckGo HTML endpoint
 */

import { Logger, decodeEntities, stripHtml } from '../utils';
import { HttpTool } from './http';
import { SearchResultItemSchema, type SearchResultItem } from '../schemas';

const DDG_HTML_URL = 'https://html.duckduckgo.com/html/';

/**
 * Result links point at a duckduckgo.com/l/ redirect carrying the target in `uddg`
 */
export function unwrapDuckDuckGoLink(href: string): string | null {
  const decoded = decodeEntities(href);
  try {
    const url = new URL(decoded, 'https://duckduckgo.com');
    if (url.hostname.endsWith('duckduckgo.com')) {
      const target = url.searchParams.get('uddg');
      return target && /^https?:\/\//.test(target) ? target : null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

export function parseDuckDuckGoHtml(html: string, maxResults: number): SearchResultItem[] {
  const anchors = [...html.matchAll(/<a([^>]*class="[^"]*result__a[^"]*"[^>]*)>([\s\S]*?)<\/a>/g)];
  const snippets = [...html.matchAll(/<(?:a|div)[^>]*class="[^"]*result__snippet[^"]*"[^>]*>([\s\S]*?)<\/(?:a|div)>/g)];
  const results: SearchResultItem[] = [];

  anchors.forEach((anchor, index) => {
    if (results.length >= maxResults) return;

    const href = anchor[1].match(/href="([^"]+)"/);
    const url = href ? unwrapDuckDuckGoLink(href[1]) : null;
    if (!url) return;

    const title = stripHtml(anchor[2]);
    const snippet = snippets[index] ? stripHtml(snippets[index][1]) : '';

    results.push(
      SearchResultItemSchema.parse({
        url,
        title: title || url,
        description: snippet || title,
        source_name: 'general',
        tool_used: 'duckduckgo_search',
        published_date: '',
        is_scrapping_required: true,
      })
    );
  });

  return results;
}

export class DuckDuckGoTool {
  static async search(query: string, maxResults = 5): Promise<SearchResultItem[]> {
    Logger.info('🦆 DuckDuckGo search', { query, maxResults });

    const response = await HttpTool.fetch(`${DDG_HTML_URL}?q=${encodeURIComponent(query)}`, {
      timeout: 15000,
      maxRetries: 2,
    });
    return parseDuckDuckGoHtml(response.text, maxResults);
  }
}
