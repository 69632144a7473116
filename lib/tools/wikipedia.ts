/**
 * Wikipedia Tool - article search through the MediaWiki API
 */

import { z } from 'zod';
import { Logger, stripHtml } from '../utils';
import { HttpTool } from './http';
import { SearchResultItemSchema, type SearchResultItem } from '../schemas';

const WikipediaSearchSchema = z.object({
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string(),
            snippet: z.string().default(''),
            timestamp: z.string().optional(),
          })
        )
        .default([]),
    })
    .default({ search: [] }),
});

export function wikipediaArticleUrl(title: string, language = 'en'): string {
  return `https://${language}.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;
}

export class WikipediaTool {
  static async search(query: string, maxResults = 5, language = 'en'): Promise<SearchResultItem[]> {
    Logger.info('📚 Wikipedia search', { query, maxResults });

    const url =
      `https://${language}.wikipedia.org/w/api.php?action=query&list=search&format=json` +
      `&srlimit=${maxResults}&srsearch=${encodeURIComponent(query)}`;
    const response = await HttpTool.fetchJson(url, WikipediaSearchSchema, {
      timeout: 15000,
      maxRetries: 2,
    });

    return response.query.search.map(page =>
      SearchResultItemSchema.parse({
        url: wikipediaArticleUrl(page.title, language),
        title: page.title,
        description: stripHtml(page.snippet),
        source_name: 'wikipedia',
        tool_used: 'wikipedia_search',
        published_date: page.timestamp ?? '',
        is_scrapping_required: true,
      })
    );
  }
}
