/**
 * Tavily Tool - web search through the Tavily API
 */

import { z } from 'zod';
import { Config } from '../config';
import { Logger, truncate } from '../utils';
import { HttpTool } from './http';
import { SearchResultItemSchema, type SearchResultItem } from '../schemas';

const TAVILY_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string(),
        content: z.string().nullish(),
        published_date: z.string().nullish(),
      })
    )
    .default([]),
});

export class TavilyTool {
  static isConfigured(): boolean {
    return Config.TAVILY_API_KEY.length > 0;
  }

  static async search(query: string, maxResults = 10): Promise<SearchResultItem[]> {
    if (!TavilyTool.isConfigured()) {
      throw new Error('TAVILY_API_KEY is not set');
    }

    Logger.info('🔎 Tavily search', { query, maxResults });

    const response = await HttpTool.fetchJson(TAVILY_URL, TavilyResponseSchema, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${Config.TAVILY_API_KEY}`,
      },
      body: JSON.stringify({
        query,
        search_depth: 'advanced',
        max_results: maxResults,
        include_answer: false,
        include_raw_content: false,
      }),
      timeout: 30000,
      maxRetries: 2,
    });

    return response.results.map(result =>
      SearchResultItemSchema.parse({
        url: result.url,
        title: result.title || result.url,
        description: truncate(result.content || result.title || '', 500),
        source_name: 'general',
        tool_used: 'tavily_search',
        published_date: result.published_date ?? '',
        is_scrapping_required: true,
      })
    );
  }
}
