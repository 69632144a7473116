/**
 * Search providers exposed to agents as tools. Each tool answers with a
 * string: results as JSON, or a message telling the model to try another tool.
 */

import { z } from 'zod';
import { Logger, errorMessage } from '../utils';
import { defineTool, type AgentTool } from '../agents/tools';
import { TavilyTool } from './tavily';
import { GoogleNewsTool } from './google-news';
import { DuckDuckGoTool } from './duckduckgo';
import { WikipediaTool } from './wikipedia';
import { HackerNewsTool } from './hackernews';

const queryParameters = (description: string): Record<string, unknown> => ({
  type: 'object',
  properties: {
    query: { type: 'string', description },
    max_results: { type: 'integer', minimum: 1, maximum: 10 },
  },
  required: ['query'],
});

const QueryArgs = z.object({
  query: z.string().min(1),
  max_results: z.number().int().min(1).max(10).optional(),
});

export const tavilySearchTool = defineTool({
  name: 'tavily_search',
  description:
    'Advanced web search for recent, high-quality articles on a topic. Best first choice for news.',
  parameters: queryParameters('Search query'),
  schema: QueryArgs,
  execute: async ({ query, max_results }) => {
    if (!TavilyTool.isConfigured()) {
      return 'Error: TAVILY_API_KEY not found. Use another search tool.';
    }
    try {
      const results = await TavilyTool.search(query, max_results ?? 10);
      if (results.length === 0) {
        return 'No Tavily search results found for this query. Try other search tools.';
      }
      return `for all results is_scrapping_required: True, results: ${JSON.stringify(results)}`;
    } catch (error) {
      Logger.error('Tavily search failed', { query, error: errorMessage(error) });
      return `Error in Tavily search: ${errorMessage(error)}`;
    }
  },
});

export const googleNewsTool = defineTool({
  name: 'google_news_discovery',
  description:
    'Discover current news articles from Google News by keyword, or the top headlines when top_news is true.',
  parameters: {
    type: 'object',
    properties: {
      keyword: { type: 'string' },
      top_news: { type: 'boolean' },
      max_results: { type: 'integer', minimum: 1, maximum: 10 },
    },
  },
  schema: z.object({
    keyword: z.string().nullish(),
    top_news: z.boolean().nullish(),
    max_results: z.number().int().min(1).max(10).nullish(),
  }),
  execute: async ({ keyword, top_news, max_results }) => {
    if (!keyword && !top_news) {
      return 'Error: Either keyword or top_news must be provided.';
    }
    try {
      const results = await new GoogleNewsTool().discover({
        keyword: keyword ?? undefined,
        topNews: top_news ?? false,
        maxResults: max_results ?? 5,
      });
      if (results.length === 0) {
        return 'No Google News results found. Try other search tools.';
      }
      return JSON.stringify(results);
    } catch (error) {
      Logger.error('Google News discovery failed', { keyword, error: errorMessage(error) });
      return `Error in Google News discovery: ${errorMessage(error)}`;
    }
  },
});

export const duckDuckGoTool = defineTool({
  name: 'duckduckgo_search',
  description: 'General web search through DuckDuckGo.',
  parameters: queryParameters('Search query'),
  schema: QueryArgs,
  execute: async ({ query, max_results }) => {
    try {
      const results = await DuckDuckGoTool.search(query, max_results ?? 5);
      if (results.length === 0) {
        return 'No DuckDuckGo results found. Try other search tools.';
      }
      return JSON.stringify(results);
    } catch (error) {
      Logger.error('DuckDuckGo search failed', { query, error: errorMessage(error) });
      return `Error in DuckDuckGo search: ${errorMessage(error)}`;
    }
  },
});

export const wikipediaTool = defineTool({
  name: 'wikipedia_search',
  description: 'Background and encyclopedic context from Wikipedia. Use as a last resort for news.',
  parameters: queryParameters('Search query'),
  schema: QueryArgs,
  execute: async ({ query, max_results }) => {
    try {
      const results = await WikipediaTool.search(query, max_results ?? 5);
      if (results.length === 0) {
        return 'No Wikipedia articles found.';
      }
      return JSON.stringify(results);
    } catch (error) {
      Logger.error('Wikipedia search failed', { query, error: errorMessage(error) });
      return `Error in Wikipedia search: ${errorMessage(error)}`;
    }
  },
});

export const hackerNewsTools: AgentTool[] = [
  defineTool({
    name: 'get_top_hackernews_stories',
    description: 'Get the current top stories on HackerNews.',
    parameters: {
      type: 'object',
      properties: { num_stories: { type: 'integer', minimum: 1, maximum: 30 } },
    },
    schema: z.object({ num_stories: z.number().int().min(1).max(30).nullish() }),
    execute: async ({ num_stories }) => {
      try {
        return JSON.stringify(await HackerNewsTool.getTopStories(num_stories ?? 10));
      } catch (error) {
        return `Error fetching HackerNews stories: ${errorMessage(error)}`;
      }
    },
  }),
  defineTool({
    name: 'get_hackernews_user_details',
    description: 'Get karma, bio and activity for a HackerNews user.',
    parameters: {
      type: 'object',
      properties: { username: { type: 'string' } },
      required: ['username'],
    },
    schema: z.object({ username: z.string().min(1) }),
    execute: async ({ username }) => {
      try {
        return JSON.stringify(await HackerNewsTool.getUserDetails(username));
      } catch (error) {
        return `Error fetching HackerNews user ${username}: ${errorMessage(error)}`;
      }
    },
  }),
  defineTool({
    name: 'search_hackernews',
    description: 'Search HackerNews stories by keyword.',
    parameters: queryParameters('Keywords'),
    schema: QueryArgs,
    execute: async ({ query, max_results }) => {
      try {
        return JSON.stringify(await HackerNewsTool.search(query, max_results ?? 10));
      } catch (error) {
        return `Error searching HackerNews: ${errorMessage(error)}`;
      }
    },
  }),
];

/**
 * Tools for the podcast search agent, in priority order
 */
export function createSearchTools(): AgentTool[] {
  return [tavilySearchTool, googleNewsTool, duckDuckGoTool, wikipediaTool];
}
