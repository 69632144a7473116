/**
 * Search Agent - finds exactly five sources for a podcast topic
 */

import { BaseAgent, type AgentDeps } from './base';
import { Config } from '../config';
import { Clock, Logger, parseJsonObject } from '../utils';
import { SearchResultsSchema, type SearchResultItem } from '../schemas';
import { getSessionStore, type SessionStore } from '../db/session-store';
import { createSearchTools } from '../tools/search-tools';
import type { AgentTool } from './tools';

export interface SearchInput {
  query: string;
}

export interface SearchOutput {
  items: SearchResultItem[];
  summary: string;
  tools_used: string[];
}

const SEARCH_PROMPT = `You are a news research assistant collecting sources for a podcast episode.

Use the search tools in this order of preference, moving on only when a tool errors or returns nothing useful:
1. tavily_search
2. google_news_discovery
3. duckduckgo_search
4. wikipedia_search

Rules:
- Return exactly 5 sources, preferring recent, reputable, distinct articles.
- Never invent URLs. Only use results returned by the tools.
- Keep each tool's values for source_name, tool_used, published_date and is_scrapping_required.

When you are done, answer with a JSON object only:
{"items": [{"url": "...", "title": "...", "description": "...", "source_name": "...", "tool_used": "...", "published_date": "...", "is_scrapping_required": true}]}`;

/**
 * Trim to `cap` results; fewer than `cap` is allowed but logged
 */
export function capSearchResults(
  items: SearchResultItem[],
  cap: number = Config.SEARCH_RESULT_CAP
): SearchResultItem[] {
  const seen = new Set<string>();
  const unique = items.filter(item => {
    if (seen.has(item.url)) return false;
    seen.add(item.url);
    return true;
  });

  if (unique.length > cap) {
    Logger.info('Trimming search results', { found: unique.length, cap });
    return unique.slice(0, cap);
  }
  if (unique.length < cap) {
    Logger.warn('Fewer search results than expected', { found: unique.length, expected: cap });
  }
  return unique;
}

export class SearchAgent extends BaseAgent<SearchInput, SearchOutput> {
  private sessions: SessionStore;
  private tools: AgentTool[];

  constructor(
    deps: AgentDeps & { sessions?: SessionStore; tools?: AgentTool[] } = {}
  ) {
    super(
      {
        name: 'SearchAgent',
        systemPrompt: SEARCH_PROMPT,
        temperature: 0.2,
        maxTokens: 4000,
        retries: 2,
      },
      deps
    );
    this.sessions = deps.sessions ?? getSessionStore();
    this.tools = deps.tools ?? createSearchTools();
  }

  protected async process(input: SearchInput, sessionId: string): Promise<SearchOutput> {
    const { query } = input;

    const result = await this.runTools(
      [
        { role: 'system', content: this.config.systemPrompt },
        {
          role: 'user',
          content: `Today is ${Clock.toDateString(Clock.nowUtc())}. Find sources about: ${query}`,
        },
      ],
      this.tools,
      { sessionId },
      { responseFormat: 'json_object' }
    );

    const parsed = SearchResultsSchema.safeParse(parseJsonObject(result.content));
    if (!parsed.success) {
      throw new Error(`Search results were malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const items = capSearchResults(parsed.data.items);

    this.sessions.updateState(sessionId, state => {
      state.stage = 'search';
      state.search_results = items;
    });

    return {
      items,
      summary: `Found ${items.length} sources about ${query} and added to the search_results`,
      tools_used: [...new Set(result.toolCalls.map(call => call.name))],
    };
  }
}
