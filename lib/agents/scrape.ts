/**
 * Scrape Agent - pulls full article text for the session's search results
 */

import { BaseAgent, type AgentDeps } from './base';
import { Config } from '../config';
import { Logger, truncate } from '../utils';
import { ScraperTool, type ContentExtractor } from '../tools/scraper';
import { getSessionStore, type SessionStore } from '../db/session-store';
import type { SearchResultItem } from '../types';

const EXTRACTION_PROMPT = `You clean up text scraped from news web pages.
Return only the article body: drop navigation, cookie notices, ads, related-article lists and comments.
Keep the article's wording; do not summarize. If no article is present, return an empty string.`;

/**
 * LLM pass over heuristic page text
 */
export class ContentExtractionAgent
  extends BaseAgent<{ url: string; title: string; text: string }, string>
  implements ContentExtractor
{
  constructor(deps: AgentDeps = {}) {
    super(
      {
        name: 'ContentExtractionAgent',
        systemPrompt: EXTRACTION_PROMPT,
        temperature: 0,
        maxTokens: 8000,
        retries: 1,
      },
      { ...deps, storage: null }
    );
  }

  extract(page: { url: string; title: string; text: string }): Promise<string> {
    return this.process(page);
  }

  protected async process(page: { url: string; title: string; text: string }): Promise<string> {
    return this.callOpenAI([
      { role: 'system', content: this.config.systemPrompt },
      {
        role: 'user',
        content: `URL: ${page.url}\nTitle: ${page.title}\n\n${truncate(page.text, 30000)}`,
      },
    ]);
  }
}

export interface ScrapeOutput {
  attempted: number;
  succeeded: number;
  failed: number;
  summary: string;
}

export function needsScraping(item: SearchResultItem): boolean {
  return item.is_scrapping_required && !item.full_text;
}

export class ScrapeAgent extends BaseAgent<Record<string, never>, ScrapeOutput> {
  private sessions: SessionStore;
  private scraper: ScraperTool;

  constructor(deps: AgentDeps & { sessions?: SessionStore; scraper?: ScraperTool } = {}) {
    super(
      {
        name: 'ScrapeAgent',
        retries: 1,
      },
      deps
    );
    this.sessions = deps.sessions ?? getSessionStore();

    const useLlm = Config.SCRAPER_LLM_EXTRACTION && Config.OPENAI_API_KEY.length > 0;
    this.scraper = deps.scraper ?? new ScraperTool(useLlm ? new ContentExtractionAgent(deps) : null);
  }

  protected async process(_input: Record<string, never>, sessionId: string): Promise<ScrapeOutput> {
    const state = this.sessions.getState(sessionId);
    const pending = state.search_results.filter(needsScraping);

    if (state.search_results.length === 0) {
      return {
        attempted: 0,
        succeeded: 0,
        failed: 0,
        summary: 'No search results to scrape. Run a search first.',
      };
    }
    if (pending.length === 0) {
      return {
        attempted: 0,
        succeeded: 0,
        failed: 0,
        summary: 'All sources already have full text. Ready for source selection.',
      };
    }

    const results = await this.scraper.scrapeUrls(pending.map(item => item.url));
    const byUrl = new Map(results.map(result => [result.original_url, result]));

    // Merge into the latest stored state
    const fresh = this.sessions.updateState(sessionId, latest => {
      for (const item of latest.search_results) {
        const result = byUrl.get(item.url);
        if (!result) continue;
        if (result.success) {
          item.full_text = result.full_text;
          item.final_url = result.final_url;
          item.scraped = true;
          delete item.scrape_error;
          if (!item.published_date && result.published_date) {
            item.published_date = result.published_date;
          }
        } else {
          item.scraped = false;
          item.scrape_error = result.error;
        }
      }
      latest.stage = 'scrape';
      return latest;
    });

    const succeeded = results.filter(result => result.success).length;
    const failed = results.length - succeeded;
    Logger.info('📄 Scrape complete', {
      sessionId,
      succeeded,
      failed,
      sources: fresh.search_results.length,
    });

    const failureNote =
      failed > 0 ? ` ${failed} could not be scraped and will use their search descriptions.` : '';
    return {
      attempted: results.length,
      succeeded,
      failed,
      summary: `Scraped full text for ${succeeded} of ${results.length} sources.${failureNote}`,
    };
  }
}
