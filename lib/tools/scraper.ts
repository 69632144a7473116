/**
 * Scraper Tool - fetch article pages in parallel and pull out readable text
 */

import { Config } from '../config';
import { Logger, cleanText, decodeEntities, errorMessage, stripHtml } from '../utils';
import { HttpTool } from './http';
import type { ScrapeResult } from '../types';

/**
 * Optional second pass that cleans heuristic text (usually an LLM)
 */
export interface ContentExtractor {
  extract(page: { url: string; title: string; text: string }): Promise<string>;
}

export interface PageMetadata {
  title: string;
  authors: string[];
  published_date: string | null;
}

function metaContent(html: string, key: string): string[] {
  const values: string[] = [];
  const tags = html.match(/<meta\b[^>]*>/gi) ?? [];
  for (const tag of tags) {
    const name = tag.match(/(?:name|property|itemprop)\s*=\s*["']([^"']+)["']/i);
    const content = tag.match(/content\s*=\s*["']([^"']*)["']/i);
    if (name && content && name[1].toLowerCase() === key) {
      values.push(cleanText(decodeEntities(content[1])));
    }
  }
  return values.filter(Boolean);
}

export function extractMetadata(html: string): PageMetadata {
  const titleTag = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  const title =
    metaContent(html, 'og:title')[0] ||
    (titleTag ? stripHtml(titleTag[1]) : '');

  const authors = [
    ...metaContent(html, 'author'),
    ...metaContent(html, 'article:author'),
  ].filter((author, index, all) => all.indexOf(author) === index);

  const timeTag = html.match(/<time[^>]*datetime\s*=\s*["']([^"']+)["']/i);
  const published_date =
    metaContent(html, 'article:published_time')[0] ||
    metaContent(html, 'datepublished')[0] ||
    metaContent(html, 'date')[0] ||
    (timeTag ? timeTag[1] : null);

  return { title, authors, published_date };
}

/**
 * Main article text by markup heuristics
 */
export function extractMainContent(html: string, maxChars: number = Config.SCRAPE_MAX_CHARS): string {
  let text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<noscript\b[\s\S]*?<\/noscript>/gi, '')
    .replace(/<(nav|header|footer|aside|form)\b[\s\S]*?<\/\1>/gi, '');

  const contentPatterns = [
    /<article[^>]*>([\s\S]*?)<\/article>/i,
    /<main[^>]*>([\s\S]*?)<\/main>/i,
    /<div[^>]*class="[^"]*(?:article|post|content|entry|story)[^"]*"[^>]*>([\s\S]*?)<\/div>/i,
    /<div[^>]*id="[^"]*(?:article|post|content|entry|story)[^"]*"[^>]*>([\s\S]*?)<\/div>/i,
    /<body[^>]*>([\s\S]*?)<\/body>/i,
  ];

  for (const pattern of contentPatterns) {
    const match = text.match(pattern);
    if (match && match[1] && stripHtml(match[1]).length > 0) {
      text = match[1];
      break;
    }
  }

  text = stripHtml(text);
  return text.length > maxChars ? text.substring(0, maxChars) : text;
}

export class ScraperTool {
  constructor(private extractor: ContentExtractor | null = null) {}

  async scrapeUrl(url: string): Promise<ScrapeResult> {
    try {
      const response = await HttpTool.fetch(url, {
        timeout: Config.SCRAPE_TIMEOUT_MS,
        maxRetries: 1,
        headers: { Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9' },
      });

      const isHtml = /html|xml/i.test(response.contentType);
      if (!isHtml && !/^text\//i.test(response.contentType)) {
        throw new Error(`Unsupported content type: ${response.contentType}`);
      }

      const metadata = isHtml
        ? extractMetadata(response.text)
        : { title: '', authors: [], published_date: null };
      let fullText = isHtml
        ? extractMainContent(response.text)
        : cleanText(response.text).substring(0, Config.SCRAPE_MAX_CHARS);

      if (this.extractor && fullText.length > 200) {
        try {
          const extracted = await this.extractor.extract({ url, title: metadata.title, text: fullText });
          if (extracted.trim()) {
            fullText = extracted.trim().substring(0, Config.SCRAPE_MAX_CHARS);
          }
        } catch (error) {
          Logger.warn('Content extraction failed, keeping heuristic text', {
            url,
            error: errorMessage(error),
          });
        }
      }

      if (!fullText) {
        throw new Error('No readable content found');
      }

      return {
        original_url: url,
        final_url: response.url,
        title: metadata.title,
        authors: metadata.authors,
        published_date: metadata.published_date,
        full_text: fullText,
        success: true,
      };
    } catch (error) {
      Logger.warn('Scrape failed', { url, error: errorMessage(error) });
      return {
        original_url: url,
        error: errorMessage(error),
        success: false,
        timestamp: new Date().toISOString(),
      };
    }
  }

  /**
   * Scrape every URL concurrently; results keep the input order
   */
  async scrapeUrls(urls: string[]): Promise<ScrapeResult[]> {
    Logger.info('🕷️ Scraping URLs', { count: urls.length, llmExtraction: !!this.extractor });
    const results = await Promise.all(urls.map(url => this.scrapeUrl(url)));

    const succeeded = results.filter(result => result.success).length;
    Logger.info('Scraping complete', { succeeded, failed: results.length - succeeded });
    return results;
  }
}
