/**
 * HTTP Tool - Fetch content from URLs with timeout and retry support
 */

import type { z } from 'zod';
import { Logger, retry } from '../utils';

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
}

export interface HttpOptions {
  method?: 'GET' | 'POST';
  body?: string;
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
}

export const USER_AGENT = 'Mozilla/5.0 (compatible; PodcastResearchBot/1.0)';

export class HttpTool {
  static async fetch(url: string, options: HttpOptions = {}): Promise<HttpResponse> {
    const { method = 'GET', body, headers = {}, timeout = 15000, maxRetries = 3 } = options;

    Logger.debug('HTTP fetch', { url, method });

    return retry(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
          const response = await fetch(url, {
            method,
            body,
            headers: {
              'User-Agent': USER_AGENT,
              ...headers,
            },
            signal: controller.signal,
          });

          if (!response.ok) {
            throw new Error(`HTTP ${response.status}: ${response.statusText}`);
          }

          const text = await response.text();

          return {
            status: response.status,
            text,
            contentType: response.headers.get('content-type') || 'text/plain',
            url: response.url || url,
          };
        } finally {
          clearTimeout(timeoutId);
        }
      },
      {
        maxRetries,
        delayMs: 1000,
        backoff: true,
        onError: (error, attempt) => {
          Logger.warn(`HTTP fetch failed (attempt ${attempt})`, { url, error: error.message });
        },
      }
    );
  }

  /**
   * Fetch and validate a JSON body
   */
  static async fetchJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: HttpOptions = {}
  ): Promise<T> {
    const response = await HttpTool.fetch(url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    });
    return schema.parse(JSON.parse(response.text));
  }
}
