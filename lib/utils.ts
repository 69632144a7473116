/**
 * Utility functions
 */

import { createHash, randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export class Logger {
  static log(level: LogLevel, message: string, obj?: unknown) {
    if (level === 'debug' && process.env.LOG_LEVEL !== 'debug') {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj !== undefined && { data: obj }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: unknown) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: unknown) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: unknown) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: unknown) {
    this.log('debug', message, obj);
  }
}

export class Crypto {
  static sha256(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
  }

  static uuid(): string {
    return uuidv4();
  }

  static randomHex(bytes: number): string {
    return randomBytes(bytes).toString('hex');
  }
}

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }

  static toDateString(date: Date): string {
    return date.toISOString().split('T')[0];
  }

  /**
   * YYYYMMDD_HHMMSS in UTC, used for generated file names
   */
  static timestampSlug(date: Date): string {
    const iso = date.toISOString();
    return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    delayMs?: number;
    backoff?: boolean;
    onError?: (error: Error, attempt: number) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    onError,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (onError) {
        onError(lastError, attempt);
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError || new Error('Max retries exceeded');
}

export function extractDomain(url: string): string {
  try {
    const parsed = new URL(url);
    return parsed.hostname.replace(/^www\./, '');
  } catch {
    return 'unknown';
  }
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text) {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - suffix.length) + suffix;
}

export function cleanText(text: string): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .trim();
}

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&apos;': "'",
};

export function decodeEntities(text: string): string {
  return text
    .replace(/&(nbsp|amp|lt|gt|quot|apos|#39|#x27);/g, match => ENTITIES[match] ?? match)
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 10)));
}

export function stripHtml(html: string): string {
  return cleanText(decodeEntities(html.replace(/<[^>]+>/g, ' ')));
}

/**
 * Parse a JSON object out of model output, tolerating ```json fences
 */
export function parseJsonObject(text: string): unknown {
  let body = text.trim();
  const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    body = fenced[1].trim();
  }
  if (!body.startsWith('{') && !body.startsWith('[')) {
    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    if (start !== -1 && end > start) {
      body = body.slice(start, end + 1);
    }
  }
  return JSON.parse(body);
}
