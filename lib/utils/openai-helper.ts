/**
 * OpenAI API Helper with Rate Limiting and Retry Logic
 */

import OpenAI from 'openai';
import { Logger, sleep, errorMessage } from '../utils';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

function errorStatus(error: unknown): { status?: number; code?: string } {
  if (error instanceof OpenAI.APIError) {
    return { status: error.status, code: error.code ?? undefined };
  }
  return {};
}

/**
 * Retry wrapper with exponential backoff for OpenAI API calls
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffMultiplier = 2,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      const { status, code } = errorStatus(error);
      const message = errorMessage(error);

      const isRateLimit =
        status === 429 ||
        code === 'rate_limit_exceeded' ||
        message.toLowerCase().includes('rate limit');

      const isRetryable =
        isRateLimit ||
        status === 500 ||
        status === 502 ||
        status === 503 ||
        status === 504;

      if (!isRetryable) {
        Logger.error('Non-retryable OpenAI error', {
          attempt,
          status,
          code,
          error: message,
        });
        throw error;
      }

      if (attempt >= maxRetries) {
        Logger.error('Max retries exceeded', {
          maxRetries,
          lastError: message,
        });
        throw error;
      }

      const delay = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt),
        maxDelayMs
      );

      // Jitter up to 30%
      const finalDelay = delay + Math.random() * 0.3 * delay;

      Logger.warn('Rate limit hit, retrying with backoff', {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(finalDelay),
        isRateLimit,
      });

      await sleep(finalDelay);
    }
  }

  throw lastError;
}

/**
 * Create OpenAI chat completion with retry logic
 */
export async function createChatCompletion(
  client: OpenAI,
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  retryOptions?: RetryOptions
): Promise<OpenAI.Chat.ChatCompletion> {
  return retryWithBackoff(
    () => client.chat.completions.create(params),
    retryOptions
  );
}

/**
 * Create OpenAI TTS with retry logic
 */
export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams,
  retryOptions?: RetryOptions
): Promise<Response> {
  return retryWithBackoff(
    () => client.audio.speech.create(params),
    retryOptions
  );
}

/**
 * The slice of the OpenAI client the agents depend on
 */
export interface ChatClient {
  complete(
    params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    retryOptions?: RetryOptions
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

export class OpenAIChatClient implements ChatClient {
  constructor(private client: OpenAI) {}

  complete(
    params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    retryOptions?: RetryOptions
  ): Promise<OpenAI.Chat.ChatCompletion> {
    return createChatCompletion(this.client, params, retryOptions);
  }
}

/**
 * Bounds concurrent work and spaces out call starts
 */
export class RateLimiter {
  private queue: Array<() => void> = [];
  private activeCount = 0;
  private lastCallTime = 0;

  constructor(
    private maxConcurrent: number = 5,
    private minDelayMs: number = 200
  ) {}

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(): Promise<void> {
    while (this.activeCount >= this.maxConcurrent) {
      await new Promise<void>(resolve => {
        this.queue.push(resolve);
      });
    }

    this.activeCount++;

    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    this.lastCallTime = Math.max(now, this.lastCallTime + this.minDelayMs);
    if (this.minDelayMs > 0 && timeSinceLastCall < this.minDelayMs) {
      await sleep(this.minDelayMs - timeSinceLastCall);
    }
  }

  release(): void {
    this.activeCount--;
    const resolve = this.queue.shift();
    if (resolve) {
      resolve();
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
