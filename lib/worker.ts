/**
 * Chat worker - runs chat turns as background tasks.
 *
 * Turns for the same session run one at a time; turns for different
 * sessions share a bounded pool of WORKER_CONCURRENCY slots.
 */

import { Config } from './config';
import { Crypto, Logger, errorMessage } from './utils';
import { RateLimiter } from './utils/openai-helper';
import { BaseAgent } from './agents/base';
import { PodcastChatAgent, type PodcastChatInput, type PodcastChatOutput } from './agents/podcast-chat';
import type { ChatTask, ChatTaskResult } from './types';

export interface ChatRunner {
  run(sessionId: string, input: PodcastChatInput): Promise<PodcastChatOutput>;
}

export type ChatHandler = (sessionId: string, message: string) => Promise<ChatTaskResult>;

let chatAgent: PodcastChatAgent | null = null;

function getChatAgent(): PodcastChatAgent {
  if (!chatAgent) {
    chatAgent = new PodcastChatAgent();
  }
  return chatAgent;
}

export function errorTaskResult(sessionId: string, error: unknown): ChatTaskResult {
  return {
    session_id: sessionId,
    response: `I'm sorry, I encountered an error: ${errorMessage(error)}. Please try again.`,
    stage: 'error',
    session_state: '{}',
    is_processing: false,
    process_type: null,
  };
}

/**
 * One chat turn; never throws. The session's API call counts are logged and
 * dropped once the turn ends.
 */
export async function processChatMessage(
  sessionId: string,
  message: string,
  agent: ChatRunner = getChatAgent()
): Promise<ChatTaskResult> {
  try {
    const output = await agent.run(sessionId, { message });
    Logger.info('Chat turn API calls', {
      sessionId,
      total: BaseAgent.getTotalApiCalls(sessionId),
      byAgent: BaseAgent.getApiCalls(sessionId),
    });
    return {
      session_id: sessionId,
      response: output.response,
      stage: output.stage,
      session_state: JSON.stringify(output.state),
      is_processing: false,
      process_type: null,
    };
  } catch (error) {
    Logger.error('Chat turn failed', { sessionId, error: errorMessage(error) });
    return errorTaskResult(sessionId, error);
  } finally {
    BaseAgent.clearApiCalls(sessionId);
  }
}

/**
 * Serializes work per key by chaining onto the key's last promise
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export class ChatWorker {
  private tasks = new Map<string, ChatTask>();
  private pending = new Map<string, Promise<ChatTaskResult>>();
  private pool: RateLimiter;
  private locks = new SessionLock();

  constructor(
    private handler: ChatHandler = processChatMessage,
    concurrency: number = Config.WORKER_CONCURRENCY,
    private taskTtlMs: number = 60 * 60 * 1000
  ) {
    this.pool = new RateLimiter(concurrency, 0);
  }

  /**
   * Queue a chat turn; returns the task id. Finished tasks older than the
   * task TTL are dropped first.
   */
  submit(sessionId: string, message: string): string {
    this.clearOldTasks();

    const task: ChatTask = {
      task_id: Crypto.uuid(),
      session_id: sessionId,
      message,
      status: 'queued',
      submitted_at: new Date().toISOString(),
    };
    this.tasks.set(task.task_id, task);

    const promise = this.locks.run(sessionId, () => this.pool.execute(() => this.runTask(task)));
    this.pending.set(task.task_id, promise);

    Logger.info('📥 Chat task queued', {
      taskId: task.task_id,
      sessionId,
      active: this.pool.active,
      waiting: this.pool.waiting,
    });
    return task.task_id;
  }

  wait(taskId: string): Promise<ChatTaskResult> {
    const promise = this.pending.get(taskId);
    if (!promise) {
      return Promise.reject(new Error(`Unknown task ${taskId}`));
    }
    return promise;
  }

  getTask(taskId: string): ChatTask | undefined {
    return this.tasks.get(taskId);
  }

  isSessionBusy(sessionId: string): boolean {
    return this.locks.isLocked(sessionId);
  }

  /**
   * Forget finished tasks older than maxAgeMs; returns how many were removed
   */
  clearOldTasks(maxAgeMs: number = this.taskTtlMs, now: number = Date.now()): number {
    let removed = 0;
    for (const [taskId, task] of this.tasks) {
      if (!task.completed_at) continue;
      if (now - new Date(task.completed_at).getTime() > maxAgeMs) {
        this.tasks.delete(taskId);
        this.pending.delete(taskId);
        removed++;
      }
    }
    return removed;
  }

  private async runTask(task: ChatTask): Promise<ChatTaskResult> {
    task.status = 'running';
    task.started_at = new Date().toISOString();
    const startTime = Date.now();

    let result: ChatTaskResult;
    try {
      result = await this.handler(task.session_id, task.message);
      task.status = 'completed';
    } catch (error) {
      Logger.error('Chat task failed', { taskId: task.task_id, error: errorMessage(error) });
      result = errorTaskResult(task.session_id, error);
      task.status = 'failed';
    }

    task.result = result;
    task.completed_at = new Date().toISOString();
    Logger.info('📤 Chat task finished', {
      taskId: task.task_id,
      status: task.status,
      duration_ms: Date.now() - startTime,
    });
    return result;
  }
}

let chatWorker: ChatWorker | null = null;

export function getChatWorker(): ChatWorker {
  if (!chatWorker) {
    chatWorker = new ChatWorker();
  }
  return chatWorker;
}
