/**
 * Base Agent class - Foundation for all agents in the system
 */

import { AsyncLocalStorage } from 'async_hooks';
import OpenAI from 'openai';
import { Config } from '../config';
import { Logger, retry, errorMessage } from '../utils';
import type { AgentMessage } from '../types';
import { StorageTool } from '../tools/storage';
import { getCostTracker, type CostTracker } from '../db/cost-tracker';
import { OpenAIChatClient, type ChatClient } from '../utils/openai-helper';
import { toOpenAITool, type AgentTool, type ToolContext } from './tools';

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

export interface AgentConfig {
  name: string;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
  retries?: number;
  maxToolSteps?: number;
}

export interface AgentDeps {
  client?: ChatClient;
  /** `null` disables cost tracking */
  costTracker?: CostTracker | null;
  /** `null` disables agent message storage */
  storage?: StorageTool | null;
}

export interface CallOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json_object';
}

export interface ToolCallRecord {
  name: string;
  arguments: string;
  result: string;
}

export interface ToolRunResult {
  content: string;
  toolCalls: ToolCallRecord[];
  steps: number;
}

type ResolvedAgentConfig = Required<AgentConfig>;

interface CallCounter {
  calls: number;
}

export abstract class BaseAgent<TInput, TOutput> {
  protected config: ResolvedAgentConfig;
  protected storage: StorageTool | null;
  protected costTracker: CostTracker | null;
  private chatClient?: ChatClient;

  // One counter per execute() call
  private static callCounter = new AsyncLocalStorage<CallCounter>();

  private static runApiCalls: Map<string, Map<string, number>> = new Map();

  constructor(config: AgentConfig, deps: AgentDeps = {}) {
    this.config = {
      name: config.name,
      systemPrompt: config.systemPrompt ?? '',
      model: config.model ?? Config.OPENAI_MODEL,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 4000,
      timeout: config.timeout ?? Config.OPENAI_TIMEOUT_MS,
      retries: config.retries ?? 3,
      maxToolSteps: config.maxToolSteps ?? Config.AGENT_MAX_TOOL_STEPS,
    };

    this.chatClient = deps.client;
    this.costTracker = deps.costTracker === undefined ? getCostTracker() : deps.costTracker;
    this.storage = deps.storage === undefined ? new StorageTool() : deps.storage;
  }

  get name(): string {
    return this.config.name;
  }

  protected get client(): ChatClient {
    if (!this.chatClient) {
      this.chatClient = new OpenAIChatClient(
        new OpenAI({
          apiKey: Config.OPENAI_API_KEY,
          baseURL: Config.OPENAI_BASE_URL || undefined,
          timeout: this.config.timeout,
        })
      );
    }
    return this.chatClient;
  }

  /**
   * Main execution method - implements retry logic and error handling
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput>> {
    const startTime = Date.now();
    const counter: CallCounter = { calls: 0 };

    const message: AgentMessage<TInput, TOutput> = {
      agent: this.config.name,
      run_id: runId,
      timestamp: new Date().toISOString(),
      input,
      errors: [],
    };

    try {
      Logger.info(`${this.config.name} starting`, { runId });

      const output = await BaseAgent.callCounter.run(counter, () =>
        retry(() => this.process(input, runId), {
          maxRetries: this.config.retries,
          delayMs: 1000,
          backoff: true,
          onError: (error, attempt) => {
            Logger.warn(`${this.config.name} retry ${attempt}`, {
              error: error.message,
            });
          },
        })
      );

      message.output = output;
      message.duration_ms = Date.now() - startTime;
      message.api_calls = counter.calls;

      BaseAgent.trackApiCalls(runId, this.config.name, counter.calls);

      Logger.info(`${this.config.name} completed`, {
        runId,
        api_calls: counter.calls,
        duration_ms: message.duration_ms,
      });

      await this.storeMessage(message);

      return message;
    } catch (error) {
      const messageText = errorMessage(error);
      message.errors.push(messageText);
      message.duration_ms = Date.now() - startTime;

      Logger.error(`${this.config.name} failed`, {
        runId,
        error: messageText,
        duration_ms: message.duration_ms,
      });

      await this.storeMessage(message);
      throw error;
    }
  }

  /**
   * execute() for callers that only need the output
   */
  async run(runId: string, input: TInput): Promise<TOutput> {
    const message = await this.execute(runId, input);
    if (message.output === undefined) {
      throw new Error(`${this.config.name} produced no output`);
    }
    return message.output;
  }

  protected abstract process(input: TInput, runId: string): Promise<TOutput>;

  /**
   * Single chat completion; returns the assistant text
   */
  protected async callOpenAI(
    messages: ChatMessage[],
    options: CallOptions = {}
  ): Promise<string> {
    const completion = await this.complete(messages, options);
    return completion.choices[0]?.message?.content || '';
  }

  /**
   * Tool-calling loop. Requested tools run in order and their results are fed
   * back until the model answers without tools or maxToolSteps is reached, at
   * which point one last call is made with tools disabled.
   */
  protected async runTools(
    messages: ChatMessage[],
    tools: AgentTool[],
    context: ToolContext,
    options: CallOptions & { maxSteps?: number } = {}
  ): Promise<ToolRunResult> {
    const maxSteps = options.maxSteps ?? this.config.maxToolSteps;
    const toolsByName = new Map(tools.map(tool => [tool.name, tool]));
    const toolCalls: ToolCallRecord[] = [];
    const conversation = [...messages];

    for (let step = 1; step <= maxSteps; step++) {
      const completion = await this.complete(conversation, options, tools, 'auto');
      const reply = completion.choices[0]?.message;
      if (!reply) {
        throw new Error(`${this.config.name}: model returned no choices`);
      }

      const requested = reply.tool_calls ?? [];
      if (requested.length === 0) {
        return { content: reply.content || '', toolCalls, steps: step };
      }

      conversation.push({
        role: 'assistant',
        content: reply.content,
        tool_calls: requested,
      });

      for (const call of requested) {
        const result = await this.invokeTool(toolsByName, call, context);
        toolCalls.push({
          name: call.function.name,
          arguments: call.function.arguments,
          result,
        });
        conversation.push({
          role: 'tool',
          tool_call_id: call.id,
          content: result,
        });
      }
    }

    Logger.warn(`${this.config.name} reached tool step limit`, { maxSteps });
    const final = await this.complete(conversation, options, tools, 'none');
    return {
      content: final.choices[0]?.message?.content || '',
      toolCalls,
      steps: maxSteps + 1,
    };
  }

  private async invokeTool(
    toolsByName: Map<string, AgentTool>,
    call: OpenAI.Chat.ChatCompletionMessageToolCall,
    context: ToolContext
  ): Promise<string> {
    const tool = toolsByName.get(call.function.name);
    if (!tool) {
      Logger.warn('Model requested unknown tool', {
        agent: this.config.name,
        tool: call.function.name,
      });
      return `Error: unknown tool ${call.function.name}`;
    }

    Logger.info(`🔧 ${this.config.name} calling ${tool.name}`, {
      sessionId: context.sessionId,
    });

    try {
      return await tool.invoke(call.function.arguments, context);
    } catch (error) {
      Logger.error(`Tool ${tool.name} failed`, { error: errorMessage(error) });
      return `Error: ${tool.name} failed: ${errorMessage(error)}`;
    }
  }

  private async complete(
    messages: ChatMessage[],
    options: CallOptions,
    tools: AgentTool[] = [],
    toolChoice?: 'auto' | 'none'
  ): Promise<OpenAI.Chat.ChatCompletion> {
    const {
      model = this.config.model,
      temperature = this.config.temperature,
      maxTokens = this.config.maxTokens,
      responseFormat = 'text',
    } = options;

    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens,
    };
    if (responseFormat === 'json_object') {
      params.response_format = { type: 'json_object' };
    }
    if (tools.length > 0) {
      params.tools = tools.map(toOpenAITool);
      params.tool_choice = toolChoice ?? 'auto';
    }

    const completion = await this.client.complete(params, {
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 10000,
      backoffMultiplier: 2,
    });

    const counter = BaseAgent.callCounter.getStore();
    if (counter) {
      counter.calls++;
    }
    this.trackCost(completion, model);

    return completion;
  }

  private trackCost(completion: OpenAI.Chat.ChatCompletion, model: string): void {
    if (!this.costTracker) return;
    try {
      this.costTracker.trackCompletion(completion, model, this.config.name);
    } catch (error) {
      Logger.warn('Failed to record API cost', {
        agent: this.config.name,
        error: errorMessage(error),
      });
    }
  }

  private static trackApiCalls(runId: string, agentName: string, count: number): void {
    const calls = this.runApiCalls.get(runId) ?? new Map<string, number>();
    calls.set(agentName, (calls.get(agentName) ?? 0) + count);
    this.runApiCalls.set(runId, calls);
  }

  /**
   * API call counts per agent for a run
   */
  static getApiCalls(runId: string): Record<string, number> {
    const calls = this.runApiCalls.get(runId);
    if (!calls) return {};

    const result: Record<string, number> = {};
    calls.forEach((count, agent) => {
      result[agent] = count;
    });
    return result;
  }

  static getTotalApiCalls(runId: string): number {
    const calls = this.runApiCalls.get(runId);
    if (!calls) return 0;

    let total = 0;
    calls.forEach(count => {
      total += count;
    });
    return total;
  }

  static clearApiCalls(runId: string): void {
    this.runApiCalls.delete(runId);
  }

  private async storeMessage(message: AgentMessage<TInput, TOutput>): Promise<void> {
    if (!this.storage || !Config.STORE_AGENT_MESSAGES) return;
    try {
      const path = `sessions/${message.run_id}/agents/${message.agent}.json`;
      await this.storage.put(path, JSON.stringify(message, null, 2), 'application/json');
    } catch (error) {
      Logger.warn('Failed to store agent message', {
        agent: this.config.name,
        error: errorMessage(error),
      });
    }
  }
}
