/**
 * Shared fakes for agent tests
 */

import type OpenAI from 'openai';
import type { ChatClient } from '../lib/utils/openai-helper';
import { SearchResultItemSchema } from '../lib/schemas';
import type { SearchResultInput, SearchResultItem } from '../lib/types';

type Params = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type Reply = OpenAI.Chat.ChatCompletion | ((params: Params) => OpenAI.Chat.ChatCompletion);

const DEFAULT_USAGE = { prompt_tokens: 100, completion_tokens: 20, total_tokens: 120 };

function completion(message: OpenAI.Chat.ChatCompletionMessage, finishReason: 'stop' | 'tool_calls') {
  const result: OpenAI.Chat.ChatCompletion = {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, finish_reason: finishReason, logprobs: null, message }],
    usage: DEFAULT_USAGE,
  };
  return result;
}

export function textReply(content: string): OpenAI.Chat.ChatCompletion {
  return completion({ role: 'assistant', content, refusal: null }, 'stop');
}

export function toolReply(
  calls: Array<{ name: string; args: unknown; id?: string }>
): OpenAI.Chat.ChatCompletion {
  return completion(
    {
      role: 'assistant',
      content: null,
      refusal: null,
      tool_calls: calls.map((call, index) => ({
        id: call.id ?? `call_${index + 1}`,
        type: 'function',
        function: { name: call.name, arguments: JSON.stringify(call.args) },
      })),
    },
    'tool_calls'
  );
}

/**
 * Answers with scripted replies in order and records every request
 */
export class FakeChatClient implements ChatClient {
  readonly requests: Params[] = [];

  constructor(private replies: Reply[]) {}

  async complete(params: Params): Promise<OpenAI.Chat.ChatCompletion> {
    this.requests.push({ ...params, messages: [...params.messages] });
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('FakeChatClient has no reply left');
    }
    return typeof reply === 'function' ? reply(params) : reply;
  }
}

export function messageText(message: OpenAI.Chat.ChatCompletionMessageParam): string {
  return typeof message.content === 'string' ? message.content : '';
}

export function searchResult(overrides: SearchResultInput): SearchResultItem {
  return SearchResultItemSchema.parse({
    title: 'Untitled',
    description: 'A description',
    source_name: 'general',
    tool_used: 'duckduckgo_search',
    ...overrides,
  });
}
