import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { SearchAgent, capSearchResults } from '../lib/agents/search';
import { defineTool } from '../lib/agents/tools';
import { SessionStore } from '../lib/db/session-store';
import { FakeChatClient, searchResult, textReply, toolReply } from './helpers';

const urls = (count: number) => Array.from({ length: count }, (_, i) => `https://example.com/${i + 1}`);

describe('capSearchResults', () => {
  it('drops duplicates and trims to the cap', () => {
    const items = [...urls(6), 'https://example.com/1'].map(url => searchResult({ url }));
    expect(capSearchResults(items, 5).map(item => item.url)).toEqual(urls(5));
  });

  it('keeps short lists as they are', () => {
    const items = urls(3).map(url => searchResult({ url }));
    expect(capSearchResults(items, 5)).toHaveLength(3);
  });
});

describe('SearchAgent', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('stores five sources from the tool results', async () => {
    const fakeSearch = defineTool({
      name: 'duckduckgo_search',
      description: 'fake',
      parameters: { type: 'object', properties: { query: { type: 'string' } } },
      schema: z.object({ query: z.string() }),
      execute: async () => JSON.stringify(urls(6).map(url => ({ url }))),
    });
    const client = new FakeChatClient([
      toolReply([{ name: 'duckduckgo_search', args: { query: 'mars rover' } }]),
      textReply(JSON.stringify({ items: urls(6).map(url => ({ url, title: `Story ${url.slice(-1)}` })) })),
    ]);
    const agent = new SearchAgent({
      client,
      costTracker: null,
      storage: null,
      sessions: store,
      tools: [fakeSearch],
    });

    const output = await agent.run('session-1', { query: 'mars rover' });

    expect(output.summary).toBe('Found 5 sources about mars rover and added to the search_results');
    expect(output.tools_used).toEqual(['duckduckgo_search']);
    expect(client.requests[0].response_format).toEqual({ type: 'json_object' });

    const state = store.getState('session-1');
    expect(state.stage).toBe('search');
    expect(state.search_results.map(item => item.url)).toEqual(urls(5));
    expect(state.search_results[0]).toEqual({
      url: 'https://example.com/1',
      title: 'Story 1',
      description: '',
      source_name: 'general',
      tool_used: 'unknown',
      published_date: '',
      is_scrapping_required: true,
    });
  });
});
