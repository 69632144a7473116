import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  PodcastChatAgent,
  buildSystemPrompt,
  createAgentTools,
  describeSessionState,
} from '../lib/agents/podcast-chat';
import { SearchAgent } from '../lib/agents/search';
import { ScrapeAgent } from '../lib/agents/scrape';
import { ScriptAgent, NO_CONFIRMED_SOURCES } from '../lib/agents/script';
import { AudioAgent, NO_SCRIPT_MESSAGE } from '../lib/agents/audio';
import type { AgentTool } from '../lib/agents/tools';
import { SessionStore, createInitialSessionState } from '../lib/db/session-store';
import { ScraperTool } from '../lib/tools/scraper';
import { createSessionTools } from '../lib/tools/session-tools';
import type { TtsEngine } from '../lib/tools/tts';
import { FakeChatClient, messageText, searchResult, textReply, toolReply } from './helpers';

describe('system prompt', () => {
  it('summarizes the session state', () => {
    const state = createInitialSessionState();
    state.stage = 'scrape';
    state.title = 'Mars';
    state.search_results = [
      searchResult({ url: 'https://a', scraped: true, confirmed: true }),
      searchResult({ url: 'https://b', scraped: false }),
    ];

    expect(JSON.parse(describeSessionState(state))).toEqual({
      stage: 'scrape',
      title: 'Mars',
      language: { code: 'en', name: 'English' },
      tts_engine: null,
      sources: 2,
      scraped_sources: 1,
      confirmed_sources: 1,
      script_title: null,
      audio_url: null,
      finished: false,
    });
  });

  it('includes the date and state', () => {
    const prompt = buildSystemPrompt(createInitialSessionState(), new Date('2024-05-02T10:00:00Z'));
    expect(prompt).toContain('Today is 2024-05-02.');
    expect(prompt).toContain('Current session state:\n{\n  "stage": "welcome"');
  });
});

describe('pipeline agent tools', () => {
  let store: SessionStore;
  let tools: Map<string, AgentTool>;
  const ctx = { sessionId: 's1' };

  const failingEngine: TtsEngine = {
    name: 'openai',
    label: 'Fake',
    synthesize: async () => {
      throw new Error('voice unavailable');
    },
  };

  beforeEach(() => {
    store = new SessionStore(':memory:');
    const deps = { client: new FakeChatClient([]), costTracker: null, storage: null, sessions: store };
    tools = new Map(
      createAgentTools({
        search: new SearchAgent({ ...deps, tools: [] }),
        scrape: new ScrapeAgent({ ...deps, scraper: new ScraperTool() }),
        script: new ScriptAgent(deps),
        audio: new AudioAgent({
          ...deps,
          availableEngines: () => ({ openai: true, elevenlabs: false }),
          createEngine: () => failingEngine,
        }),
      }).map(tool => [tool.name, tool])
    );
  });

  afterEach(() => {
    store.close();
  });

  function invoke(name: string, args: unknown = {}): Promise<string> {
    const tool = tools.get(name);
    if (!tool) throw new Error(`missing tool ${name}`);
    return tool.invoke(JSON.stringify(args), ctx);
  }

  it('answers with each agent summary', async () => {
    expect(await invoke('scrape_agent_run')).toBe('No search results to scrape. Run a search first.');
    expect(await invoke('podcast_script_agent_run', { query: 'mars' })).toBe(NO_CONFIRMED_SOURCES);
    expect(await invoke('audio_generate_agent_run')).toBe(NO_SCRIPT_MESSAGE);
  });

  it('reports agent failures as strings', async () => {
    const state = createInitialSessionState();
    state.generated_script = {
      title: 'Mars Today',
      sources: [],
      sections: [{ type: 'intro', dialog: [{ speaker: 'ALEX', text: 'Hello' }] }],
    };
    store.saveSession('s1', state);

    expect(await invoke('audio_generate_agent_run')).toBe(
      'Error generating audio: All 1 TTS segments failed with Fake'
    );
  });
});

describe('PodcastChatAgent', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('runs tools, stores the turn and replays history', async () => {
    const client = new FakeChatClient([
      toolReply([{ name: 'update_chat_title', args: { title: 'Mars news' } }]),
      textReply('Great topic! Searching now.'),
      textReply('Sure, in German.'),
    ]);
    const agent = new PodcastChatAgent({
      client,
      costTracker: null,
      storage: null,
      sessions: store,
      tools: createSessionTools(store),
    });

    const first = await agent.run('s1', { message: 'Make a podcast about Mars' });
    expect(first.response).toBe('Great topic! Searching now.');
    expect(first.tools_used).toEqual(['update_chat_title']);
    expect(first.state.title).toBe('Mars news');
    expect(first.stage).toBe('welcome');

    await agent.run('s1', { message: 'In German please' });
    const replay = client.requests[2].messages;
    expect(replay.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messageText(replay[0])).toContain('"title": "Mars news"');
    expect(messageText(replay[2])).toBe('Great topic! Searching now.');
    expect(messageText(replay[3])).toBe('In German please');

    expect(store.getRecentRuns('s1').map(run => run.response)).toEqual([
      'Great topic! Searching now.',
      'Sure, in German.',
    ]);
  });

  it('falls back when the model says nothing', async () => {
    const agent = new PodcastChatAgent({
      client: new FakeChatClient([textReply('  ')]),
      costTracker: null,
      storage: null,
      sessions: store,
      tools: [],
    });

    const output = await agent.run('s1', { message: 'Hello?' });
    expect(output.response).toBe('Sorry, I could not come up with a reply. Please try again.');
  });
});
