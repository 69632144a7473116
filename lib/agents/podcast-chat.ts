/**
 * Podcast Chat Agent - the conversational front door.
 *
 * One turn: rebuild the prompt from the stored session state, replay recent
 * turns, let the model drive the pipeline agents and session tools, then
 * persist the turn.
 */

import type OpenAI from 'openai';
import { z } from 'zod';
import { BaseAgent, type AgentDeps } from './base';
import { defineTool, NO_PARAMETERS, type AgentTool } from './tools';
import { SearchAgent } from './search';
import { ScrapeAgent } from './scrape';
import { ScriptAgent } from './script';
import { AudioAgent } from './audio';
import { Clock, Logger, errorMessage } from '../utils';
import { createSessionTools } from '../tools/session-tools';
import { getSessionStore, type SessionStore } from '../db/session-store';
import type { SessionStage, SessionState } from '../types';

export interface PodcastChatInput {
  message: string;
}

export interface PodcastChatOutput {
  response: string;
  stage: SessionStage;
  state: SessionState;
  tools_used: string[];
}

const DESCRIPTION = `You are a friendly podcast producer. You help the user turn a news topic into a short two-host podcast episode (hosts ALEX and MORGAN).`;

const INSTRUCTIONS = `Workflow:
1. When the user names a topic, call update_chat_title with a short title, then search_agent_run with a focused query.
2. Call scrape_agent_run to fetch full text for the sources.
3. Sources are auto-selected: call user_source_selection_run with no arguments to confirm all of them unless the user asked for specific ones.
4. Call podcast_script_agent_run with the topic and the session language.
5. Call audio_generate_agent_run to produce the audio.
6. When the user approves the audio, call mark_session_finished.

Rules:
- Run the steps in order and do not repeat a finished step unless the user asks for changes.
- If the user asks for another language, call update_language before writing the script.
- If a tool returns an error, tell the user plainly and suggest what to try next.
- Keep replies short and never print raw JSON to the user.`;

/**
 * Compact view of the session for the system prompt
 */
export function describeSessionState(state: SessionState): string {
  const results = state.search_results;
  return JSON.stringify(
    {
      stage: state.stage,
      title: state.title,
      language: state.selected_language,
      tts_engine: state.tts_engine,
      sources: results.length,
      scraped_sources: results.filter(result => result.scraped).length,
      confirmed_sources: results.filter(result => result.confirmed).length,
      script_title: state.generated_script?.title ?? null,
      audio_url: state.audio_url,
      finished: state.finished,
    },
    null,
    2
  );
}

export function buildSystemPrompt(state: SessionState, now: Date = Clock.nowUtc()): string {
  return [
    DESCRIPTION,
    INSTRUCTIONS,
    `Today is ${Clock.toDateString(now)}.`,
    `Current session state:\n${describeSessionState(state)}`,
  ].join('\n\n');
}

export interface PodcastAgents {
  search: SearchAgent;
  scrape: ScrapeAgent;
  script: ScriptAgent;
  audio: AudioAgent;
}

/**
 * Pipeline agents exposed as tools; each answers with its summary or an error string
 */
export function createAgentTools(agents: PodcastAgents): AgentTool[] {
  return [
    defineTool({
      name: 'search_agent_run',
      description: 'Search the web for exactly five sources about a topic and save them to the session.',
      parameters: {
        type: 'object',
        properties: { query: { type: 'string' } },
        required: ['query'],
      },
      schema: z.object({ query: z.string().min(1) }),
      execute: async ({ query }, { sessionId }) => {
        try {
          return (await agents.search.run(sessionId, { query })).summary;
        } catch (error) {
          return `Error during search: ${errorMessage(error)}`;
        }
      },
    }),
    defineTool({
      name: 'scrape_agent_run',
      description: 'Fetch the full article text for the saved search results.',
      parameters: NO_PARAMETERS,
      schema: z.object({}),
      execute: async (_args, { sessionId }) => {
        try {
          return (await agents.scrape.run(sessionId, {})).summary;
        } catch (error) {
          return `Error during scraping: ${errorMessage(error)}`;
        }
      },
    }),
    defineTool({
      name: 'podcast_script_agent_run',
      description: 'Write the podcast script from the confirmed sources.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'The podcast topic' },
          language_name: { type: 'string' },
        },
        required: ['query'],
      },
      schema: z.object({
        query: z.string().min(1),
        language_name: z.string().nullish(),
      }),
      execute: async ({ query, language_name }, { sessionId }) => {
        try {
          const output = await agents.script.run(sessionId, {
            query,
            language_name: language_name ?? undefined,
          });
          return output.summary;
        } catch (error) {
          return `Error generating script: ${errorMessage(error)}`;
        }
      },
    }),
    defineTool({
      name: 'audio_generate_agent_run',
      description: 'Generate the podcast audio from the current script.',
      parameters: NO_PARAMETERS,
      schema: z.object({}),
      execute: async (_args, { sessionId }) => {
        try {
          return (await agents.audio.run(sessionId, {})).summary;
        } catch (error) {
          return `Error generating audio: ${errorMessage(error)}`;
        }
      },
    }),
  ];
}

export class PodcastChatAgent extends BaseAgent<PodcastChatInput, PodcastChatOutput> {
  private sessions: SessionStore;
  private tools: AgentTool[];

  constructor(deps: AgentDeps & { sessions?: SessionStore; tools?: AgentTool[] } = {}) {
    super(
      {
        name: 'PodcastChatAgent',
        temperature: 0.5,
        maxTokens: 2000,
        retries: 1,
      },
      deps
    );
    const sessions = deps.sessions ?? getSessionStore();
    this.sessions = sessions;

    if (deps.tools) {
      this.tools = deps.tools;
    } else {
      const shared = {
        client: deps.client,
        costTracker: deps.costTracker,
        storage: deps.storage,
        sessions,
      };
      const agents: PodcastAgents = {
        search: new SearchAgent(shared),
        scrape: new ScrapeAgent(shared),
        script: new ScriptAgent(shared),
        audio: new AudioAgent(shared),
      };
      this.tools = [...createAgentTools(agents), ...createSessionTools(sessions)];
    }
  }

  protected async process(input: PodcastChatInput, sessionId: string): Promise<PodcastChatOutput> {
    const state = this.sessions.getState(sessionId);
    const history = this.sessions.getRecentRuns(sessionId);

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: buildSystemPrompt(state) },
    ];
    for (const turn of history) {
      messages.push({ role: 'user', content: turn.user_message });
      messages.push({ role: 'assistant', content: turn.response });
    }
    messages.push({ role: 'user', content: input.message });

    const result = await this.runTools(messages, this.tools, { sessionId });
    const response = result.content.trim() || 'Sorry, I could not come up with a reply. Please try again.';

    this.sessions.appendRun(sessionId, input.message, response);
    const fresh = this.sessions.getState(sessionId);

    Logger.info('💬 Chat turn complete', {
      sessionId,
      stage: fresh.stage,
      steps: result.steps,
      tools: result.toolCalls.length,
    });

    return {
      response,
      stage: fresh.stage,
      state: fresh,
      tools_used: result.toolCalls.map(call => call.name),
    };
  }
}
