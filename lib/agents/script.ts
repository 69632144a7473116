/**
 * Script Agent - writes the two-host podcast script from confirmed sources
 */

import { BaseAgent, type AgentDeps } from './base';
import { Config } from '../config';
import { Clock, Logger, parseJsonObject } from '../utils';
import { PodcastScriptSchema, type PodcastScript, type SearchResultItem } from '../schemas';
import { getSessionStore, type SessionStore } from '../db/session-store';

export interface ScriptInput {
  query: string;
  language_name?: string;
}

export interface ScriptOutput {
  script: PodcastScript | null;
  sources: string[];
  summary: string;
}

export const NO_CONFIRMED_SOURCES = 'No confirmed sources found to generate podcast script.';

const SCRIPT_PROMPT = `You write scripts for a news podcast hosted by two people:
- ALEX: curious and energetic, asks the questions listeners would ask.
- MORGAN: calm and analytical, explains context and consequences.

Write a natural, conversational episode based only on the sources provided.
Structure:
1. "intro": both hosts welcome listeners and tease the topic.
2. "headlines": a quick rundown of the key stories.
3. One "article" section per major story, with a short title, discussing what happened, why it matters and what comes next.
4. "outro": wrap-up and sign-off.

Rules:
- Speakers are exactly "ALEX" or "MORGAN".
- Spoken text only: no stage directions, markdown, emojis or URLs.
- Keep individual lines under 60 words and alternate speakers often.
- Do not invent facts that are not in the sources.

Respond with a JSON object only:
{"title": "...", "sections": [{"type": "intro|headlines|article|outro", "title": "...", "dialog": [{"speaker": "ALEX", "text": "..."}]}]}`;

/**
 * Source blocks for the confirmed results, plus their URLs
 */
export function formatSearchResultsForPodcast(
  results: SearchResultItem[],
  now: Date = Clock.nowUtc()
): { content: string; sources: string[] } {
  const sources: string[] = [];
  const blocks: string[] = [`PODCAST CREATION: ${Clock.toDateString(now)}`, ''];

  // SOURCE n is the result's position in search_results
  results.forEach((result, index) => {
    if (!result.confirmed) return;
    const n = index + 1;
    sources.push(result.url);
    blocks.push(
      `SOURCE ${n}:`,
      `Title: ${result.title}`,
      `URL: ${result.url}`,
      `Content: ${result.full_text || result.description}`,
      `---END OF SOURCE ${n}---`,
      ''
    );
  });

  return { content: blocks.join('\n').trim(), sources };
}

export class ScriptAgent extends BaseAgent<ScriptInput, ScriptOutput> {
  private sessions: SessionStore;

  constructor(deps: AgentDeps & { sessions?: SessionStore } = {}) {
    super(
      {
        name: 'ScriptAgent',
        systemPrompt: SCRIPT_PROMPT,
        model: Config.SCRIPT_MODEL,
        temperature: 0.8,
        maxTokens: Config.SCRIPT_MAX_TOKENS,
        retries: 2,
      },
      deps
    );
    this.sessions = deps.sessions ?? getSessionStore();
  }

  protected async process(input: ScriptInput, sessionId: string): Promise<ScriptOutput> {
    const state = this.sessions.getState(sessionId);
    const languageName = input.language_name || state.selected_language.name;
    const { content, sources } = formatSearchResultsForPodcast(state.search_results);

    if (sources.length === 0) {
      return { script: null, sources, summary: NO_CONFIRMED_SOURCES };
    }

    Logger.info('✍️ Generating podcast script', {
      sessionId,
      sources: sources.length,
      language: languageName,
    });

    const raw = await this.callOpenAI(
      [
        { role: 'system', content: this.config.systemPrompt },
        {
          role: 'user',
          content:
            `Topic: ${input.query}\nWrite the whole script in ${languageName}.\n\n${content}`,
        },
      ],
      { responseFormat: 'json_object' }
    );

    const script = PodcastScriptSchema.parse(parseJsonObject(raw));
    if (script.sections.length === 0) {
      throw new Error('Generated script has no sections');
    }

    this.sessions.updateState(sessionId, latest => {
      latest.generated_script = { ...script, sources };
      latest.stage = 'script';
      latest.show_script_for_confirmation = false;
      latest.show_sources_for_selection = false;
    });

    const lines = script.sections.reduce((total, section) => total + section.dialog.length, 0);
    return {
      script,
      sources,
      summary:
        `Generated podcast script "${script.title}" for '${input.query}' with ${sources.length} sources ` +
        `(${script.sections.length} sections, ${lines} lines). ` +
        'The script is ready; call audio_generate_agent_run next to produce the audio.',
    };
  }
}
