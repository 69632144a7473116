/**
 * Session tools - agent tools that only touch the session state
 */

import { z } from 'zod';
import { Logger } from '../utils';
import { defineTool, NO_PARAMETERS, type AgentTool } from '../agents/tools';
import type { SessionStore } from '../db/session-store';
import { TTS_ENGINES } from '../schemas';
import type { SessionState, TtsEngineName } from '../types';

export const TOGGLE_UI_STATES = [
  'show_sources_for_selection',
  'show_script_for_confirmation',
  'show_audio_for_confirmation',
  'show_recording_player',
] as const;

export type UiToggle = (typeof TOGGLE_UI_STATES)[number];

export const SOURCE_SELECTION_SKIPPED =
  'Source selection skipped - all sources auto-selected. Proceeding to script generation.';

/**
 * Sources are always auto-selected, so the selection panel is never opened.
 * Returns null when the state should be left untouched.
 */
export function applyUiState(state: SessionState, stateType: UiToggle, active: boolean): string | null {
  if (stateType === 'show_sources_for_selection' && active) {
    return null;
  }

  for (const toggle of TOGGLE_UI_STATES) {
    state[toggle] = toggle === stateType ? active : false;
  }
  return `Updated ${stateType} to ${active} and all other UI states to False.`;
}

/**
 * Marks sources confirmed by 1-based index; no selection confirms all of them
 */
export function applySourceSelection(state: SessionState, selected?: number[] | null): string {
  const results = state.search_results;
  const autoSelect = !selected || selected.length === 0;
  const chosen = new Set(
    selected && selected.length > 0 ? selected : results.map((_, index) => index + 1)
  );

  results.forEach((result, index) => {
    result.confirmed = chosen.has(index + 1);
  });

  const confirmed = results.filter(result => result.confirmed).length;
  Logger.info('✅ Sources confirmed', { confirmed, total: results.length });

  if (autoSelect) {
    return `Auto-selected all ${confirmed} sources. Ready for script generation.`;
  }
  return `Selected ${confirmed} of ${results.length} sources. Ready for script generation.`;
}

export function applyLanguage(state: SessionState, code: string, name: string): string {
  state.selected_language = { code, name };
  return `Language updated to ${name} (${code}).`;
}

export function applyChatTitle(state: SessionState, title: string): string {
  state.title = title.trim();
  return `Chat title updated to "${state.title}".`;
}

export function applyTtsEngine(state: SessionState, engine: TtsEngineName): string {
  state.tts_engine = engine;
  return `TTS engine set to ${engine}.`;
}

export function applySessionFinished(state: SessionState): string {
  state.finished = true;
  state.stage = 'finished';
  for (const toggle of TOGGLE_UI_STATES) {
    state[toggle] = false;
  }
  return 'Session marked as finished.';
}

export function createSessionTools(store: SessionStore): AgentTool[] {
  return [
    defineTool({
      name: 'ui_manager_run',
      description:
        'Show or hide a UI panel for the user. Activating one panel hides all others.',
      parameters: {
        type: 'object',
        properties: {
          state_type: { type: 'string', enum: [...TOGGLE_UI_STATES] },
          active: { type: 'boolean' },
        },
        required: ['state_type', 'active'],
      },
      schema: z.object({
        state_type: z.enum(TOGGLE_UI_STATES),
        active: z.boolean(),
      }),
      execute: async ({ state_type, active }, { sessionId }) => {
        const state = store.getState(sessionId);
        const result = applyUiState(state, state_type, active);
        if (result === null) {
          return SOURCE_SELECTION_SKIPPED;
        }
        store.saveSession(sessionId, state);
        return result;
      },
    }),
    defineTool({
      name: 'user_source_selection_run',
      description:
        'Confirm which search results to use, by 1-based index. Leave empty to use all sources.',
      parameters: {
        type: 'object',
        properties: {
          selected_sources: { type: 'array', items: { type: 'integer', minimum: 1 } },
        },
      },
      schema: z.object({
        selected_sources: z.array(z.number().int().positive()).nullish(),
      }),
      execute: async ({ selected_sources }, { sessionId }) => {
        return store.updateState(sessionId, state => applySourceSelection(state, selected_sources));
      },
    }),
    defineTool({
      name: 'update_language',
      description: 'Set the language of the podcast script and audio.',
      parameters: {
        type: 'object',
        properties: {
          language_code: { type: 'string', description: 'ISO 639-1 code, e.g. "en"' },
          language_name: { type: 'string', description: 'e.g. "English"' },
        },
        required: ['language_code', 'language_name'],
      },
      schema: z.object({
        language_code: z.string().min(2),
        language_name: z.string().min(1),
      }),
      execute: async ({ language_code, language_name }, { sessionId }) => {
        return store.updateState(sessionId, state => applyLanguage(state, language_code, language_name));
      },
    }),
    defineTool({
      name: 'update_chat_title',
      description: 'Give this chat a short descriptive title.',
      parameters: {
        type: 'object',
        properties: { title: { type: 'string' } },
        required: ['title'],
      },
      schema: z.object({ title: z.string().min(1) }),
      execute: async ({ title }, { sessionId }) => {
        return store.updateState(sessionId, state => applyChatTitle(state, title));
      },
    }),
    defineTool({
      name: 'update_tts_engine',
      description: 'Choose the voice engine used for the podcast audio.',
      parameters: {
        type: 'object',
        properties: { engine: { type: 'string', enum: [...TTS_ENGINES] } },
        required: ['engine'],
      },
      schema: z.object({ engine: z.enum(TTS_ENGINES) }),
      execute: async ({ engine }, { sessionId }) => {
        return store.updateState(sessionId, state => applyTtsEngine(state, engine));
      },
    }),
    defineTool({
      name: 'mark_session_finished',
      description: 'Mark the podcast session as complete once the user approves the audio.',
      parameters: NO_PARAMETERS,
      schema: z.object({}),
      execute: async (_args, { sessionId }) => {
        return store.updateState(sessionId, state => applySessionFinished(state));
      },
    }),
  ];
}
