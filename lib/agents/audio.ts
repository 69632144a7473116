/**
 * Audio Agent - turns the generated script into one podcast MP3
 */

import { readFile } from 'fs/promises';
import { BaseAgent, type AgentDeps } from './base';
import { Config } from '../config';
import { Clock, Logger, errorMessage } from '../utils';
import { StorageTool } from '../tools/storage';
import { AudioTool, type Stitcher } from '../tools/audio';
import {
  TtsTool,
  availableTtsEngines,
  createTtsEngine,
  selectTtsEngine,
  type TtsEngine,
} from '../tools/tts';
import { TOGGLE_UI_STATES } from '../tools/session-tools';
import { getSessionStore, type SessionStore } from '../db/session-store';
import type { PodcastScript, ScriptEntry, SpeakerId, TtsEngineName } from '../types';

export const SPEAKER_MAP: Record<string, SpeakerId> = {
  ALEX: 1,
  MORGAN: 2,
};

export const NO_SCRIPT_MESSAGE =
  'Cannot generate audio: No podcast script data found. Please generate a script first.';
export const NO_DIALOG_MESSAGE = 'Cannot generate audio: No dialog found in the script.';

/**
 * Dialog lines in script order, skipping empty text and unknown speakers
 */
export function buildScriptEntries(script: PodcastScript): ScriptEntry[] {
  const entries: ScriptEntry[] = [];
  for (const section of script.sections) {
    for (const line of section.dialog) {
      const speaker = SPEAKER_MAP[line.speaker.trim().toUpperCase()];
      const text = line.text.trim();
      if (speaker && text) {
        entries.push({ text, speaker });
      }
    }
  }
  return entries;
}

export interface AudioOutput {
  audio_url: string | null;
  engine: TtsEngineName | null;
  segments: number;
  failed_segments: number;
  estimated_duration_sec: number;
  summary: string;
}

export interface AudioAgentDeps extends AgentDeps {
  sessions?: SessionStore;
  audioStorage?: StorageTool;
  createEngine?: (name: TtsEngineName) => TtsEngine;
  availableEngines?: () => Record<TtsEngineName, boolean>;
  stitch?: Stitcher;
}

async function loadMusic(filePath: string): Promise<Buffer | null> {
  if (!filePath) return null;
  try {
    return await readFile(filePath);
  } catch (error) {
    Logger.warn('Music file could not be loaded, skipping', { filePath, error: errorMessage(error) });
    return null;
  }
}

export class AudioAgent extends BaseAgent<Record<string, never>, AudioOutput> {
  private sessions: SessionStore;
  private audioStorage: StorageTool;
  private createEngine: (name: TtsEngineName) => TtsEngine;
  private availableEngines: () => Record<TtsEngineName, boolean>;
  private stitch: Stitcher;

  constructor(deps: AudioAgentDeps = {}) {
    super({ name: 'AudioAgent', retries: 1 }, deps);
    this.sessions = deps.sessions ?? getSessionStore();
    this.audioStorage = deps.audioStorage ?? new StorageTool();
    this.createEngine = deps.createEngine ?? createTtsEngine;
    this.availableEngines = deps.availableEngines ?? availableTtsEngines;
    this.stitch = deps.stitch ?? AudioTool.stitch;
  }

  protected async process(_input: Record<string, never>, sessionId: string): Promise<AudioOutput> {
    const state = this.sessions.getState(sessionId);
    const empty = {
      audio_url: null,
      engine: null,
      segments: 0,
      failed_segments: 0,
      estimated_duration_sec: 0,
    };

    if (!state.generated_script || state.generated_script.sections.length === 0) {
      return { ...empty, summary: NO_SCRIPT_MESSAGE };
    }

    const entries = buildScriptEntries(state.generated_script);
    if (entries.length === 0) {
      return { ...empty, summary: NO_DIALOG_MESSAGE };
    }

    const engineName = selectTtsEngine(state.tts_engine, this.availableEngines());
    const engine = this.createEngine(engineName);
    Logger.info('🎧 Generating podcast audio', { sessionId, engine: engineName, lines: entries.length });

    const buffers = await TtsTool.synthesizeAll(entries, engine);
    const segments = buffers.filter((buffer): buffer is Buffer => buffer !== null);
    if (segments.length === 0) {
      throw new Error(`All ${entries.length} TTS segments failed with ${engine.label}`);
    }

    const [intro, outro] = await Promise.all([
      loadMusic(Config.INTRO_MUSIC_FILE),
      loadMusic(Config.OUTRO_MUSIC_FILE),
    ]);
    const { audio, method } = await this.stitch(segments, {
      silenceMs: Config.AUDIO_SILENCE_MS,
      intro,
      outro,
    });

    const fileName = `podcast_${Clock.timestampSlug(Clock.nowUtc())}.mp3`;
    const audioUrl = await this.audioStorage.put(`podcasts/audio/${fileName}`, audio, 'audio/mpeg');

    this.sessions.updateState(sessionId, latest => {
      latest.audio_url = audioUrl;
      latest.stage = 'audio';
      for (const toggle of TOGGLE_UI_STATES) {
        latest[toggle] = toggle === 'show_audio_for_confirmation';
      }
    });

    const failed = entries.length - segments.length;
    const estimated = AudioTool.estimateDuration(audio);
    Logger.info('✅ Podcast audio ready', { sessionId, audioUrl, method, failed, estimated });

    const title = state.generated_script.title;
    return {
      audio_url: audioUrl,
      engine: engineName,
      segments: segments.length,
      failed_segments: failed,
      estimated_duration_sec: estimated,
      summary:
        `I have completed your podcast on '${title}'. The audio was generated with ${engine.label} voices ` +
        `in ${state.selected_language.name}` +
        (failed > 0 ? ` (${failed} of ${entries.length} lines could not be voiced and were skipped)` : '') +
        `. You can listen to it in the player below. If it sounds good, click 'Sounds Great!' to complete your podcast.`,
    };
  }
}
