import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AudioAgent,
  NO_DIALOG_MESSAGE,
  NO_SCRIPT_MESSAGE,
  buildScriptEntries,
} from '../lib/agents/audio';
import { SessionStore, createInitialSessionState } from '../lib/db/session-store';
import { StorageTool } from '../lib/tools/storage';
import type { StitchOptions, StitchResult } from '../lib/tools/audio';
import type { TtsEngine } from '../lib/tools/tts';
import type { GeneratedScript, SpeakerId } from '../lib/types';

class FakeEngine implements TtsEngine {
  readonly name = 'openai' as const;
  readonly label = 'Fake';

  async synthesize(text: string, speaker: SpeakerId): Promise<Buffer> {
    if (text === 'fail me') {
      throw new Error('voice unavailable');
    }
    return Buffer.from(`${speaker}:${text}|`);
  }
}

function script(lines: Array<[string, string]>): GeneratedScript {
  return {
    title: 'Mars Today',
    sources: ['https://a.example.com'],
    sections: [{ type: 'intro', dialog: lines.map(([speaker, text]) => ({ speaker, text })) }],
  };
}

describe('buildScriptEntries', () => {
  it('maps hosts to speaker slots and skips unusable lines', () => {
    const entries = buildScriptEntries(
      script([
        [' alex ', 'Hello'],
        ['Morgan', ' Hi there '],
        ['NARRATOR', 'Ignored'],
        ['ALEX', '   '],
      ])
    );
    expect(entries).toEqual([
      { text: 'Hello', speaker: 1 },
      { text: 'Hi there', speaker: 2 },
    ]);
  });
});

describe('AudioAgent', () => {
  let store: SessionStore;
  let storage: StorageTool;
  let stitched: Array<{ segments: Buffer[]; options?: StitchOptions }>;
  let agent: AudioAgent;

  beforeEach(() => {
    store = new SessionStore(':memory:');
    storage = new StorageTool({ backend: 'local', rootDir: mkdtempSync(join(tmpdir(), 'audio-agent-')) });
    stitched = [];
    agent = new AudioAgent({
      costTracker: null,
      storage: null,
      sessions: store,
      audioStorage: storage,
      availableEngines: () => ({ openai: true, elevenlabs: false }),
      createEngine: () => new FakeEngine(),
      stitch: async (segments: Buffer[], options?: StitchOptions): Promise<StitchResult> => {
        stitched.push({ segments, options });
        return { audio: Buffer.concat(segments), method: 'concat' };
      },
    });
  });

  afterEach(() => {
    store.close();
  });

  it('needs a script first', async () => {
    const output = await agent.run('s1', {});
    expect(output.summary).toBe(NO_SCRIPT_MESSAGE);
    expect(output.audio_url).toBeNull();
  });

  it('treats a script without sections as missing', async () => {
    const state = createInitialSessionState();
    state.generated_script = { title: 'Empty', sources: [], sections: [] };
    store.saveSession('s1', state);

    const output = await agent.run('s1', {});
    expect(output.summary).toBe(NO_SCRIPT_MESSAGE);
    expect(stitched).toEqual([]);
  });

  it('needs dialog in the script', async () => {
    const state = createInitialSessionState();
    state.generated_script = script([['NARRATOR', 'Nobody voices this']]);
    store.saveSession('s1', state);

    expect((await agent.run('s1', {})).summary).toBe(NO_DIALOG_MESSAGE);
  });

  it('voices, stitches and uploads the episode', async () => {
    const state = createInitialSessionState();
    state.generated_script = script([
      ['ALEX', 'Welcome'],
      ['MORGAN', 'fail me'],
      ['MORGAN', 'Goodbye'],
    ]);
    state.show_script_for_confirmation = true;
    store.saveSession('s1', state);

    const output = await agent.run('s1', {});

    expect(stitched).toHaveLength(1);
    expect(stitched[0].segments.map(segment => segment.toString())).toEqual(['1:Welcome|', '2:Goodbye|']);
    expect(stitched[0].options).toEqual({ silenceMs: 500, intro: null, outro: null });

    expect(output.engine).toBe('openai');
    expect(output.segments).toBe(2);
    expect(output.failed_segments).toBe(1);
    expect(output.summary).toBe(
      "I have completed your podcast on 'Mars Today'. The audio was generated with Fake voices in English " +
        '(1 of 3 lines could not be voiced and were skipped). ' +
        "You can listen to it in the player below. If it sounds good, click 'Sounds Great!' to complete your podcast."
    );

    const audioUrl = output.audio_url ?? '';
    expect(audioUrl).toMatch(/^http:\/\/localhost:3000\/api\/files\/podcasts\/audio\/podcast_\d{8}_\d{6}\.mp3$/);
    const stored = await storage.get(audioUrl.split('/api/files/')[1]);
    expect(stored.toString()).toBe('1:Welcome|2:Goodbye|');

    const saved = store.getState('s1');
    expect(saved.stage).toBe('audio');
    expect(saved.audio_url).toBe(audioUrl);
    expect(saved.show_audio_for_confirmation).toBe(true);
    expect(saved.show_script_for_confirmation).toBe(false);
  });

  it('fails when no line could be voiced', async () => {
    const state = createInitialSessionState();
    state.generated_script = script([['ALEX', 'fail me']]);
    store.saveSession('s1', state);

    await expect(agent.run('s1', {})).rejects.toThrow('All 1 TTS segments failed with Fake');
  });
});
