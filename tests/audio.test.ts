import { afterEach, describe, expect, it, vi } from 'vitest';
import { Config } from '../lib/config';
import { AudioTool, buildStitchArgs } from '../lib/tools/audio';
import { ElevenLabsTtsEngine, TtsTool, selectTtsEngine, type TtsEngine } from '../lib/tools/tts';

describe('selectTtsEngine', () => {
  it('uses the preferred engine when it has a key', () => {
    expect(selectTtsEngine('openai', { openai: true, elevenlabs: true })).toBe('openai');
  });

  it('falls back to ElevenLabs, then OpenAI', () => {
    expect(selectTtsEngine('elevenlabs', { openai: true, elevenlabs: false })).toBe('openai');
    expect(selectTtsEngine(null, { openai: true, elevenlabs: true })).toBe('elevenlabs');
  });

  it('fails without any key', () => {
    expect(() => selectTtsEngine(null, { openai: false, elevenlabs: false })).toThrow(
      'No TTS engine is configured. Set OPENAI_API_KEY or ELEVENLABS_API_KEY.'
    );
  });
});

describe('TtsTool.synthesizeAll', () => {
  it('keeps order and leaves failed lines null', async () => {
    const engine: TtsEngine = {
      name: 'openai',
      label: 'Fake',
      synthesize: async (text, speaker) => {
        if (text === 'bad') throw new Error('rejected');
        return Buffer.from(`${speaker}${text}`);
      },
    };

    const buffers = await TtsTool.synthesizeAll(
      [
        { text: 'one', speaker: 1 },
        { text: 'bad', speaker: 2 },
        { text: 'three', speaker: 2 },
      ],
      engine,
      2
    );

    expect(buffers.map(buffer => buffer?.toString() ?? null)).toEqual(['1one', null, '2three']);
  });
});

describe('ElevenLabsTtsEngine', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the text to the speaker voice', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('mp3-bytes'));
    vi.stubGlobal('fetch', fetchMock);

    const engine = new ElevenLabsTtsEngine('test-eleven', { 1: 'voice-one', 2: 'voice-two' });
    const audio = await engine.synthesize('Hello there', 2);

    expect(audio.toString()).toBe('mp3-bytes');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.elevenlabs.io/v1/text-to-speech/voice-two');
    expect(init?.headers).toEqual(expect.objectContaining({ 'xi-api-key': 'test-eleven' }));
    expect(JSON.parse(String(init?.body))).toEqual({ text: 'Hello there', model_id: 'eleven_multilingual_v2' });
  });

  it('refuses to run without a key', async () => {
    await expect(new ElevenLabsTtsEngine('').synthesize('Hi', 1)).rejects.toThrow(
      'ELEVENLABS_API_KEY is not set'
    );
  });
});

describe('buildStitchArgs', () => {
  it('pads every clip but the last and concatenates', () => {
    expect(buildStitchArgs(['a.mp3', 'b.mp3'], 500, 'out.mp3')).toEqual([
      '-y',
      '-i',
      'a.mp3',
      '-i',
      'b.mp3',
      '-filter_complex',
      '[0:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono,apad=pad_dur=0.500[a0];' +
        '[1:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono[a1];' +
        '[a0][a1]concat=n=2:v=0:a=1[out]',
      '-map',
      '[out]',
      '-c:a',
      'libmp3lame',
      '-b:a',
      '128k',
      'out.mp3',
    ]);
  });

  it('pads only between speech clips when intro and outro are present', () => {
    const args = buildStitchArgs(['intro.mp3', 's1.mp3', 's2.mp3', 'outro.mp3'], 500, 'out.mp3', {
      start: 1,
      count: 2,
    });
    expect(args[10]).toBe(
      '[0:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono[a0];' +
        '[1:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono,apad=pad_dur=0.500[a1];' +
        '[2:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono[a2];' +
        '[3:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono[a3];' +
        '[a0][a1][a2][a3]concat=n=4:v=0:a=1[out]'
    );
  });

  it('skips padding when silence is zero', () => {
    const args = buildStitchArgs(['a.mp3', 'b.mp3'], 0, 'out.mp3');
    expect(args[6]).not.toContain('apad');
  });
});

describe('AudioTool', () => {
  const ffmpegPath = Config.FFMPEG_PATH;

  afterEach(() => {
    Config.FFMPEG_PATH = ffmpegPath;
  });

  it('concatenates intro, segments and outro when ffmpeg is missing', async () => {
    Config.FFMPEG_PATH = '/nonexistent/ffmpeg-binary';

    const result = await AudioTool.stitch([Buffer.from('A'), Buffer.from('B')], {
      intro: Buffer.from('<'),
      outro: Buffer.from('>'),
    });

    expect(result.method).toBe('concat');
    expect(result.audio.toString()).toBe('<AB>');
  });

  it('rejects an empty episode', async () => {
    await expect(AudioTool.stitch([])).rejects.toThrow('No segments to stitch');
  });

  it('estimates duration at 16 KB per second', () => {
    expect(AudioTool.estimateDuration(Buffer.alloc(32001))).toBe(3);
  });
});
