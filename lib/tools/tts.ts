/**
 * TTS Tool - Text-to-speech through OpenAI or ElevenLabs
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { Logger, errorMessage, retry } from '../utils';
import { createSpeech, RateLimiter } from '../utils/openai-helper';
import type { ScriptEntry, SpeakerId, TtsEngineName } from '../types';

export interface TtsEngine {
  readonly name: TtsEngineName;
  readonly label: string;
  synthesize(text: string, speaker: SpeakerId): Promise<Buffer>;
}

type OpenAIVoice = OpenAI.Audio.SpeechCreateParams['voice'];

export const OPENAI_VOICES: Record<SpeakerId, OpenAIVoice> = {
  1: 'alloy',
  2: 'nova',
};

export class OpenAITtsEngine implements TtsEngine {
  readonly name = 'openai' as const;
  readonly label = 'OpenAI';
  private client: OpenAI;

  constructor(client?: OpenAI, private speed = 1.0) {
    this.client =
      client ??
      new OpenAI({
        apiKey: Config.OPENAI_API_KEY,
        baseURL: Config.OPENAI_BASE_URL || undefined,
      });
  }

  async synthesize(text: string, speaker: SpeakerId): Promise<Buffer> {
    const voice = OPENAI_VOICES[speaker];
    Logger.debug('🔊 OpenAI TTS call', { voice, textLength: text.length });

    const response = await createSpeech(
      this.client,
      {
        model: Config.TTS_MODEL,
        voice,
        input: text,
        response_format: 'mp3',
        speed: this.speed,
      },
      {
        maxRetries: 3,
        initialDelayMs: 2000,
        maxDelayMs: 15000,
        backoffMultiplier: 2,
      }
    );

    const buffer = Buffer.from(await response.arrayBuffer());
    if (buffer.length === 0) {
      throw new Error('OpenAI TTS returned empty audio buffer');
    }
    return buffer;
  }
}

export class ElevenLabsTtsEngine implements TtsEngine {
  readonly name = 'elevenlabs' as const;
  readonly label = 'ElevenLabs';

  constructor(
    private apiKey: string = Config.ELEVENLABS_API_KEY,
    private voices: Record<SpeakerId, string> = {
      1: Config.ELEVENLABS_VOICE_1,
      2: Config.ELEVENLABS_VOICE_2,
    }
  ) {}

  async synthesize(text: string, speaker: SpeakerId): Promise<Buffer> {
    if (!this.apiKey) {
      throw new Error('ELEVENLABS_API_KEY is not set');
    }

    const url = `https://api.elevenlabs.io/v1/text-to-speech/${encodeURIComponent(this.voices[speaker])}`;

    return retry(
      async () => {
        const res = await fetch(url, {
          method: 'POST',
          headers: {
            'xi-api-key': this.apiKey,
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
          },
          body: JSON.stringify({
            text,
            model_id: Config.ELEVENLABS_MODEL,
          }),
        });

        if (!res.ok) {
          const errText = await res.text().catch(() => '');
          throw new Error(`ElevenLabs TTS failed (${res.status}): ${errText.slice(0, 500)}`);
        }

        const buffer = Buffer.from(await res.arrayBuffer());
        if (buffer.length === 0) {
          throw new Error('ElevenLabs returned empty audio buffer');
        }
        return buffer;
      },
      { maxRetries: 2, delayMs: 1000 }
    );
  }
}

export function availableTtsEngines(): Record<TtsEngineName, boolean> {
  return {
    openai: Config.OPENAI_API_KEY.length > 0,
    elevenlabs: Config.ELEVENLABS_API_KEY.length > 0,
  };
}

/**
 * Preferred engine when it has a key, then ElevenLabs, then OpenAI
 */
export function selectTtsEngine(
  preferred: TtsEngineName | null | undefined,
  available: Record<TtsEngineName, boolean> = availableTtsEngines()
): TtsEngineName {
  if (preferred && available[preferred]) {
    return preferred;
  }
  if (preferred) {
    Logger.warn('Preferred TTS engine has no API key, falling back', { preferred });
  }
  if (available.elevenlabs) return 'elevenlabs';
  if (available.openai) return 'openai';
  throw new Error('No TTS engine is configured. Set OPENAI_API_KEY or ELEVENLABS_API_KEY.');
}

export function createTtsEngine(name: TtsEngineName): TtsEngine {
  return name === 'elevenlabs' ? new ElevenLabsTtsEngine() : new OpenAITtsEngine();
}

export class TtsTool {
  /**
   * Synthesize every entry concurrently. A failed entry is logged and left as
   * null; the result keeps the entry order.
   */
  static async synthesizeAll(
    entries: ScriptEntry[],
    engine: TtsEngine,
    concurrency: number = Config.TTS_CONCURRENCY
  ): Promise<Array<Buffer | null>> {
    const limiter = new RateLimiter(Math.max(1, concurrency), 0);
    Logger.info('🎙️ Synthesizing segments', {
      engine: engine.name,
      segments: entries.length,
      concurrency,
    });

    return Promise.all(
      entries.map((entry, index) =>
        limiter.execute(async () => {
          try {
            return await engine.synthesize(entry.text, entry.speaker);
          } catch (error) {
            Logger.warn('TTS segment failed, skipping', {
              index,
              speaker: entry.speaker,
              error: errorMessage(error),
            });
            return null;
          }
        })
      )
    );
  }
}
