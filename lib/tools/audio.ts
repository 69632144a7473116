/**
 * Audio Tool - stitch speech segments into one MP3
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';

const execFileAsync = promisify(execFile);

export interface StitchOptions {
  /** Silence inserted between consecutive speech segments */
  silenceMs?: number;
  intro?: Buffer | null;
  outro?: Buffer | null;
}

export interface StitchResult {
  audio: Buffer;
  method: 'ffmpeg' | 'concat';
}

export type Stitcher = (segments: Buffer[], options?: StitchOptions) => Promise<StitchResult>;

/** Position of the speech clips among the stitched inputs */
export interface SpeechRange {
  start: number;
  count: number;
}

/**
 * ffmpeg arguments joining `inputs` with the concat filter. Every input is
 * resampled to 44.1 kHz mono; speech clips other than the last are padded
 * with `silenceMs` of silence.
 */
export function buildStitchArgs(
  inputs: string[],
  silenceMs: number,
  output: string,
  speech: SpeechRange = { start: 0, count: inputs.length }
): string[] {
  const padSeconds = (silenceMs / 1000).toFixed(3);
  const lastSpeech = speech.start + speech.count - 1;
  const filters = inputs.map((_, index) => {
    const padded = silenceMs > 0 && index >= speech.start && index < lastSpeech;
    const pad = padded ? `,apad=pad_dur=${padSeconds}` : '';
    return `[${index}:a]aresample=44100,aformat=sample_fmts=fltp:channel_layouts=mono${pad}[a${index}]`;
  });
  const labels = inputs.map((_, index) => `[a${index}]`).join('');

  return [
    '-y',
    ...inputs.flatMap(input => ['-i', input]),
    '-filter_complex',
    `${filters.join(';')};${labels}concat=n=${inputs.length}:v=0:a=1[out]`,
    '-map',
    '[out]',
    '-c:a',
    'libmp3lame',
    '-b:a',
    '128k',
    output,
  ];
}

export class AudioTool {
  /**
   * Stitch with ffmpeg; when ffmpeg is unavailable the MP3 frames are
   * concatenated as-is (no silence).
   */
  static async stitch(segments: Buffer[], options: StitchOptions = {}): Promise<StitchResult> {
    const { silenceMs = Config.AUDIO_SILENCE_MS, intro, outro } = options;
    const clips = [...(intro ? [intro] : []), ...segments, ...(outro ? [outro] : [])];

    if (clips.length === 0) {
      throw new Error('No segments to stitch');
    }

    try {
      const speech = { start: intro ? 1 : 0, count: segments.length };
      const audio = await AudioTool.stitchWithFfmpeg(clips, silenceMs, speech);
      return { audio, method: 'ffmpeg' };
    } catch (error) {
      Logger.warn('ffmpeg stitching failed, concatenating raw segments', {
        error: errorMessage(error),
      });
      return { audio: AudioTool.concat(clips), method: 'concat' };
    }
  }

  static concat(segments: Buffer[]): Buffer {
    if (segments.length === 0) {
      throw new Error('No segments to concatenate');
    }
    return segments.length === 1 ? segments[0] : Buffer.concat(segments);
  }

  /**
   * Rough approximation: 128kbps ≈ 16KB/sec
   */
  static estimateDuration(audioBuffer: Buffer): number {
    const bytesPerSecond = 16000;
    return Math.ceil(audioBuffer.length / bytesPerSecond);
  }

  private static async stitchWithFfmpeg(
    clips: Buffer[],
    silenceMs: number,
    speech: SpeechRange
  ): Promise<Buffer> {
    const workDir = await mkdtemp(path.join(tmpdir(), 'podcast_stitch_'));

    try {
      const inputs: string[] = [];
      for (let i = 0; i < clips.length; i++) {
        const clipPath = path.join(workDir, `segment_${i}.mp3`);
        await writeFile(clipPath, clips[i]);
        inputs.push(clipPath);
      }

      const outputPath = path.join(workDir, 'podcast.mp3');
      await execFileAsync(Config.FFMPEG_PATH, buildStitchArgs(inputs, silenceMs, outputPath, speech), {
        maxBuffer: 16 * 1024 * 1024,
      });

      const audio = await readFile(outputPath);
      Logger.info('🎚️ Audio stitched with ffmpeg', {
        clips: clips.length,
        bytes: audio.length,
        estimated_seconds: AudioTool.estimateDuration(audio),
      });
      return audio;
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        Logger.debug('Temp directory cleanup failed', { workDir, error: errorMessage(error) });
      });
    }
  }
}
