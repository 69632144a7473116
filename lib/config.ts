/**
 * Configuration management for the podcast and research agents
 */

import 'dotenv/config';

export type StorageBackend = 'local' | 'vercel-blob' | 's3';

function parseStorageBackend(value: string | undefined): StorageBackend {
  if (value === 'vercel-blob' || value === 's3') {
    return value;
  }
  return 'local';
}

export class Config {
  // OpenAI
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static OPENAI_BASE_URL = process.env.OPENAI_BASE_URL || '';
  static OPENAI_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';
  static SCRIPT_MODEL = process.env.SCRIPT_MODEL || 'gpt-4o';
  static SCRIPT_MAX_TOKENS = parseInt(process.env.SCRIPT_MAX_TOKENS || '16000', 10);
  static OPENAI_TIMEOUT_MS = parseInt(process.env.OPENAI_TIMEOUT_MS || '120000', 10);
  static TTS_MODEL = process.env.TTS_MODEL || 'tts-1-hd';

  // Search
  static TAVILY_API_KEY = process.env.TAVILY_API_KEY || '';
  static SEARCH_RESULT_CAP = 5;

  // ElevenLabs
  static ELEVENLABS_API_KEY = process.env.ELEVENLABS_API_KEY || '';
  static ELEVENLABS_MODEL = process.env.ELEVENLABS_MODEL || 'eleven_multilingual_v2';
  // Premade voices "Rachel" and "Adam"
  static ELEVENLABS_VOICE_1 = process.env.ELEVENLABS_VOICE_1 || '21m00Tcm4TlvDq8ikWAM';
  static ELEVENLABS_VOICE_2 = process.env.ELEVENLABS_VOICE_2 || 'pNInz6obpgDQGcFmaJgB';

  // Storage
  static STORAGE_BACKEND: StorageBackend = parseStorageBackend(process.env.STORAGE_BACKEND);
  static LOCAL_STORAGE_DIR = process.env.LOCAL_STORAGE_DIR || 'storage';
  static PUBLIC_BASE_URL = process.env.PUBLIC_BASE_URL || 'http://localhost:3000';
  static BLOB_READ_WRITE_TOKEN = process.env.BLOB_READ_WRITE_TOKEN || '';
  static S3_ENDPOINT = process.env.S3_ENDPOINT || '';
  static S3_BUCKET = process.env.S3_BUCKET || '';
  static S3_ACCESS_KEY = process.env.S3_ACCESS_KEY || '';
  static S3_SECRET_KEY = process.env.S3_SECRET_KEY || '';
  static S3_REGION = process.env.S3_REGION || 'auto';
  static STORE_AGENT_MESSAGES = process.env.STORE_AGENT_MESSAGES !== 'false';

  // Databases
  static SESSION_DB_PATH = process.env.SESSION_DB_PATH || 'data/sessions.db';
  static COST_DB_PATH = process.env.COST_DB_PATH || 'data/cost_tracking.db';

  // Worker
  static WORKER_CONCURRENCY = parseInt(process.env.WORKER_CONCURRENCY || '4', 10);
  static CHAT_HISTORY_RUNS = parseInt(process.env.CHAT_HISTORY_RUNS || '30', 10);
  static AGENT_MAX_TOOL_STEPS = parseInt(process.env.AGENT_MAX_TOOL_STEPS || '12', 10);

  // Scraping
  static SCRAPE_TIMEOUT_MS = parseInt(process.env.SCRAPE_TIMEOUT_MS || '30000', 10);
  static SCRAPER_LLM_EXTRACTION = process.env.SCRAPER_LLM_EXTRACTION !== 'false';
  static SCRAPE_MAX_CHARS = 50000;

  // Audio
  static TTS_CONCURRENCY = parseInt(process.env.TTS_CONCURRENCY || '8', 10);
  static AUDIO_SILENCE_MS = parseInt(process.env.AUDIO_SILENCE_MS || '500', 10);
  static INTRO_MUSIC_FILE = process.env.INTRO_MUSIC_FILE || '';
  static OUTRO_MUSIC_FILE = process.env.OUTRO_MUSIC_FILE || '';
  static FFMPEG_PATH = process.env.FFMPEG_PATH || 'ffmpeg';

  // External API
  static EXTERNAL_API_KEY = process.env.EXTERNAL_API_KEY || '';

  /**
   * Non-secret view of the active configuration
   */
  static describe(): Record<string, string | number | boolean> {
    return {
      model: Config.OPENAI_MODEL,
      script_model: Config.SCRIPT_MODEL,
      tts_model: Config.TTS_MODEL,
      storage_backend: Config.STORAGE_BACKEND,
      worker_concurrency: Config.WORKER_CONCURRENCY,
      chat_history_runs: Config.CHAT_HISTORY_RUNS,
      openai_configured: Config.OPENAI_API_KEY.length > 0,
      tavily_configured: Config.TAVILY_API_KEY.length > 0,
      elevenlabs_configured: Config.ELEVENLABS_API_KEY.length > 0,
    };
  }
}
