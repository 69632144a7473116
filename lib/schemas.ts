/**
 * Zod schemas for the JSON records that cross process boundaries:
 * session state, model output and stored rows.
 */

import { z } from 'zod';

export const SESSION_STAGES = [
  'welcome',
  'search',
  'scrape',
  'script',
  'audio',
  'finished',
  'error',
] as const;

export const TTS_ENGINES = ['openai', 'elevenlabs'] as const;

export const SearchResultItemSchema = z.object({
  url: z.string().min(1),
  title: z.string().default(''),
  description: z.string().nullish().transform(value => value ?? ''),
  source_name: z.string().nullish().transform(value => value || 'general'),
  tool_used: z.string().nullish().transform(value => value || 'unknown'),
  published_date: z.string().nullish().transform(value => value ?? ''),
  is_scrapping_required: z.boolean().default(true),
  confirmed: z.boolean().optional(),
  full_text: z.string().optional(),
  final_url: z.string().optional(),
  scraped: z.boolean().optional(),
  scrape_error: z.string().optional(),
});

export type SearchResultItem = z.infer<typeof SearchResultItemSchema>;
export type SearchResultInput = z.input<typeof SearchResultItemSchema>;

export const SearchResultsSchema = z.object({
  items: z.array(SearchResultItemSchema).default([]),
});

export const DialogLineSchema = z.object({
  speaker: z.string(),
  text: z.string(),
});

export const ScriptSectionSchema = z.object({
  type: z.string(),
  title: z.string().nullish(),
  dialog: z.array(DialogLineSchema).default([]),
});

export const PodcastScriptSchema = z.object({
  title: z.string(),
  sections: z.array(ScriptSectionSchema).default([]),
});

export const GeneratedScriptSchema = PodcastScriptSchema.extend({
  sources: z.array(z.string()).default([]),
});

export type DialogLine = z.infer<typeof DialogLineSchema>;
export type ScriptSection = z.infer<typeof ScriptSectionSchema>;
export type PodcastScript = z.infer<typeof PodcastScriptSchema>;
export type GeneratedScript = z.infer<typeof GeneratedScriptSchema>;

export const LanguageSchema = z.object({
  code: z.string(),
  name: z.string(),
});

export const SessionStateSchema = z.object({
  stage: z.enum(SESSION_STAGES).catch('welcome').default('welcome'),
  search_results: z.array(SearchResultItemSchema).default([]),
  generated_script: GeneratedScriptSchema.nullable().default(null),
  selected_language: LanguageSchema.default({ code: 'en', name: 'English' }),
  tts_engine: z.enum(TTS_ENGINES).nullable().catch(null).default(null),
  audio_url: z.string().nullable().default(null),
  title: z.string().nullable().default(null),
  finished: z.boolean().default(false),
  show_sources_for_selection: z.boolean().default(false),
  show_script_for_confirmation: z.boolean().default(false),
  show_audio_for_confirmation: z.boolean().default(false),
  show_recording_player: z.boolean().default(false),
});

export type SessionState = z.infer<typeof SessionStateSchema>;
export type SessionStage = SessionState['stage'];
export type TtsEngineName = (typeof TTS_ENGINES)[number];
export type LanguageSelection = z.infer<typeof LanguageSchema>;
