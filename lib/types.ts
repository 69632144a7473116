/**
 * Core type definitions shared across agents, tools and handlers
 */

import type { SessionStage, SessionState } from './schemas';

export type {
  SearchResultItem,
  SearchResultInput,
  DialogLine,
  ScriptSection,
  PodcastScript,
  GeneratedScript,
  SessionState,
  SessionStage,
  TtsEngineName,
  LanguageSelection,
} from './schemas';

export interface AgentMessage<TInput, TOutput> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: TInput;
  output?: TOutput;
  errors: string[];
  duration_ms?: number;
  api_calls?: number;
}

export interface ChatTurn {
  user_message: string;
  response: string;
  created_at: string;
}

export interface SessionRecord {
  session_id: string;
  state: SessionState;
  created_at: string | null;
  updated_at: string | null;
}

export interface ChatTaskResult {
  session_id: string;
  response: string;
  stage: SessionStage;
  session_state: string;
  is_processing: false;
  process_type: null;
}

export type ScrapeResult =
  | {
      original_url: string;
      final_url: string;
      title: string;
      authors: string[];
      published_date: string | null;
      full_text: string;
      success: true;
    }
  | {
      original_url: string;
      error: string;
      success: false;
      timestamp: string;
    };

// Speaker slots used by the TTS engines
export type SpeakerId = 1 | 2;

export interface ScriptEntry {
  text: string;
  speaker: SpeakerId;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface CostRecord extends TokenUsage {
  call_id: string;
  model: string;
  input_cost: number;
  output_cost: number;
  total_cost: number;
  context: string | null;
  timestamp: string;
}

export interface CostFilters {
  startDate?: string;
  endDate?: string;
  model?: string;
  context?: string;
}

export interface CostTotals {
  total_input_cost: number;
  total_output_cost: number;
  total_cost: number;
  total_input_tokens: number;
  total_output_tokens: number;
  total_calls: number;
}

export interface CostBreakdownRow {
  key: string;
  total_cost: number;
  total_tokens: number;
  total_calls: number;
}

export interface CostSummary {
  all_time: CostTotals;
  last_24_hours: CostTotals;
  last_7_days: CostTotals;
  by_context: CostBreakdownRow[];
  by_model: CostBreakdownRow[];
}

export type TaskStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface ChatTask {
  task_id: string;
  session_id: string;
  message: string;
  status: TaskStatus;
  submitted_at: string;
  started_at?: string;
  completed_at?: string;
  result?: ChatTaskResult;
}

export interface ResearchMemberResponse {
  member: string;
  task: string;
  response: string;
}

export interface ResearchReport {
  query: string;
  content: string;
  member_responses: ResearchMemberResponse[];
}
