/**
 * Cost tracker - records token usage and dollar cost of every LLM call in SQLite
 */

import Database from 'better-sqlite3';
import type OpenAI from 'openai';
import { z } from 'zod';
import { Config } from '../config';
import { Logger, Crypto } from '../utils';
import { openDatabase } from './sqlite';
import type {
  CostRecord,
  CostFilters,
  CostTotals,
  CostBreakdownRow,
  CostSummary,
} from '../types';

export interface ModelPricing {
  /** USD per 1M input tokens */
  input: number;
  /** USD per 1M output tokens */
  output: number;
  /** Higher rates applied when the prompt exceeds `threshold` input tokens */
  tier?: { threshold: number; input: number; output: number };
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4o': { input: 2.5, output: 10.0 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1': { input: 2.0, output: 8.0 },
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-pro': {
    input: 1.25,
    output: 10.0,
    tier: { threshold: 200_000, input: 2.5, output: 15.0 },
  },
};

export const DEFAULT_PRICING_MODEL = 'gpt-4o-mini';

/**
 * Exact match first, then the longest known prefix (dated snapshots such as
 * gpt-4o-mini-2024-07-18), then the default model.
 */
export function resolvePricing(model: string): ModelPricing {
  const exact = MODEL_PRICING[model];
  if (exact) return exact;

  const prefix = Object.keys(MODEL_PRICING)
    .filter(known => model.startsWith(known))
    .sort((a, b) => b.length - a.length)[0];
  if (prefix) return MODEL_PRICING[prefix];

  Logger.debug('Unknown model pricing, using default', { model, fallback: DEFAULT_PRICING_MODEL });
  return MODEL_PRICING[DEFAULT_PRICING_MODEL];
}

export function calculateCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): { input_cost: number; output_cost: number; total_cost: number } {
  const pricing = resolvePricing(model);
  const large = pricing.tier !== undefined && inputTokens > pricing.tier.threshold;
  const inputRate = large && pricing.tier ? pricing.tier.input : pricing.input;
  const outputRate = large && pricing.tier ? pricing.tier.output : pricing.output;

  const input_cost = (inputTokens / 1_000_000) * inputRate;
  const output_cost = (outputTokens / 1_000_000) * outputRate;
  return { input_cost, output_cost, total_cost: input_cost + output_cost };
}

const TotalsRowSchema = z.object({
  total_input_cost: z.number(),
  total_output_cost: z.number(),
  total_cost: z.number(),
  total_input_tokens: z.number(),
  total_output_tokens: z.number(),
  total_calls: z.number(),
});

const BreakdownRowSchema = z.object({
  key: z.string().nullable(),
  total_cost: z.number(),
  total_tokens: z.number(),
  total_calls: z.number(),
});

const CostRecordRowSchema = z.object({
  call_id: z.string(),
  model: z.string(),
  input_tokens: z.number(),
  output_tokens: z.number(),
  total_tokens: z.number(),
  input_cost: z.number(),
  output_cost: z.number(),
  total_cost: z.number(),
  context: z.string().nullable(),
  timestamp: z.string(),
});

export class CostTracker {
  private db: Database.Database;

  constructor(dbPath: string = Config.COST_DB_PATH) {
    this.db = openDatabase(dbPath);
    this.initDatabase();
  }

  private initDatabase(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS api_calls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        call_id TEXT UNIQUE NOT NULL,
        model TEXT NOT NULL,
        input_tokens INTEGER NOT NULL,
        output_tokens INTEGER NOT NULL,
        total_tokens INTEGER NOT NULL,
        input_cost REAL NOT NULL,
        output_cost REAL NOT NULL,
        total_cost REAL NOT NULL,
        context TEXT,
        timestamp TEXT NOT NULL,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      );
      CREATE INDEX IF NOT EXISTS idx_api_calls_timestamp ON api_calls(timestamp);
      CREATE INDEX IF NOT EXISTS idx_api_calls_model ON api_calls(model);
      CREATE INDEX IF NOT EXISTS idx_api_calls_context ON api_calls(context);
    `);
  }

  static generateCallId(now: Date = new Date()): string {
    return `call_${Math.floor(now.getTime() / 1000)}_${Crypto.randomHex(4)}`;
  }

  buildRecord(
    model: string,
    inputTokens: number,
    outputTokens: number,
    context: string | null = null,
    timestamp: Date = new Date()
  ): CostRecord {
    return {
      call_id: CostTracker.generateCallId(timestamp),
      model,
      input_tokens: inputTokens,
      output_tokens: outputTokens,
      total_tokens: inputTokens + outputTokens,
      ...calculateCost(model, inputTokens, outputTokens),
      context,
      timestamp: timestamp.toISOString(),
    };
  }

  recordCall(record: CostRecord): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO api_calls
          (call_id, model, input_tokens, output_tokens, total_tokens,
           input_cost, output_cost, total_cost, context, timestamp)
         VALUES
          (@call_id, @model, @input_tokens, @output_tokens, @total_tokens,
           @input_cost, @output_cost, @total_cost, @context, @timestamp)`
      )
      .run(record);
  }

  /**
   * Record a chat completion's usage. Returns null when the response carries
   * no usage block.
   */
  trackCompletion(
    completion: OpenAI.Chat.ChatCompletion,
    model: string,
    context: string | null = null
  ): CostRecord | null {
    const usage = completion.usage;
    if (!usage) {
      Logger.warn('Completion has no usage data, cost not tracked', { model, context });
      return null;
    }

    const record = this.buildRecord(model, usage.prompt_tokens, usage.completion_tokens, context);
    this.recordCall(record);

    Logger.debug('API cost recorded', {
      model,
      context,
      total_tokens: record.total_tokens,
      total_cost: record.total_cost,
    });

    return record;
  }

  getTotalCost(filters: CostFilters = {}): CostTotals {
    const { where, params } = this.buildWhere(filters);
    const row = this.db
      .prepare(
        `SELECT
           COALESCE(SUM(input_cost), 0) AS total_input_cost,
           COALESCE(SUM(output_cost), 0) AS total_output_cost,
           COALESCE(SUM(total_cost), 0) AS total_cost,
           COALESCE(SUM(input_tokens), 0) AS total_input_tokens,
           COALESCE(SUM(output_tokens), 0) AS total_output_tokens,
           COUNT(*) AS total_calls
         FROM api_calls ${where}`
      )
      .get(...params);
    return TotalsRowSchema.parse(row);
  }

  getCostByContext(filters: CostFilters = {}): CostBreakdownRow[] {
    return this.breakdown('context', filters);
  }

  getCostByModel(filters: CostFilters = {}): CostBreakdownRow[] {
    return this.breakdown('model', filters);
  }

  getRecentCalls(limit = 20): CostRecord[] {
    const rows = this.db
      .prepare(
        `SELECT call_id, model, input_tokens, output_tokens, total_tokens,
                input_cost, output_cost, total_cost, context, timestamp
         FROM api_calls ORDER BY timestamp DESC, id DESC LIMIT ?`
      )
      .all(limit);
    return z.array(CostRecordRowSchema).parse(rows);
  }

  getCostSummary(now: Date = new Date()): CostSummary {
    const dayAgo = new Date(now.getTime() - 24 * 60 * 60 * 1000).toISOString();
    const weekAgo = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000).toISOString();

    return {
      all_time: this.getTotalCost(),
      last_24_hours: this.getTotalCost({ startDate: dayAgo }),
      last_7_days: this.getTotalCost({ startDate: weekAgo }),
      by_context: this.getCostByContext(),
      by_model: this.getCostByModel(),
    };
  }

  close(): void {
    this.db.close();
  }

  private breakdown(column: 'context' | 'model', filters: CostFilters): CostBreakdownRow[] {
    const { where, params } = this.buildWhere(filters);
    const rows = this.db
      .prepare(
        `SELECT ${column} AS key,
                COALESCE(SUM(total_cost), 0) AS total_cost,
                COALESCE(SUM(total_tokens), 0) AS total_tokens,
                COUNT(*) AS total_calls
         FROM api_calls ${where}
         GROUP BY ${column}
         ORDER BY total_cost DESC`
      )
      .all(...params);

    return z.array(BreakdownRowSchema).parse(rows).map(row => ({
      ...row,
      key: row.key ?? 'unknown',
    }));
  }

  /**
   * Named parameters are only bound when a clause uses them
   */
  private buildWhere(filters: CostFilters): { where: string; params: Array<Record<string, string>> } {
    const clauses: string[] = [];
    const params: Record<string, string> = {};

    if (filters.startDate) {
      clauses.push('timestamp >= @startDate');
      params.startDate = filters.startDate;
    }
    if (filters.endDate) {
      clauses.push('timestamp <= @endDate');
      params.endDate = filters.endDate;
    }
    if (filters.model) {
      clauses.push('model = @model');
      params.model = filters.model;
    }
    if (filters.context) {
      clauses.push('context = @context');
      params.context = filters.context;
    }

    return {
      where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '',
      params: clauses.length > 0 ? [params] : [],
    };
  }
}

let costTracker: CostTracker | null = null;

export function getCostTracker(): CostTracker {
  if (!costTracker) {
    costTracker = new CostTracker();
  }
  return costTracker;
}
