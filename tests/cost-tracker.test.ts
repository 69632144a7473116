import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CostTracker,
  MODEL_PRICING,
  calculateCost,
  resolvePricing,
} from '../lib/db/cost-tracker';
import { textReply } from './helpers';

describe('calculateCost', () => {
  it('prices per million tokens', () => {
    const cost = calculateCost('gpt-4o', 1_000_000, 500_000);
    expect(cost.input_cost).toBeCloseTo(2.5);
    expect(cost.output_cost).toBeCloseTo(5);
    expect(cost.total_cost).toBeCloseTo(7.5);
  });

  it('applies the large-prompt tier above the threshold', () => {
    const cost = calculateCost('gemini-2.5-pro', 250_000, 1_000);
    expect(cost.input_cost).toBeCloseTo(0.625);
    expect(cost.output_cost).toBeCloseTo(0.015);
  });

  it('keeps base rates at the threshold', () => {
    const cost = calculateCost('gemini-2.5-pro', 200_000, 0);
    expect(cost.input_cost).toBeCloseTo(0.25);
  });
});

describe('resolvePricing', () => {
  it('matches dated snapshots by the longest prefix', () => {
    expect(resolvePricing('gpt-4o-mini-2024-07-18')).toBe(MODEL_PRICING['gpt-4o-mini']);
    expect(resolvePricing('gpt-4o-2024-08-06')).toBe(MODEL_PRICING['gpt-4o']);
  });

  it('falls back to the default model', () => {
    expect(resolvePricing('mystery-model')).toBe(MODEL_PRICING['gpt-4o-mini']);
  });
});

describe('CostTracker', () => {
  let tracker: CostTracker;

  beforeEach(() => {
    tracker = new CostTracker(':memory:');
    tracker.recordCall(
      tracker.buildRecord('gpt-4o', 1000, 500, 'ScriptAgent', new Date('2024-01-10T00:00:00Z'))
    );
    tracker.recordCall(
      tracker.buildRecord('gpt-4o-mini', 2000, 1000, 'SearchAgent', new Date('2024-01-09T12:00:00Z'))
    );
    tracker.recordCall(
      tracker.buildRecord('gpt-4o-mini', 1000, 1000, null, new Date('2024-01-01T00:00:00Z'))
    );
  });

  afterEach(() => {
    tracker.close();
  });

  it('generates call ids from the unix time', () => {
    expect(CostTracker.generateCallId(new Date('2024-01-01T00:00:00Z'))).toMatch(
      /^call_1704067200_[0-9a-f]{8}$/
    );
  });

  it('totals every call', () => {
    const totals = tracker.getTotalCost();
    expect(totals.total_calls).toBe(3);
    expect(totals.total_input_tokens).toBe(4000);
    expect(totals.total_output_tokens).toBe(2500);
    expect(totals.total_cost).toBeCloseTo(0.00915, 8);
  });

  it('filters by model and date', () => {
    const mini = tracker.getTotalCost({ model: 'gpt-4o-mini' });
    expect(mini.total_calls).toBe(2);
    expect(mini.total_cost).toBeCloseTo(0.00165, 8);

    const recent = tracker.getTotalCost({ startDate: '2024-01-09T00:00:00.000Z' });
    expect(recent.total_calls).toBe(2);
    expect(recent.total_cost).toBeCloseTo(0.0084, 8);

    const none = tracker.getTotalCost({ context: 'AudioAgent' });
    expect(none.total_calls).toBe(0);
    expect(none.total_cost).toBe(0);
  });

  it('breaks costs down by context, most expensive first', () => {
    const rows = tracker.getCostByContext();
    expect(rows.map(row => row.key)).toEqual(['ScriptAgent', 'SearchAgent', 'unknown']);
    expect(rows[0].total_tokens).toBe(1500);
    expect(rows[2].total_calls).toBe(1);
  });

  it('summarizes rolling windows', () => {
    const summary = tracker.getCostSummary(new Date('2024-01-10T06:00:00Z'));
    expect(summary.all_time.total_calls).toBe(3);
    expect(summary.last_24_hours.total_calls).toBe(2);
    expect(summary.last_7_days.total_calls).toBe(2);
    expect(summary.by_model).toHaveLength(2);
    expect(summary.by_model[0].key).toBe('gpt-4o');
    expect(summary.by_model[1].total_calls).toBe(2);
  });

  it('records completion usage with the agent as context', () => {
    const record = tracker.trackCompletion(textReply('hi'), 'gpt-4o-mini', 'PodcastChatAgent');
    expect(record).not.toBeNull();
    expect(record?.input_tokens).toBe(100);
    expect(record?.output_tokens).toBe(20);
    expect(record?.total_tokens).toBe(120);

    const [latest] = tracker.getRecentCalls(1);
    expect(latest.context).toBe('PodcastChatAgent');
    expect(latest.call_id).toBe(record?.call_id);
  });

  it('skips completions without usage', () => {
    const reply = { ...textReply('hi'), usage: undefined };
    expect(tracker.trackCompletion(reply, 'gpt-4o-mini')).toBeNull();
    expect(tracker.getTotalCost().total_calls).toBe(3);
  });
});
