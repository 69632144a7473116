/**
 * Print an LLM cost summary from the cost tracker database
 *
 * npm run costs
 */

import { getCostTracker } from '../lib/db/cost-tracker';
import type { CostBreakdownRow, CostTotals } from '../lib/types';

function usd(value: number): string {
  return `$${value.toFixed(4)}`;
}

function printTotals(label: string, totals: CostTotals) {
  console.log(
    `${label.padEnd(14)} ${usd(totals.total_cost).padStart(12)}  ` +
      `${totals.total_calls} calls, ${totals.total_input_tokens + totals.total_output_tokens} tokens`
  );
}

function printBreakdown(title: string, rows: CostBreakdownRow[]) {
  console.log(`\n${title}`);
  if (rows.length === 0) {
    console.log('  (none)');
    return;
  }
  for (const row of rows) {
    console.log(`  ${row.key.padEnd(28)} ${usd(row.total_cost).padStart(12)}  ${row.total_calls} calls`);
  }
}

function main() {
  const tracker = getCostTracker();
  const summary = tracker.getCostSummary();

  console.log('💰 LLM cost report\n');
  printTotals('All time', summary.all_time);
  printTotals('Last 24 hours', summary.last_24_hours);
  printTotals('Last 7 days', summary.last_7_days);
  printBreakdown('By agent', summary.by_context);
  printBreakdown('By model', summary.by_model);

  tracker.close();
}

main();
