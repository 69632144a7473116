/**
 * Run the research team on one query and print the report
 *
 * npm run research -- "What are the top AI stories on HackerNews?"
 */

import { ResearchTeam } from '../lib/agents/research-team';
import { BaseAgent } from '../lib/agents/base';
import { Crypto } from '../lib/utils';

async function main() {
  const query = process.argv.slice(2).join(' ').trim();
  if (!query) {
    console.error('Usage: npm run research -- "<query>"');
    process.exit(1);
  }

  const runId = `research_${Crypto.uuid()}`;
  console.log(`🔎 Researching: ${query}\n`);

  const report = await new ResearchTeam().run(runId, { query });

  console.log(report.content);
  console.log('\n---');
  for (const response of report.member_responses) {
    console.log(`• ${response.member}: ${response.task}`);
  }
  console.log(`API calls: ${BaseAgent.getTotalApiCalls(runId)}`);
}

main().catch(error => {
  console.error('❌ Research failed:', error);
  process.exit(1);
});
