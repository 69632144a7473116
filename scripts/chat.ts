/**
 * Interactive console chat with the podcast agent
 *
 * npm run chat -- [session-id]
 */

import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import { getChatWorker } from '../lib/worker';
import { getSessionStore } from '../lib/db/session-store';
import { Crypto } from '../lib/utils';

async function main() {
  const sessionId = process.argv[2] || Crypto.uuid();
  const worker = getChatWorker();
  const rl = createInterface({ input, output });

  console.log(`🎙️  Podcast chat - session ${sessionId}`);
  console.log('Type a topic to start, or "exit" to quit.\n');

  try {
    for (;;) {
      const message = (await rl.question('you> ')).trim();
      if (!message) continue;
      if (message === 'exit' || message === 'quit') break;

      const result = await worker.wait(worker.submit(sessionId, message));
      console.log(`\nagent> ${result.response}`);
      console.log(`       [stage: ${result.stage}]\n`);
    }
  } finally {
    rl.close();
    getSessionStore().close();
  }

  console.log(`Session saved: ${sessionId}`);
}

main().catch(error => {
  console.error('❌ Chat failed:', error);
  process.exit(1);
});
