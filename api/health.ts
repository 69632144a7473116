/**
 * Health Check API endpoint
 *
 * GET /api/health
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../lib/config';
import { getSessionStore } from '../lib/db/session-store';
import { getCostTracker } from '../lib/db/cost-tracker';
import { availableTtsEngines } from '../lib/tools/tts';
import { Logger, errorMessage } from '../lib/utils';

function check(name: string, probe: () => void): 'ok' | 'error' {
  try {
    probe();
    return 'ok';
  } catch (error) {
    Logger.warn(`Health check ${name} failed`, { error: errorMessage(error) });
    return 'error';
  }
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const engines = availableTtsEngines();
  const checks = {
    sessions_db: check('sessions_db', () => getSessionStore().listSessions(1)),
    costs_db: check('costs_db', () => getCostTracker().getRecentCalls(1)),
    openai: Config.OPENAI_API_KEY ? 'ok' : 'not configured',
    tts: engines.openai || engines.elevenlabs ? 'ok' : 'not configured',
  };

  const healthy = Object.values(checks).every(value => value === 'ok');
  return res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
    checks,
    config: Config.describe(),
  });
}
