/**
 * Research API - run the research team on one query
 * POST /api/research { query }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { ResearchTeam } from '../lib/agents/research-team';
import { handlePreflight } from '../lib/middleware/api-auth';
import { Crypto, Logger, errorMessage } from '../lib/utils';

const ResearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (handlePreflight(req, res, ['POST'])) return;

  const parsed = ResearchRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request' });
  }

  const runId = `research_${Crypto.uuid()}`;
  try {
    Logger.info('🌐 API /research', { runId, query: parsed.data.query });
    const report = await new ResearchTeam().run(runId, { query: parsed.data.query });
    return res.status(200).json({ run_id: runId, ...report });
  } catch (error) {
    Logger.error('Research API failed', { runId, error: errorMessage(error) });
    return res.status(500).json({ run_id: runId, error: errorMessage(error) });
  }
}
