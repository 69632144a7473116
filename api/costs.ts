/**
 * Costs API - LLM spend from the cost tracker
 *
 * GET /api/costs?start=2024-01-01&end=2024-02-01&model=gpt-4o&context=ScriptAgent
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getCostTracker } from '../lib/db/cost-tracker';
import { handlePreflight, queryParam } from '../lib/middleware/api-auth';
import { Logger, errorMessage } from '../lib/utils';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (handlePreflight(req, res, ['GET'])) return;

  try {
    const tracker = getCostTracker();
    const filters = {
      startDate: queryParam(req, 'start'),
      endDate: queryParam(req, 'end'),
      model: queryParam(req, 'model'),
      context: queryParam(req, 'context'),
    };

    return res.status(200).json({
      filters,
      totals: tracker.getTotalCost(filters),
      summary: tracker.getCostSummary(),
      recent: tracker.getRecentCalls(20),
    });
  } catch (error) {
    Logger.error('Costs API failed', { error: errorMessage(error) });
    return res.status(500).json({ error: errorMessage(error) });
  }
}
