/**
 * Session list API
 * GET /api/sessions?limit=50
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getSessionStore } from '../../lib/db/session-store';
import { handlePreflight, queryParam } from '../../lib/middleware/api-auth';
import { errorMessage } from '../../lib/utils';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (handlePreflight(req, res, ['GET'])) return;

  const limit = parseInt(queryParam(req, 'limit') ?? '50', 10);
  if (Number.isNaN(limit) || limit < 1) {
    return res.status(400).json({ error: 'limit must be a positive integer' });
  }

  try {
    return res.status(200).json({ sessions: getSessionStore().listSessions(limit) });
  } catch (error) {
    return res.status(500).json({ error: errorMessage(error) });
  }
}
