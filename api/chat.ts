/**
 * Chat API - queue one chat turn for a podcast session
 *
 * POST /api/chat { session_id?, message, wait? }
 * wait=true answers with the turn result, otherwise with the task id (202)
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { getChatWorker } from '../lib/worker';
import { handlePreflight } from '../lib/middleware/api-auth';
import { Crypto, Logger, errorMessage } from '../lib/utils';

const ChatRequestSchema = z.object({
  session_id: z.string().min(1).optional(),
  message: z.string().trim().min(1, 'message is required'),
  wait: z.boolean().optional().default(false),
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (handlePreflight(req, res, ['POST'])) return;

  const parsed = ChatRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request' });
  }

  const { message, wait } = parsed.data;
  const sessionId = parsed.data.session_id ?? Crypto.uuid();

  try {
    const worker = getChatWorker();
    const taskId = worker.submit(sessionId, message);
    Logger.info('🌐 API /chat', { sessionId, taskId, wait });

    if (!wait) {
      return res.status(202).json({ task_id: taskId, session_id: sessionId, status: 'queued' });
    }

    const result = await worker.wait(taskId);
    return res.status(200).json({ task_id: taskId, ...result });
  } catch (error) {
    Logger.error('Chat API failed', { sessionId, error: errorMessage(error) });
    return res.status(500).json({ error: errorMessage(error) });
  }
}
