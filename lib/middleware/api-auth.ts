/**
 * API Authentication Middleware
 *
 * Requests must carry X-API-Key when EXTERNAL_API_KEY is set
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../config';

/**
 * Returns an error message if authentication fails, null if the request may proceed
 */
export function authenticateApiKey(req: Pick<VercelRequest, 'headers'>): string | null {
  const apiKey = Config.EXTERNAL_API_KEY;
  if (!apiKey) {
    return null;
  }

  const header = req.headers['x-api-key'];
  const providedKey = Array.isArray(header) ? header[0] : header;

  if (!providedKey) {
    return 'Missing X-API-Key header';
  }

  if (providedKey !== apiKey) {
    return 'Invalid API key';
  }

  return null;
}

/**
 * CORS headers, preflight and method check shared by every handler.
 * Returns true when the response has already been sent.
 */
export function handlePreflight(req: VercelRequest, res: VercelResponse, methods: string[]): boolean {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', [...methods, 'OPTIONS'].join(', '));
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-API-Key');

  if (req.method === 'OPTIONS') {
    res.status(200).end();
    return true;
  }

  if (!req.method || !methods.includes(req.method)) {
    res.status(405).json({ error: 'Method not allowed' });
    return true;
  }

  const authError = authenticateApiKey(req);
  if (authError) {
    res.status(401).json({ error: authError });
    return true;
  }

  return false;
}

export function queryParam(req: VercelRequest, name: string): string | undefined {
  const value = req.query[name];
  return Array.isArray(value) ? value[0] : value;
}
