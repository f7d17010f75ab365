import { Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'node:crypto';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `X-API-Key` to equal the API_KEY environment variable.
 */
export const validateApiKey = (req: Request, res: Response, next: NextFunction): void => {
  const apiKey = req.headers['x-api-key'];
  const expectedApiKey = process.env.API_KEY;

  if (!expectedApiKey) {
    console.error('[Auth] API_KEY not configured in environment variables');
    res.status(500).json({ error: 'Server configuration error' });
    return;
  }

  if (!apiKey) {
    res.status(401).json({ error: 'Missing X-API-Key header' });
    return;
  }

  // Repeated headers arrive as an array and never match
  if (typeof apiKey !== 'string' || !keysMatch(apiKey, expectedApiKey)) {
    res.status(403).json({ error: 'Invalid API key' });
    return;
  }

  next();
};
