import type { VercelRequest, VercelResponse } from '@vercel/node';

export const VERSION = '1.0.0';

export default function handler(_req: VercelRequest, res: VercelResponse): void {
  res.status(200).json({
    status: 'ok',
    version: VERSION,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
}
