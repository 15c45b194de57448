import type { Request, Response } from 'express';

import { supportedFormats } from '../../metadata/index.js';

/**
 * Handler for GET /health
 */
export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    formats: supportedFormats,
    uptimeSeconds: Math.round(process.uptime()),
    timestamp: new Date().toISOString()
  });
}
