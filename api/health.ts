import type { ApiRequest, ApiResponse } from '../src/http/handler-helpers';

/**
 * GET /api/health
 */
export default function handler(_req: ApiRequest, res: ApiResponse) {
  res.status(200).json({
    status: 'ok',
    service: 'campaign-sender-sync',
    timestamp: new Date().toISOString(),
  });
}
