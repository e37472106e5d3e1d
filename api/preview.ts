import { isRecord } from '../src/channels/base-adapter';
import {
  ApiRequest,
  ApiResponse,
  badRequest,
  handleCors,
  parseId,
  rejectMethod,
  sendError,
  serviceFor,
} from '../src/http/handler-helpers';

/**
 * POST /api/preview
 * Reconcile an uploaded CSV against the inventory and the campaign's accounts.
 *
 * Request body: { campaignId: number, csv: string, emailColumn?: string }
 * Response: { campaignId, extraction, inventorySize, campaignAccountCount, reconciliation }
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  if (handleCors(req, res, ['POST'])) return;
  if (rejectMethod(req, res, ['POST'])) return;

  const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};

  const campaignId = parseId(body.campaignId);
  if (campaignId === null) {
    return badRequest(res, 'Request body must include a positive integer "campaignId"');
  }
  const csv = body.csv;
  if (typeof csv !== 'string' || csv.trim() === '') {
    return badRequest(res, 'Request body must include non-empty "csv" text');
  }
  const emailColumn = body.emailColumn;
  if (emailColumn !== undefined && typeof emailColumn !== 'string') {
    return badRequest(res, '"emailColumn" must be a string');
  }

  try {
    const service = serviceFor(req);
    const preview = await service.preview(campaignId, csv, typeof emailColumn === 'string' ? emailColumn : undefined);
    return res.status(200).json(preview);
  } catch (err) {
    return sendError(res, err, 'preview');
  }
}
