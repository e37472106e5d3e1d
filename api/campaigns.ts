import {
  ApiRequest,
  ApiResponse,
  handleCors,
  parseId,
  rejectMethod,
  sendError,
  serviceFor,
} from '../src/http/handler-helpers';

/**
 * GET /api/campaigns?client_id=123
 * Lists the campaigns visible to the caller's API key (X-Api-Key header).
 *
 * Response: { campaigns: SmartleadCampaign[] }
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  if (handleCors(req, res, ['GET'])) return;
  if (rejectMethod(req, res, ['GET'])) return;

  try {
    const service = serviceFor(req);
    const clientId = parseId(req.query.client_id) ?? undefined;
    const campaigns = await service.listCampaigns({ clientId, includeTags: true });
    return res.status(200).json({ campaigns });
  } catch (err) {
    return sendError(res, err, 'campaigns');
  }
}
