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
import { BatchRunState, createRunState, parseRunState } from '../src/engine/run-state';
import { loadConfig } from '../src/config';

/**
 * POST /api/apply-batch
 * Submits exactly one batch of an apply run and returns the updated state.
 * The caller keeps the state and posts it back until status is "complete".
 *
 * Request body: { state: BatchRunState }
 *           or: { campaignId: number, accountIds: number[], batchSize?: number }
 * Response: { state: BatchRunState }
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  if (handleCors(req, res, ['POST'])) return;
  if (rejectMethod(req, res, ['POST'])) return;

  const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
  let state: BatchRunState | null;

  if (body.state !== undefined) {
    state = parseRunState(body.state);
    if (!state) {
      return badRequest(res, '"state" is not a valid run state');
    }
  } else {
    const campaignId = parseId(body.campaignId);
    if (campaignId === null) {
      return badRequest(res, 'Request body must include "state" or a positive integer "campaignId"');
    }

    const accountIds = body.accountIds;
    if (!Array.isArray(accountIds) || !accountIds.every(id => parseId(id) !== null)) {
      return badRequest(res, '"accountIds" must be an array of positive integer ids');
    }

    const batchSize = body.batchSize === undefined ? loadConfig().batchSize : parseId(body.batchSize);
    if (batchSize === null) {
      return badRequest(res, '"batchSize" must be a positive integer');
    }

    state = createRunState(campaignId, accountIds.map(Number), batchSize);
  }

  try {
    const service = serviceFor(req);
    const next = await service.applyStep(state);
    return res.status(200).json({ state: next });
  } catch (err) {
    return sendError(res, err, 'apply-batch');
  }
}
