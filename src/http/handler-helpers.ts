// Shared plumbing for the Vercel-style API handlers
import type { IncomingHttpHeaders } from 'http';
import type { VercelRequest } from '@vercel/node';
import { loadConfig } from '../config';
import {
  CsvParseError,
  InvalidCredentialError,
  MalformedResponseError,
  MissingColumnError,
  RequestFailedError,
  SyncError,
  errorMessage,
} from '../core/errors';
import { InventoryCacheStore } from '../core/inventory-cache';
import { TransportError } from '../core/retry-policy';
import { SyncService, createSyncService } from '../engine/sync-service';

// The parts of a Vercel (or Express) request and response the handlers touch
export type ApiRequest = Pick<VercelRequest, 'method'> & {
  headers: IncomingHttpHeaders;
  query: Record<string, unknown>;
  body?: unknown;
};

export interface ApiResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  end(): unknown;
}

// One cache per process, shared by every request
const inventoryCache = new InventoryCacheStore();

export function getInventoryCache(): InventoryCacheStore {
  return inventoryCache;
}

/** Sets CORS headers; returns true when the request was a preflight and is answered. */
export function handleCors(req: ApiRequest, res: ApiResponse, methods: string[]): boolean {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', [...methods, 'OPTIONS'].join(', '));
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Api-Key');

  if (req.method === 'OPTIONS') {
    res.status(200).end();
    return true;
  }
  return false;
}

export function rejectMethod(req: ApiRequest, res: ApiResponse, allowed: string[]): boolean {
  if (req.method && allowed.includes(req.method)) return false;
  res.status(405).json({ error: 'Method not allowed', allowed });
  return true;
}

export function resolveApiKey(req: ApiRequest): string {
  const header = req.headers['x-api-key'];
  const value = Array.isArray(header) ? header[0] : header;
  return (value || process.env.SMARTLEAD_API_KEY || '').trim();
}

export function serviceFor(req: ApiRequest): SyncService {
  return createSyncService(resolveApiKey(req), loadConfig(), { cache: inventoryCache });
}

export function parseId(value: unknown): number | null {
  const id = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : null;
}

export function badRequest(res: ApiResponse, message: string): void {
  res.status(400).json({ error: 'Bad request', message });
}

export function statusFor(err: unknown): { status: number; error: string } {
  if (err instanceof InvalidCredentialError) return { status: 401, error: 'Unauthorized' };
  if (err instanceof MissingColumnError || err instanceof CsvParseError) return { status: 400, error: 'Bad request' };
  if (err instanceof RequestFailedError) {
    if (err.status === 401 || err.status === 403) return { status: 401, error: 'Unauthorized' };
    if (err.cause instanceof TransportError && err.cause.kind === 'timeout') {
      return { status: 504, error: 'Gateway timeout' };
    }
    return { status: 502, error: 'Bad gateway' };
  }
  if (err instanceof MalformedResponseError) return { status: 502, error: 'Bad gateway' };
  return { status: 500, error: 'Internal server error' };
}

// Operator-facing error body: the failed step and message, never a stack
export function sendError(res: ApiResponse, err: unknown, context: string): void {
  console.error(`[${context}] Error:`, errorMessage(err));
  const { status, error } = statusFor(err);
  res.status(status).json({
    error,
    step: err instanceof SyncError ? err.step : undefined,
    message: errorMessage(err),
  });
}
