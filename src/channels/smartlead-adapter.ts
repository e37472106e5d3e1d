// Smartlead Adapter
// Campaign + email-account inventory client for the Smartlead API

import { BaseApiAdapter, isRecord } from './base-adapter';
import {
  AddAccountsResult,
  CampaignFilter,
  ListPayload,
  SmartleadCampaign,
  SmartleadEmailAccount,
} from './smartlead-types';
import {
  DEFAULT_RETRY_POLICY,
  RetryPolicy,
  Sleep,
  TransportError,
  isTransientStatus,
  withRetry,
} from '../core/retry-policy';
import {
  InvalidCredentialError,
  MalformedResponseError,
  RequestFailedError,
  errorMessage,
} from '../core/errors';

export const SMARTLEAD_BASE_URL = 'https://server.smartlead.ai/api/v1';
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_PAGE_SIZE = 100;

// Pagination guards
const MAX_EMPTY_PAGES = 3;
const PAGE_PAUSE_EVERY = 10;
const PAGE_PAUSE_MS = 100;

type QueryValue = string | number | boolean;

interface RequestOptions {
  params?: Record<string, QueryValue | undefined>;
  body?: unknown;
}

export interface SmartleadAdapterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  pageSize?: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  fetchImpl?: typeof fetch;
}

// ==================== Response decoding ====================

export function decodeListPayload(body: unknown): ListPayload {
  if (Array.isArray(body)) return { kind: 'list', items: body };
  if (isRecord(body) && 'data' in body) return { kind: 'envelope', data: body.data };
  return { kind: 'scalar', value: body };
}

function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) return true;
  return isRecord(value) && Object.keys(value).length === 0;
}

export function payloadToList(payload: ListPayload): unknown[] {
  switch (payload.kind) {
    case 'list':
      return payload.items;
    case 'envelope':
      return Array.isArray(payload.data) ? payload.data : payloadToList({ kind: 'scalar', value: payload.data });
    case 'scalar':
      return isEmptyValue(payload.value) ? [] : [payload.value];
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function positiveId(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;
}

export function toAccountRecord(value: unknown): SmartleadEmailAccount | null {
  if (!isRecord(value)) return null;
  const id = positiveId(value.id);
  if (id === null) return null;

  return {
    ...value,
    id,
    username: optionalString(value.username),
    from_email: optionalString(value.from_email),
    email: optionalString(value.email),
  };
}

export function toCampaignRecord(value: unknown): SmartleadCampaign | null {
  if (!isRecord(value)) return null;
  const id = positiveId(value.id);
  if (id === null) return null;

  return {
    ...value,
    id,
    name: optionalString(value.name) ?? `Campaign ${id}`,
    status: optionalString(value.status) ?? 'UNKNOWN',
  };
}

// ==================== Adapter ====================

export class SmartleadAdapter extends BaseApiAdapter {
  readonly name = 'Smartlead';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: typeof fetch;

  constructor(apiKey: string | undefined, options: SmartleadAdapterOptions = {}) {
    super(options.sleep);
    const key = apiKey?.trim();
    if (!key) {
      throw new InvalidCredentialError();
    }

    this.apiKey = key;
    this.baseUrl = (options.baseUrl || SMARTLEAD_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  // ==================== HTTP Client ====================

  private buildUrl(endpoint: string, params: RequestOptions['params'] = {}): string {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    url.searchParams.set('api_key', this.apiKey);
    return url.toString();
  }

  // Aborts and dropped sockets can surface from fetch() or from reading the body
  private transportFailure(err: unknown, signal: AbortSignal): TransportError {
    if (signal.aborted) {
      return new TransportError(`timeout after ${this.timeoutMs}ms`, { kind: 'timeout', transient: true, cause: err });
    }
    return new TransportError(`connection error: ${errorMessage(err)}`, {
      kind: 'connection',
      transient: true,
      cause: err,
    });
  }

  private async attempt(method: string, url: string, body: unknown): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            'Content-Type': 'application/json',
            'Accept': 'application/json',
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });
        text = await response.text();
      } catch (err) {
        throw this.transportFailure(err, controller.signal);
      }

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status}: ${text.slice(0, 200)}`, {
          kind: 'status',
          status: response.status,
          transient: isTransientStatus(response.status),
        });
      }
      return text;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async request(method: 'GET' | 'POST', endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, options.params);
    const label = `${method} ${endpoint}`;

    this.debug(label);
    const text = await withRetry(() => this.attempt(method, url, options.body), this.retryPolicy, {
      sleep: this.sleep,
      label,
      onRetry: (err, attempt, delayMs) => {
        this.warn(
          `${label} failed (attempt ${attempt + 1}/${this.retryPolicy.maxAttempts}), ` +
          `retrying in ${(delayMs / 1000).toFixed(2)}s: ${errorMessage(err)}`
        );
      },
    });

    if (!text.trim()) {
      return {};
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      this.warn(`${label} returned a non-JSON body`);
      throw new MalformedResponseError(`${label} returned a non-JSON body`, { cause: err });
    }
  }

  private async getList(endpoint: string, params?: RequestOptions['params']): Promise<unknown[]> {
    const body = await this.request('GET', endpoint, { params });
    return payloadToList(decodeListPayload(body));
  }

  private validateAccounts(items: unknown[], context: string): SmartleadEmailAccount[] {
    const valid: SmartleadEmailAccount[] = [];
    for (const item of items) {
      const account = toAccountRecord(item);
      if (account) {
        valid.push(account);
      } else {
        this.warn(`Skipping invalid account data (${context}): ${JSON.stringify(item)}`);
      }
    }
    return valid;
  }

  // ==================== Campaigns ====================

  async fetchCampaigns(filter: CampaignFilter = {}): Promise<SmartleadCampaign[]> {
    const params: RequestOptions['params'] = {};
    if (filter.clientId) params.client_id = filter.clientId;
    if (filter.includeTags) params.include_tags = 'true';

    this.log(`Fetching campaigns${filter.clientId ? ` for client ${filter.clientId}` : ''}`);
    const items = await this.getList('/campaigns', params);

    const campaigns: SmartleadCampaign[] = [];
    for (const item of items) {
      const campaign = toCampaignRecord(item);
      if (campaign) {
        campaigns.push(campaign);
      } else {
        this.warn(`Skipping invalid campaign data: ${JSON.stringify(item)}`);
      }
    }

    this.log(`Fetched ${campaigns.length} campaigns`);
    return campaigns;
  }

  async getCampaignDetails(campaignId: number): Promise<Record<string, unknown>> {
    this.log(`Fetching details for campaign ${campaignId}`);
    const details = await this.request('GET', `/campaigns/${campaignId}`);

    if (!isRecord(details)) {
      this.warn(`Expected an object for campaign ${campaignId} details`);
      return {};
    }
    return details;
  }

  // ==================== Email Accounts ====================

  /**
   * Walk the whole inventory with limit/offset paging.
   *
   * Stops on the first non-empty page shorter than `pageSize`, or after
   * three consecutive pages with no valid record. A page whose request
   * fails is logged and skipped; it counts as an empty page.
   */
  async fetchAllAccounts(pageSize: number = this.pageSize): Promise<SmartleadEmailAccount[]> {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }

    const all: SmartleadEmailAccount[] = [];
    let offset = 0;
    let page = 0;
    let emptyStreak = 0;

    this.log(`Fetching all email accounts (page size ${pageSize})`);

    while (true) {
      page++;
      let items: unknown[] | null = null;

      try {
        items = await this.getList('/email-accounts', { limit: pageSize, offset });
      } catch (err) {
        if (!(err instanceof RequestFailedError || err instanceof MalformedResponseError)) throw err;
        console.error(`[Smartlead] Error fetching page ${page} (offset ${offset}): ${err.message}`);
      }

      offset += pageSize;
      const valid = items ? this.validateAccounts(items, `page ${page}`) : [];
      all.push(...valid);

      if (valid.length === 0) {
        emptyStreak++;
        this.debug(`Page ${page} had no valid accounts (${emptyStreak}/${MAX_EMPTY_PAGES})`);
        if (emptyStreak >= MAX_EMPTY_PAGES) {
          this.log(`Stopping pagination after ${MAX_EMPTY_PAGES} empty pages`);
          break;
        }
      } else {
        emptyStreak = 0;
        this.log(`Fetched page ${page}: ${valid.length} accounts (total: ${all.length})`);
      }

      if (items && items.length > 0 && items.length < pageSize) {
        this.log(`Reached end of accounts (got ${items.length} < limit ${pageSize})`);
        break;
      }

      if (page % PAGE_PAUSE_EVERY === 0) {
        await this.delay(PAGE_PAUSE_MS);
      }
    }

    this.log(`Finished fetching email accounts: ${all.length} total from ${page} pages`);
    return all;
  }

  async fetchCampaignAccounts(campaignId: number): Promise<SmartleadEmailAccount[]> {
    this.log(`Fetching email accounts for campaign ${campaignId}`);
    const items = await this.getList(`/campaigns/${campaignId}/email-accounts`);
    const accounts = this.validateAccounts(items, `campaign ${campaignId}`);
    this.log(`Fetched ${accounts.length} email accounts for campaign ${campaignId}`);
    return accounts;
  }

  async addAccountsToCampaign(campaignId: number, accountIds: number[]): Promise<AddAccountsResult> {
    if (accountIds.length === 0) {
      this.warn(`No email account IDs provided for campaign ${campaignId}`);
      return { success: true, processedCount: 0, message: 'No accounts to add' };
    }

    this.log(`Adding ${accountIds.length} email accounts to campaign ${campaignId}`);
    const body = await this.request('POST', `/campaigns/${campaignId}/email-accounts`, {
      body: { email_account_ids: accountIds },
    });

    if (!isRecord(body)) {
      this.warn(`Unexpected add-accounts response for campaign ${campaignId}`);
      return { success: false, processedCount: 0, message: `Unexpected response: ${JSON.stringify(body)}` };
    }

    const success = body.ok === true || body.success === true;
    const processedCount = typeof body.added_count === 'number' ? body.added_count : accountIds.length;
    const message = optionalString(body.message);

    if (success) {
      this.log(`Added ${processedCount} accounts to campaign ${campaignId}`);
    } else {
      this.warn(`Campaign ${campaignId} rejected ${accountIds.length} accounts: ${message ?? JSON.stringify(body)}`);
    }

    return { success, processedCount, message: message ?? (success ? undefined : JSON.stringify(body)) };
  }

  // ==================== Utilities ====================

  async validateApiKey(): Promise<boolean> {
    try {
      await this.fetchCampaigns();
      return true;
    } catch (err) {
      console.error(`[Smartlead] API key validation failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
