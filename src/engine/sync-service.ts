// Sync Service
// fetch → normalize → diff → batch-write, for the CLI and HTTP entry points

import { SmartleadAdapter } from '../channels/smartlead-adapter';
import { CampaignFilter, SmartleadCampaign } from '../channels/smartlead-types';
import { CsvEmailExtraction, extractEmailsFromCsv } from '../core/csv-reader';
import { CachedInventory, InventoryCacheStore, InventorySource, credentialScope } from '../core/inventory-cache';
import { ReconciliationResult, accountIdsToAdd, reconcile } from '../core/reconciliation';
import { createRetryPolicy } from '../core/retry-policy';
import { SyncConfig } from '../config';
import { BatchApplier, RunOptions } from './batch-applier';
import { BatchRunState, createRunState } from './run-state';
import { RunStateStore } from './run-store';

export interface SyncPreview {
  campaignId: number;
  extraction: CsvEmailExtraction;
  inventorySize: number;
  campaignAccountCount: number;
  reconciliation: ReconciliationResult;
}

export interface SyncServiceOptions {
  pageSize?: number;
  batchSize?: number;
  onRunComplete?: (state: BatchRunState) => void;
}

export class SyncService {
  private pageSize?: number;
  private batchSize: number;
  private onRunComplete?: (state: BatchRunState) => void;

  constructor(
    private inventory: InventorySource,
    private applier: BatchApplier,
    options: SyncServiceOptions = {}
  ) {
    this.pageSize = options.pageSize;
    this.batchSize = options.batchSize ?? 50;
    this.onRunComplete = options.onRunComplete;
  }

  listCampaigns(filter: CampaignFilter = { includeTags: true }): Promise<SmartleadCampaign[]> {
    return this.inventory.fetchCampaigns(filter);
  }

  async preview(campaignId: number, csvText: string, emailColumn?: string): Promise<SyncPreview> {
    const extraction = extractEmailsFromCsv(csvText, emailColumn);
    console.log(`[Sync] Previewing ${extraction.emails.length} emails against campaign ${campaignId}`);

    const inventory = await this.inventory.fetchAllAccounts(this.pageSize);
    const campaignAccounts = await this.inventory.fetchCampaignAccounts(campaignId);

    const reconciliation = reconcile({ emails: extraction.emails, inventory, campaignAccounts });

    return {
      campaignId,
      extraction,
      inventorySize: inventory.length,
      campaignAccountCount: campaignAccounts.length,
      reconciliation,
    };
  }

  startRun(campaignId: number, reconciliation: ReconciliationResult, batchSize: number = this.batchSize): BatchRunState {
    const accountIds = accountIdsToAdd(reconciliation);
    const state = createRunState(campaignId, accountIds, batchSize);
    console.log(
      `[Sync] Run ${state.runId}: ${accountIds.length} accounts in ${state.totalBatches} batches ` +
      `for campaign ${campaignId}`
    );
    return state;
  }

  async applyStep(state: BatchRunState): Promise<BatchRunState> {
    const next = await this.applier.advance(state);
    if (state.status !== 'complete' && next.status === 'complete') {
      this.onRunComplete?.(next);
    }
    return next;
  }

  async applyAll(state: BatchRunState, options: RunOptions = {}): Promise<BatchRunState> {
    const wasComplete = state.status === 'complete';
    const final = await this.applier.run(state, options);
    if (!wasComplete && final.status === 'complete') {
      this.onRunComplete?.(final);
    }
    return final;
  }
}

export interface CreateSyncServiceOptions {
  cache?: InventoryCacheStore;
  store?: RunStateStore;
  fetchImpl?: typeof fetch;
}

/** Wire an adapter, optional cache and applier for one API key. */
export function createSyncService(
  apiKey: string | undefined,
  config: SyncConfig,
  options: CreateSyncServiceOptions = {}
): SyncService {
  const adapter = new SmartleadAdapter(apiKey, {
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    pageSize: config.pageSize,
    retryPolicy: createRetryPolicy(config.maxRetries),
    fetchImpl: options.fetchImpl,
  });

  const cached = options.cache
    ? new CachedInventory(adapter, options.cache, credentialScope(apiKey ?? ''))
    : null;

  const applier = new BatchApplier(adapter, { pauseMs: config.batchPauseMs, store: options.store });

  return new SyncService(cached ?? adapter, applier, {
    pageSize: config.pageSize,
    batchSize: config.batchSize,
    onRunComplete: state => cached?.invalidateCampaign(state.campaignId),
  });
}
