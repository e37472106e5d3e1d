// Batch Applier
// Drives an apply run one batch at a time: not_started → in_progress → complete

import { AddAccountsResult } from '../channels/smartlead-types';
import { makeBatches } from '../core/reconciliation';
import { BatchFailureError, errorMessage } from '../core/errors';
import { Sleep, sleep as realSleep } from '../core/retry-policy';
import { BatchRunState } from './run-state';
import { RunStateStore } from './run-store';

const DEFAULT_PAUSE_MS = 500;

export interface CampaignAccountWriter {
  addAccountsToCampaign(campaignId: number, accountIds: number[]): Promise<AddAccountsResult>;
}

export interface BatchApplierOptions {
  pauseMs?: number;
  sleep?: Sleep;
  store?: RunStateStore;
}

export interface RunOptions {
  onProgress?: (state: BatchRunState) => void;
  // Checked before each batch; returning true leaves the run resumable where it stopped
  shouldStop?: () => boolean;
}

export class BatchApplier {
  private writer: CampaignAccountWriter;
  private pauseMs: number;
  private sleep: Sleep;
  private store?: RunStateStore;

  constructor(writer: CampaignAccountWriter, options: BatchApplierOptions = {}) {
    this.writer = writer;
    this.pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
    this.sleep = options.sleep ?? realSleep;
    this.store = options.store;
  }

  /**
   * Submit the next unvisited batch and return the updated state.
   *
   * The batch to submit is always `completedBatches`, so a state saved
   * after any step resumes without repeating work. The input state is
   * left untouched.
   */
  async advance(state: BatchRunState): Promise<BatchRunState> {
    if (state.status === 'complete') return state;

    const now = new Date().toISOString();
    let next: BatchRunState = state.status === 'not_started'
      ? {
          ...state,
          status: 'in_progress',
          completedBatches: 0,
          currentBatch: 0,
          accountsAdded: 0,
          errors: [],
          startedAt: now,
          updatedAt: now,
        }
      : { ...state, errors: [...state.errors], updatedAt: now };

    const batches = makeBatches(next.accountIds, next.batchSize);

    if (next.completedBatches < batches.length) {
      const batch = batches[next.completedBatches];
      const batchNumber = next.completedBatches + 1;
      next.currentBatch = batchNumber;

      console.log(`[Applier] Run ${next.runId}: batch ${batchNumber}/${batches.length} (${batch.length} accounts)`);

      try {
        const result = await this.writer.addAccountsToCampaign(next.campaignId, batch);
        if (result.success) {
          next.accountsAdded += batch.length;
          console.log(`[Applier] ✓ Batch ${batchNumber} successful: ${batch.length} accounts added`);
        } else {
          const failure = new BatchFailureError(batchNumber, result.message ?? 'rejected by remote');
          next.errors.push(failure.message);
          console.error(`[Applier] ✗ ${failure.message}`);
        }
      } catch (err) {
        const message = `Batch ${batchNumber} error: ${errorMessage(err)}`;
        next.errors.push(message);
        console.error(`[Applier] ✗ ${message}`);
      }

      next.completedBatches = batchNumber;
    }

    if (next.completedBatches >= batches.length) {
      next = {
        ...next,
        status: 'complete',
        completedBatches: batches.length,
        completedAt: next.updatedAt,
      };
      console.log(
        `[Applier] Run ${next.runId} complete: ${next.accountsAdded} accounts added, ${next.errors.length} errors`
      );
    }

    if (this.store) {
      await this.store.save(next);
    }
    return next;
  }

  /** Advance until complete (or told to stop), pausing between submissions. */
  async run(state: BatchRunState, options: RunOptions = {}): Promise<BatchRunState> {
    let current = state;

    while (current.status !== 'complete') {
      if (options.shouldStop?.()) {
        console.log(`[Applier] Run ${current.runId} stopped after ${current.completedBatches}/${current.totalBatches} batches`);
        break;
      }

      current = await this.advance(current);
      options.onProgress?.(current);

      if (current.status !== 'complete') {
        await this.sleep(this.pauseMs);
      }
    }

    return current;
  }
}
