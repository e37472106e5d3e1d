// Batch Run State
// Serializable progress record for one apply run

import { randomUUID } from 'crypto';
import { isRecord } from '../channels/base-adapter';

export type RunStatus = 'not_started' | 'in_progress' | 'complete';

export interface BatchRunState {
  runId: string;
  campaignId: number;
  accountIds: number[];
  batchSize: number;
  totalBatches: number;
  status: RunStatus;
  completedBatches: number;
  currentBatch: number;      // 1-based number of the last submitted batch, 0 before the first
  accountsAdded: number;
  errors: string[];          // append-only
  startedAt: string | null;
  updatedAt: string;
  completedAt: string | null;
}

const RUN_STATUSES: readonly RunStatus[] = ['not_started', 'in_progress', 'complete'];

export function createRunState(campaignId: number, accountIds: number[], batchSize: number): BatchRunState {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  return {
    runId: randomUUID(),
    campaignId,
    accountIds: [...accountIds],
    batchSize,
    totalBatches: Math.ceil(accountIds.length / batchSize),
    status: 'not_started',
    completedBatches: 0,
    currentBatch: 0,
    accountsAdded: 0,
    errors: [],
    startedAt: null,
    updatedAt: new Date().toISOString(),
    completedAt: null,
  };
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isPositiveInt(value: unknown): value is number {
  return isNonNegativeInt(value) && value > 0;
}

function isRunStatus(value: unknown): value is RunStatus {
  return RUN_STATUSES.some(s => s === value);
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Read a run state back from JSON (store row or request body).
 * Returns null when the shape does not hold together.
 */
export function parseRunState(value: unknown): BatchRunState | null {
  if (!isRecord(value)) return null;

  const {
    runId, campaignId, accountIds, batchSize, status,
    completedBatches, currentBatch, accountsAdded, errors,
  } = value;

  if (typeof runId !== 'string' || !runId) return null;
  if (!isPositiveInt(campaignId)) return null;
  if (!Array.isArray(accountIds) || !accountIds.every(isPositiveInt)) return null;
  if (!isPositiveInt(batchSize)) return null;
  if (!isRunStatus(status)) return null;
  if (!isNonNegativeInt(completedBatches) || !isNonNegativeInt(currentBatch) || !isNonNegativeInt(accountsAdded)) return null;
  if (!Array.isArray(errors) || !errors.every(e => typeof e === 'string')) return null;

  const totalBatches = Math.ceil(accountIds.length / batchSize);
  if (completedBatches > totalBatches) return null;
  // A complete run has submitted every batch
  if (status === 'complete' && completedBatches < totalBatches) return null;

  return {
    runId,
    campaignId,
    accountIds,
    batchSize,
    totalBatches,
    status,
    completedBatches,
    currentBatch,
    accountsAdded,
    errors,
    startedAt: nullableString(value.startedAt),
    updatedAt: nullableString(value.updatedAt) ?? new Date().toISOString(),
    completedAt: nullableString(value.completedAt),
  };
}

export function progressFraction(state: BatchRunState): number {
  if (state.totalBatches === 0) return state.status === 'complete' ? 1 : 0;
  return state.completedBatches / state.totalBatches;
}
