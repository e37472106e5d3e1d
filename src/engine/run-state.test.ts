import { describe, it, expect } from 'vitest';
import { createRunState, parseRunState, progressFraction } from './run-state';

describe('createRunState', () => {
  it('starts not_started with the batch count worked out', () => {
    const state = createRunState(42, [1, 2, 3, 4, 5], 2);

    expect(state.status).toBe('not_started');
    expect(state.totalBatches).toBe(3);
    expect(state.completedBatches).toBe(0);
    expect(state.errors).toEqual([]);
    expect(state.startedAt).toBeNull();
    expect(state.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('copies the id list', () => {
    const ids = [1, 2];
    const state = createRunState(42, ids, 1);
    ids.push(3);
    expect(state.accountIds).toEqual([1, 2]);
  });

  it('rejects a bad batch size', () => {
    expect(() => createRunState(42, [1], 0)).toThrow(RangeError);
  });
});

describe('parseRunState', () => {
  it('reads back a serialized state', () => {
    const state = createRunState(42, [1, 2, 3], 2);
    expect(parseRunState(JSON.parse(JSON.stringify(state)))).toEqual(state);
  });

  it('recomputes totalBatches from the ids', () => {
    const parsed = parseRunState({ ...createRunState(42, [1, 2, 3], 2), totalBatches: 99 });
    expect(parsed?.totalBatches).toBe(2);
  });

  it('rejects shapes that do not hold together', () => {
    const state = createRunState(42, [1, 2, 3], 2);

    expect(parseRunState(null)).toBeNull();
    expect(parseRunState({ ...state, status: 'paused' })).toBeNull();
    expect(parseRunState({ ...state, batchSize: 0 })).toBeNull();
    expect(parseRunState({ ...state, accountIds: ['1'] })).toBeNull();
    expect(parseRunState({ ...state, completedBatches: 3 })).toBeNull();
    expect(parseRunState({ ...state, errors: [1] })).toBeNull();
  });

  it('rejects zero or negative account ids', () => {
    const state = createRunState(42, [1, 2, 3], 2);
    expect(parseRunState({ ...state, accountIds: [1, 0, 3] })).toBeNull();
    expect(parseRunState({ ...state, accountIds: [1, -2] })).toBeNull();
  });

  it('rejects a complete run with batches still unsent', () => {
    const state = createRunState(42, [1, 2, 3, 4, 5], 2);

    expect(parseRunState({ ...state, status: 'complete', completedBatches: 1 })).toBeNull();
    expect(parseRunState({ ...state, status: 'complete', completedBatches: 3 })?.status).toBe('complete');
  });
});

describe('progressFraction', () => {
  it('reports completed over total batches', () => {
    const state = { ...createRunState(42, [1, 2, 3, 4], 1), completedBatches: 1 };
    expect(progressFraction(state)).toBe(0.25);
  });

  it('is 1 for a finished empty run', () => {
    const state = { ...createRunState(42, [], 5), status: 'complete' as const };
    expect(progressFraction(state)).toBe(1);
  });
});
