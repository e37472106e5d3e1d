import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  accountIdsToAdd,
  buildLookup,
  diffLookups,
  findDuplicateEmails,
  findNotFound,
  makeBatches,
  mapEmailsToIds,
  reconcile,
} from './reconciliation';

describe('buildLookup', () => {
  it('maps every valid email field of an account to its id', () => {
    const lookup = buildLookup([
      { id: 1, username: 'User@Example.com', from_email: 'user@example.com' },
      { id: 2, from_email: 'Sender@Example.com', email: 'sender+alias@example.com' },
      { id: 3, username: 'invalid-email' },
    ]);

    expect(lookup).toEqual({
      'user@example.com': 1,
      'sender@example.com': 2,
      'sender+alias@example.com': 2,
    });
  });

  it('skips accounts without a usable id', () => {
    const lookup = buildLookup([
      { username: 'no-id@example.com' },
      { id: 0, username: 'zero@example.com' },
      { id: null, username: 'null@example.com' },
      { id: '7', username: 'string-id@example.com' },
      { id: 8, username: 'kept@example.com' },
    ]);

    expect(lookup).toEqual({ 'kept@example.com': 8 });
  });

  it('lets the later account win when two share an email', () => {
    const lookup = buildLookup([
      { id: 1, username: 'shared@example.com' },
      { id: 2, email: 'Shared@Example.com' },
    ]);

    expect(lookup).toEqual({ 'shared@example.com': 2 });
  });

  it('never emits an id that is not in the input', () => {
    const account = fc.record(
      {
        id: fc.oneof(fc.integer({ min: -5, max: 50 }), fc.constant(undefined), fc.constant(null)),
        username: fc.oneof(fc.emailAddress(), fc.string()),
        from_email: fc.oneof(fc.emailAddress(), fc.constant(undefined)),
        email: fc.oneof(fc.emailAddress(), fc.integer()),
      },
      { requiredKeys: [] }
    );

    fc.assert(
      fc.property(fc.array(account, { maxLength: 20 }), accounts => {
        const validIds = new Set(
          accounts
            .map(a => a.id)
            .filter((id): id is number => typeof id === 'number' && Number.isInteger(id) && id > 0)
        );
        for (const id of Object.values(buildLookup(accounts))) {
          expect(validIds.has(id)).toBe(true);
        }
      })
    );
  });
});

describe('findDuplicateEmails', () => {
  it('reports emails exposed by more than one account', () => {
    const duplicates = findDuplicateEmails([
      { id: 1, username: 'shared@example.com', email: 'solo@example.com' },
      { id: 2, from_email: 'SHARED@example.com' },
      { id: 2, email: 'shared@example.com' },
    ]);

    expect(duplicates).toEqual([{ email: 'shared@example.com', accountIds: [1, 2] }]);
  });
});

describe('mapEmailsToIds', () => {
  const inventory = [
    { id: 10, username: 'alpha@example.com' },
    { id: 20, from_email: 'beta@example.com' },
  ];

  it('returns only matched emails, normalized', () => {
    const mapped = mapEmailsToIds(['Alpha@Example.com', 'gamma@example.com', 'beta@example.com'], inventory);
    expect(mapped).toEqual({ 'alpha@example.com': 10, 'beta@example.com': 20 });
  });

  it('derives not-found emails as the complement', () => {
    const emails = ['alpha@example.com', 'gamma@example.com', 'delta@example.com'];
    const mapped = mapEmailsToIds(emails, inventory);
    expect(findNotFound(emails, mapped)).toEqual(['gamma@example.com', 'delta@example.com']);
  });
});

describe('diffLookups', () => {
  it('splits new mappings into to-add and already-present', () => {
    const existing = buildLookup([
      { id: 11, username: 'Existing@domain.com' },
      { id: 12, from_email: 'already@domain.com' },
    ]);

    const result = diffLookups(existing, {
      'existing@domain.com': 11,
      'already@domain.com': 12,
      'new@domain.com': 15,
    });

    expect(result.alreadyExists).toEqual({ 'existing@domain.com': 11, 'already@domain.com': 12 });
    expect(result.toAdd).toEqual({ 'new@domain.com': 15 });
    expect(result.totalRequested).toBe(3);
    expect(result.totalToAdd).toBe(1);
    expect(result.totalAlreadyExists).toBe(2);
    expect(result.notFound).toEqual([]);
  });

  it('treats an email attached under a different id as to-add', () => {
    const result = diffLookups({ 'moved@domain.com': 1 }, { 'moved@domain.com': 2 });
    expect(result.toAdd).toEqual({ 'moved@domain.com': 2 });
    expect(result.alreadyExists).toEqual({});
  });

  it('always accounts for every requested mapping', () => {
    const lookup = fc.dictionary(fc.emailAddress(), fc.integer({ min: 1, max: 5 }));
    fc.assert(
      fc.property(lookup, lookup, (existing, incoming) => {
        const result = diffLookups(existing, incoming);
        expect(result.totalRequested).toBe(Object.keys(incoming).length);
        expect(result.totalToAdd + result.totalAlreadyExists).toBe(result.totalRequested);
      })
    );
  });
});

describe('makeBatches', () => {
  it('chunks in order with a short last batch', () => {
    expect(makeBatches([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
  });

  it('returns no batches for no ids', () => {
    expect(makeBatches([], 50)).toEqual([]);
  });

  it('rejects non-positive or fractional sizes', () => {
    expect(() => makeBatches([1], 0)).toThrow(RangeError);
    expect(() => makeBatches([1], -2)).toThrow(RangeError);
    expect(() => makeBatches([1], 1.5)).toThrow(RangeError);
  });

  it('reconstructs the input and keeps every batch but the last full', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), fc.integer({ min: 1, max: 20 }), (ids, size) => {
        const batches = makeBatches(ids, size);
        expect(batches.flat()).toEqual(ids);
        batches.slice(0, -1).forEach(batch => expect(batch.length).toBe(size));
        if (batches.length > 0) {
          const last = batches[batches.length - 1];
          expect(last.length).toBeGreaterThan(0);
          expect(last.length).toBeLessThanOrEqual(size);
        }
      })
    );
  });
});

describe('reconcile', () => {
  it('combines mapping, diff, not-found and shared-email conflicts', () => {
    const result = reconcile({
      emails: ['one@example.com', 'two@example.com', 'three@example.com', 'missing@example.com'],
      inventory: [
        { id: 1, username: 'one@example.com' },
        { id: 2, username: 'two@example.com' },
        { id: 3, username: 'three@example.com' },
        { id: 4, from_email: 'three@example.com' },
      ],
      campaignAccounts: [{ id: 2, username: 'two@example.com' }],
    });

    expect(result.toAdd).toEqual({ 'one@example.com': 1, 'three@example.com': 4 });
    expect(result.alreadyExists).toEqual({ 'two@example.com': 2 });
    expect(result.notFound).toEqual(['missing@example.com']);
    expect(result.conflicts).toEqual([{ email: 'three@example.com', accountIds: [3, 4] }]);
    expect(result.totalRequested).toBe(3);
    expect(accountIdsToAdd(result)).toEqual([1, 4]);
  });

  it('dedupes account ids reached through several emails', () => {
    const result = reconcile({
      emails: ['a@example.com', 'b@example.com'],
      inventory: [{ id: 9, username: 'a@example.com', email: 'b@example.com' }],
      campaignAccounts: [],
    });

    expect(result.totalToAdd).toBe(2);
    expect(accountIdsToAdd(result)).toEqual([9]);
  });
});
