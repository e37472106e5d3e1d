// Reconciliation Engine
// Matches uploaded emails to inventory accounts and diffs against a campaign

import { normalizeEmail } from './email-normalizer';

export type EmailLookup = Record<string, number>;

// Checked in this order for every account
export const ACCOUNT_EMAIL_FIELDS = ['username', 'from_email', 'email'] as const;

export interface AccountLike {
  id?: unknown;
  username?: unknown;
  from_email?: unknown;
  email?: unknown;
}

export interface DuplicateEmail {
  email: string;
  accountIds: number[];
}

export interface ReconciliationResult {
  toAdd: EmailLookup;
  alreadyExists: EmailLookup;
  notFound: string[];
  conflicts: DuplicateEmail[];
  totalRequested: number;
  totalToAdd: number;
  totalAlreadyExists: number;
}

function accountId(account: AccountLike): number | null {
  const { id } = account;
  return typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : null;
}

export function accountEmails(account: AccountLike): string[] {
  const emails = new Set<string>();
  for (const field of ACCOUNT_EMAIL_FIELDS) {
    const email = normalizeEmail(account[field]);
    if (email) emails.add(email);
  }
  return [...emails];
}

/**
 * Map every valid email an account exposes to that account's id.
 * An email shared by two accounts resolves to the later one.
 */
export function buildLookup(accounts: readonly AccountLike[]): EmailLookup {
  const lookup: EmailLookup = {};

  for (const account of accounts) {
    const id = accountId(account);
    if (id === null) {
      console.warn(`[Reconcile] Skipping account without ID: ${JSON.stringify(account)}`);
      continue;
    }

    for (const email of accountEmails(account)) {
      const previous = lookup[email];
      if (previous !== undefined && previous !== id) {
        console.warn(`[Reconcile] ${email} is exposed by accounts ${previous} and ${id}; using ${id}`);
      }
      lookup[email] = id;
    }
  }

  return lookup;
}

export function findDuplicateEmails(accounts: readonly AccountLike[]): DuplicateEmail[] {
  const owners = new Map<string, number[]>();

  for (const account of accounts) {
    const id = accountId(account);
    if (id === null) continue;

    for (const email of accountEmails(account)) {
      const ids = owners.get(email) ?? [];
      if (!ids.includes(id)) ids.push(id);
      owners.set(email, ids);
    }
  }

  return [...owners.entries()]
    .filter(([, ids]) => ids.length > 1)
    .map(([email, accountIds]) => ({ email, accountIds }));
}

export function mapEmailsToIds(emails: readonly string[], accounts: readonly AccountLike[]): EmailLookup {
  const lookup = buildLookup(accounts);
  const mapped: EmailLookup = {};

  for (const raw of emails) {
    const email = normalizeEmail(raw);
    if (!email) {
      console.warn(`[Reconcile] Invalid email skipped: ${raw}`);
      continue;
    }

    const id = lookup[email];
    if (id !== undefined) {
      mapped[email] = id;
    } else {
      console.warn(`[Reconcile] Email account not found: ${email}`);
    }
  }

  console.log(`[Reconcile] Mapped ${Object.keys(mapped).length} out of ${emails.length} requested emails`);
  return mapped;
}

export function findNotFound(emails: readonly string[], mapped: EmailLookup): string[] {
  const notFound: string[] = [];
  for (const raw of emails) {
    const email = normalizeEmail(raw) ?? raw;
    if (mapped[email] === undefined && !notFound.includes(email)) {
      notFound.push(email);
    }
  }
  return notFound;
}

export function diffLookups(existing: EmailLookup, incoming: EmailLookup): ReconciliationResult {
  const toAdd: EmailLookup = {};
  const alreadyExists: EmailLookup = {};

  for (const [email, id] of Object.entries(incoming)) {
    if (existing[email] === id) {
      alreadyExists[email] = id;
    } else {
      // Absent, or held by a different account: assign the new one
      toAdd[email] = id;
    }
  }

  return {
    toAdd,
    alreadyExists,
    notFound: [],
    conflicts: [],
    totalRequested: Object.keys(incoming).length,
    totalToAdd: Object.keys(toAdd).length,
    totalAlreadyExists: Object.keys(alreadyExists).length,
  };
}

export function makeBatches<T>(ids: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < ids.length; i += batchSize) {
    batches.push(ids.slice(i, i + batchSize));
  }
  return batches;
}

/** Account ids to submit, deduped, in the order the emails were mapped. */
export function accountIdsToAdd(result: ReconciliationResult): number[] {
  return [...new Set(Object.values(result.toAdd))];
}

export interface ReconcileInput {
  emails: readonly string[];
  inventory: readonly AccountLike[];
  campaignAccounts: readonly AccountLike[];
}

export function reconcile({ emails, inventory, campaignAccounts }: ReconcileInput): ReconciliationResult {
  const mapped = mapEmailsToIds(emails, inventory);
  const existing = buildLookup(campaignAccounts);
  const result = diffLookups(existing, mapped);

  const conflicts = findDuplicateEmails(inventory).filter(d => mapped[d.email] !== undefined);

  const notFound = findNotFound(emails, mapped);

  console.log(
    `[Reconcile] ${result.totalRequested} matched: ${result.totalToAdd} to add, ` +
    `${result.totalAlreadyExists} already in campaign, ${notFound.length} not found`
  );
  if (conflicts.length > 0) {
    console.warn(`[Reconcile] ${conflicts.length} emails are shared by more than one account`);
  }

  return { ...result, notFound, conflicts };
}
