// Email Normalizer
// Canonical matching key for sender addresses

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

/**
 * Trim + lowercase, then require the whole string to look like an address.
 * Anything else (including non-strings) is `null`, never a partial value.
 */
export function normalizeEmail(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;

  const normalized = raw.trim().toLowerCase();
  return isValidEmail(normalized) ? normalized : null;
}

/**
 * Normalize every entry, drop the invalid ones, and dedupe keeping the
 * first-seen order.
 */
export function extractUniqueEmails(raw: readonly unknown[]): string[] {
  const seen = new Set<string>();

  for (const value of raw) {
    const email = normalizeEmail(value);
    if (email) seen.add(email);
  }

  return [...seen];
}
