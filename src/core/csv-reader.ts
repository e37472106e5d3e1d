// CSV Reader
// Pulls the email column out of an uploaded CSV

import { parse } from 'csv-parse/sync';
import { normalizeEmail } from './email-normalizer';
import { CsvParseError, MissingColumnError, errorMessage } from './errors';

const FALLBACK_EMAIL_COLUMNS = ['Email', 'EMAIL', 'email_address', 'emailaddress'];

export interface CsvEmailExtraction {
  column: string;
  totalRows: number;
  emails: string[];         // normalized, unique, first-seen order
  invalidValues: string[];  // non-empty cells that failed normalization
}

export function emailColumnCandidates(emailColumn: string = 'email'): string[] {
  return [emailColumn, ...FALLBACK_EMAIL_COLUMNS.filter(c => c !== emailColumn)];
}

export function findEmailColumn(headers: readonly string[], emailColumn: string = 'email'): string {
  const candidates = emailColumnCandidates(emailColumn);
  const column = candidates.find(c => headers.includes(c));
  if (!column) {
    throw new MissingColumnError(candidates);
  }
  return column;
}

export function extractEmailsFromCsv(content: string, emailColumn: string = 'email'): CsvEmailExtraction {
  let headers: string[] = [];
  let records: Record<string, string>[];

  try {
    records = parse(content, {
      bom: true,
      columns: (header: string[]) => {
        headers = header.map(h => h.trim());
        return headers;
      },
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    console.error('[CSV] Parse error:', errorMessage(err));
    throw new CsvParseError(errorMessage(err), { cause: err });
  }

  const column = findEmailColumn(headers, emailColumn);

  const seen = new Set<string>();
  const invalidValues: string[] = [];

  for (const row of records) {
    const value = row[column];
    if (value === undefined || value === '') continue;

    const email = normalizeEmail(value);
    if (email) {
      seen.add(email);
    } else {
      console.warn(`[CSV] Invalid email format: ${value}`);
      invalidValues.push(value);
    }
  }

  console.log(`[CSV] ${records.length} rows, ${seen.size} unique valid emails in column "${column}"`);

  return {
    column,
    totalRows: records.length,
    emails: [...seen],
    invalidValues,
  };
}
