/**
 * CRIF Report Parser
 *
 * Deterministic parser turning converted tables and text sections into a typed
 * CrifReport. Each table extractor inspects a single table and returns null when
 * the table does not have the expected shape, so the same functions serve both
 * chunk-scoped extraction and whole-document scans.
 */

import type { ParsedDocument, ParsedTable, TextSection } from '../types';
import type { Account, AccountSummary, CrifReport } from './models';
import {
  ACCOUNT_BLOCK_MARKER,
  ACCOUNT_FIELD_LABELS,
  ACCOUNT_SECTION_PREFIX,
  SCORE_COLUMNS,
  SUMMARY_COLUMNS,
  INQUIRY_COLUMNS,
  cleanNumber,
  extractField,
  extractNumericField,
  extractPaymentHistory,
  getCell,
  hasEnquiryCountColumn,
  isAccountSummaryTable,
  isInquiryListTable,
  isScoreTable,
} from './patterns';

export const MIN_BUREAU_SCORE = 300;
export const MAX_BUREAU_SCORE = 900;

/**
 * Read summary totals from an account-summary table (first row).
 */
export function extractAccountSummaryFromTable(table: ParsedTable): AccountSummary | null {
  if (table.rows.length === 0 || !isAccountSummaryTable(table)) {
    return null;
  }

  const row = table.rows[0];
  return {
    totalAccounts: Math.trunc(cleanNumber(getCell(table, row, SUMMARY_COLUMNS.totalAccounts))),
    activeAccounts: Math.trunc(cleanNumber(getCell(table, row, SUMMARY_COLUMNS.activeAccounts))),
    totalCurrentBalance: cleanNumber(getCell(table, row, SUMMARY_COLUMNS.totalCurrentBalance)),
    totalOverdueAmount: cleanNumber(getCell(table, row, SUMMARY_COLUMNS.totalOverdueAmount)),
    totalWriteoffAmount: cleanNumber(getCell(table, row, SUMMARY_COLUMNS.totalWriteoffAmount)),
  };
}

/**
 * Read the bureau score from a verification table. Scores outside [300, 900] are
 * treated as absent, not as an error.
 */
export function extractBureauScoreFromTable(table: ParsedTable): number | null {
  if (table.rows.length === 0 || !isScoreTable(table)) {
    return null;
  }

  for (const row of table.rows) {
    const service = getCell(table, row, SCORE_COLUMNS.requestedService).toUpperCase();
    if (!service.includes('SCORE')) continue;

    const rawScore = getCell(table, row, SCORE_COLUMNS.score);
    if (!rawScore.trim()) continue;

    const score = Math.trunc(cleanNumber(rawScore));
    if (score >= MIN_BUREAU_SCORE && score <= MAX_BUREAU_SCORE) {
      return score;
    }
  }

  return null;
}

/**
 * Count credit inquiries from an enquiry list (one row per enquiry) or an
 * explicit "Number of Enquiries" field.
 */
export function extractCreditInquiriesFromTable(table: ParsedTable): number | null {
  if (table.rows.length === 0) {
    return null;
  }

  if (isInquiryListTable(table)) {
    return table.rows.length;
  }

  if (hasEnquiryCountColumn(table)) {
    for (const row of table.rows) {
      const raw = getCell(table, row, INQUIRY_COLUMNS.enquiryCount);
      if (raw.trim()) {
        return Math.trunc(cleanNumber(raw));
      }
    }
  }

  return null;
}

/**
 * Return the first non-null result of an extractor applied across tables.
 */
function firstFromTables<T>(tables: readonly ParsedTable[], extract: (table: ParsedTable) => T | null): T | null {
  for (const table of tables) {
    const result = extract(table);
    if (result !== null) {
      return result;
    }
  }
  return null;
}

/**
 * Parse one account block. Blocks without an account type are discarded.
 */
export function parseAccountFromText(text: string): Account | null {
  const lines = text.split('\n');

  const accountType = extractField(lines, ACCOUNT_FIELD_LABELS.accountType);
  if (!accountType) {
    return null;
  }

  return {
    accountType,
    ownership: extractField(lines, ACCOUNT_FIELD_LABELS.ownership),
    isActive: text.toLowerCase().includes('active'),
    isSecured: accountType.toLowerCase().includes('secured'),
    currentBalance: extractNumericField(lines, ACCOUNT_FIELD_LABELS.currentBalance),
    overdueAmount: extractNumericField(lines, ACCOUNT_FIELD_LABELS.overdueAmount),
    sanctionedAmount: extractNumericField(lines, ACCOUNT_FIELD_LABELS.sanctionedAmount),
    paymentHistory: extractPaymentHistory(text),
    remarks: extractField(lines, ACCOUNT_FIELD_LABELS.remarks),
  };
}

/**
 * Parse every "Account Information" section into an account.
 */
export function parseAccountsFromSections(sections: readonly TextSection[]): Account[] {
  const accounts: Account[] = [];

  for (const section of sections) {
    if (!section.header.startsWith(ACCOUNT_SECTION_PREFIX)) continue;

    const account = parseAccountFromText(section.text);
    if (account) {
      accounts.push(account);
    }
  }

  return accounts;
}

/**
 * Parse only the account blocks inside a piece of text, split at "Account Number:".
 * Used for chunk-scoped flag extraction.
 */
export function parseAccountsFromText(text: string): Account[] {
  const blocks = text.split(ACCOUNT_BLOCK_MARKER).slice(1);
  const accounts: Account[] = [];

  for (const block of blocks) {
    const account = parseAccountFromText(ACCOUNT_BLOCK_MARKER + block);
    if (account) {
      accounts.push(account);
    }
  }

  return accounts;
}

/**
 * Parse a converted CRIF document into a typed report
 */
export function parseCrifReport(doc: Pick<ParsedDocument, 'tables' | 'chunks'>): CrifReport {
  return {
    accounts: parseAccountsFromSections(doc.chunks),
    bureauScore: firstFromTables(doc.tables, extractBureauScoreFromTable),
    summary: firstFromTables(doc.tables, extractAccountSummaryFromTable),
    creditInquiriesCount: firstFromTables(doc.tables, extractCreditInquiriesFromTable),
  };
}
