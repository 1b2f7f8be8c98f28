/**
 * CRIF Report Extraction Patterns
 *
 * Line-level scanners for account blocks and table-shape signatures for the
 * summary, score, and inquiry tables of a CRIF bureau report.
 *
 * Account blocks are printed as "Label: value" lines:
 * "Account Type: Personal Loan"
 * "Current Balance: 1,25,000"
 * "Account Remarks: Suit Filed"
 * followed by a payment grid such as "Jan: 000 Feb: 030 Mar: STD".
 */

import type { ParsedTable, TableRow } from '../types';
import type { PaymentHistoryEntry } from './models';

export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

/** Header prefix of text sections that hold one account block each */
export const ACCOUNT_SECTION_PREFIX = 'Account Information';

/** Separator between account blocks inside a single text section */
export const ACCOUNT_BLOCK_MARKER = 'Account Number:';

export const ACCOUNT_FIELD_LABELS = {
  accountType: 'Account Type',
  ownership: 'Ownership',
  currentBalance: 'Current Balance',
  overdueAmount: 'Overdue Amt',
  sanctionedAmount: 'Disbd Amt',
  remarks: 'Account Remarks',
} as const;

export const SUMMARY_COLUMNS = {
  totalAccounts: 'Number of Accounts',
  activeAccounts: 'Active Accounts',
  totalCurrentBalance: 'Total Current Balance',
  totalOverdueAmount: 'Total Amount Overdue',
  totalWriteoffAmount: 'Total Writeoff Amt',
} as const;

export const SCORE_COLUMNS = {
  requestedService: 'Requested Service',
  score: 'Score',
} as const;

export const INQUIRY_COLUMNS = {
  enquiryPurpose: 'Enquiry Purpose',
  enquiryCount: 'Number of Enquiries',
} as const;

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a plain decimal literal. Hex, "Infinity" and empty strings are rejected.
 */
export function parseDecimal(text: string): number | null {
  if (!NUMERIC_PATTERN.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Convert a printed amount to a number, stripping thousands separators and
 * currency symbols. Unparsable input yields 0.
 *
 * Examples: "1,25,000" → 125000, "₹ 4,500.50" → 4500.5, "Rs 300" → 300, "N/A" → 0
 */
export function cleanNumber(value: string | number | null | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (value === null || value === undefined) {
    return 0;
  }

  const cleaned = value.replace(/,/g, '').replace(/₹/g, '').replace(/Rs/g, '').trim();
  return parseDecimal(cleaned) ?? 0;
}

/**
 * Find the value of the first "Label: value" line containing the label.
 * Lines that mention the label without a colon are skipped.
 */
export function extractField(lines: readonly string[], label: string): string {
  for (const line of lines) {
    if (!line.includes(label)) continue;
    const colonIndex = line.indexOf(':');
    if (colonIndex !== -1) {
      return line.slice(colonIndex + 1).trim();
    }
  }
  return '';
}

export function extractNumericField(lines: readonly string[], label: string): number {
  const raw = extractField(lines, label);
  return raw ? cleanNumber(raw) : 0;
}

/**
 * Scan an account block for each month abbreviation followed by a status token.
 * Each month is matched independently (first occurrence wins), so the grid layout
 * does not matter. Month names must stand alone: "Remarks" does not match "Mar".
 */
export function extractPaymentHistory(text: string): PaymentHistoryEntry[] {
  const history: PaymentHistoryEntry[] = [];

  for (const month of MONTH_ABBREVIATIONS) {
    const pattern = new RegExp(`\\b${month}\\b\\s*[:\\-]?\\s*([A-Z0-9\\-/]+)`, 'i');
    const match = text.match(pattern);
    if (match) {
      history.push({ month, status: match[1].trim() });
    }
  }

  return history;
}

// ============================================================================
// Table signatures
// ============================================================================

export function lowerColumns(table: ParsedTable): string[] {
  return table.columns.map((c) => c.toLowerCase().trim());
}

/**
 * Read a cell by column name, matching the header case-insensitively.
 */
export function getCell(table: ParsedTable, row: TableRow, columnName: string): string {
  const wanted = columnName.toLowerCase();
  const column = table.columns.find((c) => c.toLowerCase().trim() === wanted);
  if (column === undefined) return '';
  return row[column] ?? '';
}

export function isAccountSummaryTable(table: ParsedTable): boolean {
  const columns = lowerColumns(table);
  return (
    columns.includes(SUMMARY_COLUMNS.totalAccounts.toLowerCase()) ||
    columns.includes(SUMMARY_COLUMNS.activeAccounts.toLowerCase())
  );
}

export function isScoreTable(table: ParsedTable): boolean {
  const columns = lowerColumns(table);
  return (
    columns.includes(SCORE_COLUMNS.requestedService.toLowerCase()) &&
    columns.includes(SCORE_COLUMNS.score.toLowerCase())
  );
}

/** Table listing one row per enquiry */
export function isInquiryListTable(table: ParsedTable): boolean {
  const columns = lowerColumns(table);
  return (
    columns.includes(INQUIRY_COLUMNS.enquiryPurpose.toLowerCase()) ||
    columns.join(' ').includes('inquiry')
  );
}

/** Table with an explicit enquiry count field */
export function hasEnquiryCountColumn(table: ParsedTable): boolean {
  return lowerColumns(table).includes(INQUIRY_COLUMNS.enquiryCount.toLowerCase());
}
