/**
 * CRIF Report Model
 *
 * Typed view of a credit-bureau report plus the derived queries that the
 * parameter rules evaluate (worst DPD, remark flags, live loan checks).
 */

export interface PaymentHistoryEntry {
  /** Three-letter month abbreviation, e.g. "Jan" */
  month: string;
  /** Raw status token as printed, e.g. "000", "STD", "090/SUB", "-" */
  status: string;
}

export interface Account {
  accountType: string;
  ownership: string;
  isActive: boolean;
  isSecured: boolean;
  currentBalance: number;
  overdueAmount: number;
  sanctionedAmount: number;
  paymentHistory: PaymentHistoryEntry[];
  remarks: string;
}

export interface AccountSummary {
  totalAccounts: number;
  activeAccounts: number;
  totalCurrentBalance: number;
  totalOverdueAmount: number;
  totalWriteoffAmount: number;
}

export interface CrifReport {
  accounts: Account[];
  /** Bureau score within [300, 900], null when no valid score table was found */
  bureauScore: number | null;
  /** Null when no account-summary table was found */
  summary: AccountSummary | null;
  /** Null when neither an inquiry table nor an enquiry count was found */
  creditInquiriesCount: number | null;
}

/**
 * Fixed status-token → days-past-due mapping.
 * Combined tokens such as "090/SUB" are listed explicitly.
 */
const DPD_BY_STATUS: Readonly<Record<string, number>> = {
  '000': 0,
  std: 0,
  '000/std': 0,
  '030': 30,
  '060': 60,
  '090': 90,
  sub: 90,
  '090/sub': 90,
  '120': 120,
  dbt: 120,
  '120/dbt': 120,
  '150': 180,
  lss: 180,
  '150/lss': 180,
  '180': 180,
  '-': 0,
};

const LEADING_DIGITS = /^(\d+)/;

/**
 * Days past due for a payment status token. Total over all strings and never negative:
 * unknown tokens fall back to their leading numeric prefix, else 0.
 */
export function dpdForStatus(status: string): number {
  const normalized = status.trim().toLowerCase();

  const mapped = DPD_BY_STATUS[normalized];
  if (mapped !== undefined) {
    return mapped;
  }

  const match = normalized.match(LEADING_DIGITS);
  if (match) {
    const days = parseInt(match[1], 10);
    return Number.isFinite(days) ? days : 0;
  }

  return 0;
}

export function getWorstDpd(account: Pick<Account, 'paymentHistory'>): number {
  let worst = 0;
  for (const entry of account.paymentHistory) {
    worst = Math.max(worst, dpdForStatus(entry.status));
  }
  return worst;
}

export function hasSuitFiled(account: Pick<Account, 'remarks'>): boolean {
  return account.remarks.toLowerCase().includes('suit filed');
}

export function hasWilfulDefault(account: Pick<Account, 'remarks'>): boolean {
  return account.remarks.toLowerCase().includes('wilful default');
}

export function hasSettlementOrWriteoff(account: Pick<Account, 'remarks'>): boolean {
  const remarks = account.remarks.toLowerCase();
  return remarks.includes('settlement') || remarks.includes('write');
}

export function countDpdAccounts(report: Pick<CrifReport, 'accounts'>, threshold: number): number {
  return report.accounts.filter((account) => getWorstDpd(account) >= threshold).length;
}

export function countActiveLoansByType(
  report: Pick<CrifReport, 'accounts'>,
  loanTypes: readonly string[]
): number {
  const needles = loanTypes.map((t) => t.toLowerCase());
  return report.accounts.filter((account) => {
    if (!account.isActive) return false;
    const accountType = account.accountType.toLowerCase();
    return needles.some((needle) => accountType.includes(needle));
  }).length;
}

export function hasLivePersonalOrBusinessLoan(report: Pick<CrifReport, 'accounts'>): boolean {
  return countActiveLoansByType(report, ['personal loan', 'business loan']) > 0;
}
