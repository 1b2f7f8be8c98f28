/**
 * Bureau Parameter Rules
 *
 * Lookup table from parameter id to the field accessor, flag predicate or
 * aggregate that answers it.
 */

import {
  countDpdAccounts,
  hasLivePersonalOrBusinessLoan,
  hasSettlementOrWriteoff,
  hasSuitFiled,
  hasWilfulDefault,
  type Account,
  type AccountSummary,
} from '../crif/models';
import {
  extractAccountSummaryFromTable,
  extractBureauScoreFromTable,
  extractCreditInquiriesFromTable,
} from '../crif/parser';
import type { ParsedTable } from '../types';
import type { DerivedRule, DirectRule, FlagRule, ParameterRule, ParameterRuleTable } from './types';

const ACCOUNT_SUMMARY_TABLE = 'Account Summary Table';

function summaryField(field: keyof AccountSummary): DirectRule {
  const read = (summary: AccountSummary | null): number | null => (summary ? summary[field] : null);
  return {
    kind: 'direct',
    tableLabel: ACCOUNT_SUMMARY_TABLE,
    fromTable: (table: ParsedTable) => read(extractAccountSummaryFromTable(table)),
    fromReport: (report) => read(report.summary),
  };
}

function accountFlag(predicate: (account: Account) => boolean): FlagRule {
  return {
    kind: 'flag',
    accountPredicate: predicate,
    fromReport: (report) => {
      const matched = report.accounts.filter(predicate).length;
      return {
        value: matched > 0,
        source: `Account Remarks (${matched}/${report.accounts.length} accounts)`,
      };
    },
  };
}

function dpdCount(threshold: number): DerivedRule {
  return { kind: 'derived', compute: (report) => countDpdAccounts(report, threshold) };
}

export const BUREAU_RULES: ParameterRuleTable = new Map<string, ParameterRule>([
  [
    'bureau_credit_score',
    {
      kind: 'direct',
      tableLabel: 'Verification Table',
      fromTable: extractBureauScoreFromTable,
      fromReport: (report) => report.bureauScore,
    },
  ],
  ['bureau_written_off_debt_amount', summaryField('totalWriteoffAmount')],
  ['bureau_max_loans', summaryField('totalAccounts')],
  ['bureau_max_active_loans', summaryField('activeAccounts')],
  [
    'bureau_credit_inquiries',
    {
      kind: 'direct',
      tableLabel: 'Inquiry Table',
      fromTable: extractCreditInquiriesFromTable,
      fromReport: (report) => report.creditInquiriesCount,
    },
  ],
  ['bureau_suit_filed', accountFlag(hasSuitFiled)],
  ['bureau_wilful_default', accountFlag(hasWilfulDefault)],
  ['bureau_settlement_writeoff', accountFlag(hasSettlementOrWriteoff)],
  [
    // New-to-credit: no accounts on file at all
    'bureau_ntc_accepted',
    {
      kind: 'flag',
      accountPredicate: null,
      fromReport: (report) => ({
        value: report.accounts.length === 0,
        source: `Account Information (${report.accounts.length} accounts)`,
      }),
    },
  ],
  ['bureau_dpd_30', dpdCount(30)],
  ['bureau_dpd_60', dpdCount(60)],
  ['bureau_dpd_90', dpdCount(90)],
  ['bureau_no_live_pl_bl', { kind: 'derived', compute: (report) => !hasLivePersonalOrBusinessLoan(report) }],
]);
