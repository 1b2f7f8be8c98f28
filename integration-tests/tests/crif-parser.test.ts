/**
 * CRIF Report Parser Tests
 */

import {
  cleanNumber,
  countDpdAccounts,
  dpdForStatus,
  extractBureauScoreFromTable,
  extractCreditInquiriesFromTable,
  extractField,
  extractPaymentHistory,
  getWorstDpd,
  hasLivePersonalOrBusinessLoan,
  hasSettlementOrWriteoff,
  hasSuitFiled,
  hasWilfulDefault,
  parseAccountsFromText,
  parseCrifReport,
  type CrifReport,
  validateParsedDocument,
  type ParsedTable,
} from '@risklens/shared';
import { loadParsedDocument } from './helpers';

describe('CRIF report parsing', () => {
  let report: CrifReport;

  beforeAll(() => {
    report = parseCrifReport(loadParsedDocument('crif_report'));
  });

  it('should read the bureau score from the verification table', () => {
    expect(report.bureauScore).toBe(742);
  });

  it('should read the account summary from the first summary row', () => {
    expect(report.summary).toEqual({
      totalAccounts: 3,
      activeAccounts: 2,
      totalCurrentBalance: 245000,
      totalOverdueAmount: 12500,
      totalWriteoffAmount: 0,
    });
  });

  it('should count one inquiry per enquiry row', () => {
    expect(report.creditInquiriesCount).toBe(4);
  });

  it('should parse one account per account section', () => {
    expect(report.accounts).toHaveLength(3);
    expect(report.accounts[0]).toEqual({
      accountType: 'Personal Loan',
      ownership: 'Individual',
      isActive: true,
      isSecured: false,
      currentBalance: 125000,
      overdueAmount: 12500,
      sanctionedAmount: 200000,
      paymentHistory: [
        { month: 'Jan', status: '000' },
        { month: 'Feb', status: '030' },
        { month: 'Mar', status: '060' },
      ],
      remarks: 'Suit Filed',
    });
  });

  it('should mark closed accounts inactive', () => {
    expect(report.accounts[2].isActive).toBe(false);
    expect(report.accounts[2].paymentHistory).toEqual([
      { month: 'Jan', status: '090' },
      { month: 'Feb', status: 'XXX' },
    ]);
  });

  it('should leave score, summary and inquiries null when their tables are missing', () => {
    const empty = parseCrifReport({ tables: [], chunks: [] });
    expect(empty).toEqual({ accounts: [], bureauScore: null, summary: null, creditInquiriesCount: null });
  });
});

describe('Account flags and DPD', () => {
  let report: CrifReport;

  beforeAll(() => {
    report = parseCrifReport(loadParsedDocument('crif_report'));
  });

  it('should count accounts at or beyond each DPD bucket', () => {
    expect(countDpdAccounts(report, 30)).toBe(2);
    expect(countDpdAccounts(report, 60)).toBe(2);
    expect(countDpdAccounts(report, 90)).toBe(1);
  });

  it('should take the worst status of an account history', () => {
    expect(report.accounts.map(getWorstDpd)).toEqual([60, 0, 90]);
  });

  it('should evaluate remark flags per account', () => {
    expect(report.accounts.map(hasSuitFiled)).toEqual([true, false, false]);
    expect(report.accounts.map(hasWilfulDefault)).toEqual([false, false, false]);
    expect(report.accounts.map(hasSettlementOrWriteoff)).toEqual([false, false, true]);
  });

  it('should detect a live personal loan', () => {
    expect(hasLivePersonalOrBusinessLoan(report)).toBe(true);
    expect(hasLivePersonalOrBusinessLoan({ accounts: report.accounts.slice(1) })).toBe(false);
  });

  it.each([
    ['000', 0],
    ['STD', 0],
    ['030', 30],
    ['060', 60],
    ['090/SUB', 90],
    ['SUB', 90],
    ['DBT', 120],
    ['150', 180],
    ['LSS', 180],
    ['-', 0],
    ['45 days', 45],
    ['XXX', 0],
  ])('should map status %s to %s days past due', (status, days) => {
    expect(dpdForStatus(status)).toBe(days);
  });
});

describe('Field scanners', () => {
  it.each([
    ['1,25,000', 125000],
    ['₹ 4,500.50', 4500.5],
    ['Rs 300', 300],
    ['N/A', 0],
    ['', 0],
  ])('should clean %s to %s', (raw, expected) => {
    expect(cleanNumber(raw)).toBe(expected);
  });

  it('should clean null to 0', () => {
    expect(cleanNumber(null)).toBe(0);
  });

  it('should skip label lines without a colon', () => {
    expect(extractField(['Account Type Personal', 'Account Type: Home Loan'], 'Account Type')).toBe('Home Loan');
    expect(extractField(['Ownership: Joint'], 'Account Type')).toBe('');
  });

  it('should not read a month out of a longer word', () => {
    expect(extractPaymentHistory('Account Remarks: Clean\nMar: 030')).toEqual([{ month: 'Mar', status: '030' }]);
  });

  it('should accept dash separators in the payment grid', () => {
    expect(extractPaymentHistory('Jan-STD Feb 000')).toEqual([
      { month: 'Jan', status: 'STD' },
      { month: 'Feb', status: '000' },
    ]);
  });

  it('should split account blocks and drop blocks without an account type', () => {
    const text = [
      'Accounts in this section',
      'Account Number: A1',
      'Account Type: Personal Loan',
      'Account Status: Active',
      'Account Remarks: Wilful Default',
      'Account Number: A2',
      'Ownership: Joint',
    ].join('\n');

    const accounts = parseAccountsFromText(text);
    expect(accounts).toHaveLength(1);
    expect(accounts[0].remarks).toBe('Wilful Default');
    expect(hasWilfulDefault(accounts[0])).toBe(true);
  });
});

describe('Table extractors', () => {
  const scoreTable = (rows: Record<string, string>[]): ParsedTable => ({
    id: 0,
    page: 1,
    columns: ['Requested Service', 'Score'],
    rows,
  });

  it('should ignore scores outside 300-900', () => {
    expect(extractBureauScoreFromTable(scoreTable([{ 'Requested Service': 'CRIF HM SCORE', Score: '950' }]))).toBeNull();
    expect(extractBureauScoreFromTable(scoreTable([{ 'Requested Service': 'CRIF HM SCORE', Score: 'NH' }]))).toBeNull();
  });

  it('should skip rows for services other than the score', () => {
    const table = scoreTable([
      { 'Requested Service': 'VERIFICATION', Score: '500' },
      { 'Requested Service': 'crif hm score', Score: '701' },
    ]);
    expect(extractBureauScoreFromTable(table)).toBe(701);
  });

  it('should read an explicit enquiry count', () => {
    const table: ParsedTable = {
      id: 4,
      page: 2,
      columns: ['Number of Enquiries', 'Last 30 Days'],
      rows: [
        { 'Number of Enquiries': '', 'Last 30 Days': '1' },
        { 'Number of Enquiries': '7', 'Last 30 Days': '2' },
      ],
    };
    expect(extractCreditInquiriesFromTable(table)).toBe(7);
  });

  it('should read a summary table sent with numeric cells', () => {
    const validation = validateParsedDocument({
      text: '',
      chunks: [],
      tables: [
        {
          id: 2,
          page: 1,
          columns: ['Number of Accounts', 'Active Accounts', 'Total Writeoff Amt'],
          rows: [{ 'Number of Accounts': 54, 'Active Accounts': 25, 'Total Writeoff Amt': 0 }],
        },
      ],
    });
    if (!validation.valid) {
      throw new Error(validation.errors.join('; '));
    }

    expect(validation.value.tables[0].rows[0]).toEqual({
      'Number of Accounts': '54',
      'Active Accounts': '25',
      'Total Writeoff Amt': '0',
    });
    expect(parseCrifReport(validation.value).summary).toEqual({
      totalAccounts: 54,
      activeAccounts: 25,
      totalCurrentBalance: 0,
      totalOverdueAmount: 0,
      totalWriteoffAmount: 0,
    });
  });

  it('should read null cells as empty', () => {
    const validation = validateParsedDocument({
      text: '',
      chunks: [],
      tables: [{ id: 0, page: 1, columns: ['Requested Service', 'Score'], rows: [{ 'Requested Service': 'CRIF HM SCORE', Score: null }] }],
    });
    expect(validation.valid && validation.value.tables[0].rows[0].Score).toBe('');
  });

  it('should return null for an empty table', () => {
    expect(extractCreditInquiriesFromTable({ id: 0, page: 1, columns: ['Enquiry Purpose'], rows: [] })).toBeNull();
  });
});
