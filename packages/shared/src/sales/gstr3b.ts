/**
 * GSTR-3B Sales Extractor
 *
 * Reads the filing period from the return header and the total taxable value of
 * outward supplies from Table 3.1. Produces exactly one sales record per return.
 *
 * Table 3.1 is printed as:
 * Nature of Supplies | Total Taxable Value | Integrated Tax | Central Tax | State/UT Tax | Cess
 * (a) Outward taxable supplies (other than zero rated, nil rated and exempted) | 9,51,381.00 | ...
 */

import { logger } from '../logger';
import { salesExtractionsCounter } from '../metrics';
import { parseDecimal } from '../crif/patterns';
import type { ParsedDocument, ParsedTable, SalesRecord } from '../types';

export const UNKNOWN_MONTH = 'Unknown Month';

/** Lines scanned for the filing period */
const HEADER_LINE_COUNT = 20;

const MONTH_LABEL_PATTERN = /\b(?:Month|Period)\b\s*[:-]?\s*([A-Za-z]+)/i;
const YEAR_LABEL_PATTERN = /\b(?:Year|Financial Year)\b\s*[:-]?\s*(\d{4}(?:-\d{2,4})?)/i;
const MONTH_YEAR_PATTERN =
  /\b(January|February|March|April|May|June|July|August|September|October|November|December)\s*20\d{2}\b/;

const VALUE_ROW_MARKERS = ['(a)', 'outward taxable supplies'];

export interface SalesTableMatch {
  table: ParsedTable;
  strength: 'strong' | 'weak';
}

export interface SalesValue {
  value: number;
  source: string;
}

/**
 * Filing period as "<Month> <Year>". A financial-year range keeps only its first year.
 */
export function extractFilingPeriod(text: string): string {
  const header = text.split('\n').slice(0, HEADER_LINE_COUNT).join('\n');

  const monthMatch = header.match(MONTH_LABEL_PATTERN);
  const yearMatch = header.match(YEAR_LABEL_PATTERN);
  if (monthMatch && yearMatch) {
    const year = yearMatch[1].split('-')[0];
    return `${monthMatch[1]} ${year}`;
  }

  const monthYear = header.match(MONTH_YEAR_PATTERN);
  if (monthYear) {
    return monthYear[0];
  }

  return UNKNOWN_MONTH;
}

function renderForSearch(table: ParsedTable): string {
  const cells = table.rows.flatMap((row) => table.columns.map((column) => row[column] ?? ''));
  return [...table.columns, ...cells].join(' ').toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Two-tier signature: integrated + central + taxable columns (strong), else
 * "3.1" with "outward" or "supplies" anywhere in the table (weak).
 */
export function matchSalesTable(table: ParsedTable): SalesTableMatch | null {
  const columns = table.columns.map((c) => c.toLowerCase());
  const hasTaxColumns = columns.some((c) => c.includes('integrated')) && columns.some((c) => c.includes('central'));
  const hasTaxable = columns.some((c) => c.includes('taxable'));

  if (hasTaxColumns && hasTaxable) {
    return { table, strength: 'strong' };
  }

  const rendered = renderForSearch(table);
  if (rendered.includes('3.1') && (rendered.includes('outward') || rendered.includes('supplies'))) {
    return { table, strength: 'weak' };
  }

  return null;
}

/**
 * First table matching either signature tier, in document order.
 */
export function findOutwardSuppliesTable(tables: readonly ParsedTable[]): SalesTableMatch | null {
  for (const table of tables) {
    const match = matchSalesTable(table);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Strip everything but digits and dots, then parse. Unparsable → 0.
 */
export function cleanCurrency(raw: string): number {
  return parseDecimal(raw.replace(/[^\d.]/g, '')) ?? 0;
}

function taxableValueColumn(table: ParsedTable): string | undefined {
  const named = table.columns.find((c) => {
    const lower = c.toLowerCase();
    return lower.includes('taxable') && lower.includes('value');
  });
  if (named !== undefined) {
    return named;
  }
  return table.columns.length > 1 ? table.columns[1] : table.columns[table.columns.length - 1];
}

/**
 * Read the taxable value from the outward taxable supplies row.
 */
export function extractTaxableValue(table: ParsedTable): SalesValue | null {
  const column = taxableValueColumn(table);
  if (column === undefined) {
    return null;
  }

  for (const row of table.rows) {
    const rowText = table.columns.map((c) => row[c] ?? '').join(' ').toLowerCase();
    if (VALUE_ROW_MARKERS.some((marker) => rowText.includes(marker))) {
      return {
        value: cleanCurrency(row[column] ?? ''),
        source: `GSTR-3B Table 3.1 (Page ${table.page})`,
      };
    }
  }

  return null;
}

export function extractSalesRecords(doc: Pick<ParsedDocument, 'text' | 'tables'>): SalesRecord[] {
  const month = extractFilingPeriod(doc.text);
  const match = findOutwardSuppliesTable(doc.tables);
  const sales = match ? extractTaxableValue(match.table) : null;

  if (!sales) {
    logger.warn('GSTR-3B Table 3.1 not found', { month, table_count: doc.tables.length });
    salesExtractionsCounter.inc({ status: 'not_found' });
    return [
      {
        month,
        sales: null,
        source: 'GSTR-3B Table 3.1 not found',
        confidence: 0,
        status: 'not_found',
      },
    ];
  }

  logger.info('GSTR-3B sales extracted', { month, match_strength: match?.strength, source: sales.source });
  salesExtractionsCounter.inc({ status: 'extracted' });

  return [
    {
      month,
      sales: sales.value,
      source: sales.source,
      confidence: 1,
      status: 'extracted',
    },
  ];
}
