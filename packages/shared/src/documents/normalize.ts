/**
 * Parsed Document Normalization
 *
 * Converters and callers may send numeric or null table cells and extra fields.
 * Downstream code sees string cells and only the documented fields.
 */

import type { ParsedDocument, TableCell, TableRow, WireParsedDocument, WireTableRow } from '../types';

/** null cells read as '' */
export function cellText(cell: TableCell): string {
  if (cell === null) return '';
  return typeof cell === 'number' ? String(cell) : cell;
}

/** Rebuild each row in column order with string cells. */
export function normalizeRows(columns: readonly string[], rows: readonly WireTableRow[]): TableRow[] {
  return rows.map((row): TableRow =>
    Object.fromEntries(columns.map((column) => [column, cellText(Object.hasOwn(row, column) ? row[column] : null)]))
  );
}

export function normalizeParsedDocument(doc: WireParsedDocument): ParsedDocument {
  return {
    text: doc.text,
    tables: doc.tables.map((table) => ({
      id: table.id,
      page: table.page,
      columns: [...table.columns],
      rows: normalizeRows(table.columns, table.rows),
    })),
    chunks: doc.chunks.map(({ header, text, page }) => ({ header, text, page })),
  };
}
