/**
 * Chunk Preparer
 *
 * Splits a parsed document into retrieval candidates: one chunk per table and one per
 * text section, each head-truncated to MAX_CHUNK_CHARS.
 */

import type { DocumentChunk, ParsedDocument, ParsedTable } from '../types';
import { logger } from '../logger';

/** Character ceiling per chunk, below the embedding capability's input limit */
export const MAX_CHUNK_CHARS = 1500;

/**
 * Render a table as pipe-separated text: header line, then one line per row.
 */
export function renderTable(table: ParsedTable): string {
  const lines = [table.columns.join(' | ')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => row[column] ?? '').join(' | '));
  }
  return lines.join('\n');
}

function truncate(content: string, label: string): string {
  if (content.length <= MAX_CHUNK_CHARS) {
    return content;
  }
  logger.debug('Truncated chunk content', {
    chunk_source: label,
    original_length: content.length,
    max_length: MAX_CHUNK_CHARS,
  });
  return content.slice(0, MAX_CHUNK_CHARS);
}

export function prepareChunks(doc: Pick<ParsedDocument, 'tables' | 'chunks'>): DocumentChunk[] {
  const chunks: DocumentChunk[] = [];

  doc.tables.forEach((table, index) => {
    const source = `Table ${index + 1}`;
    chunks.push({
      type: 'table',
      index,
      content: truncate(renderTable(table), source),
      source,
      data: table,
    });
  });

  doc.chunks.forEach((section, index) => {
    const source = `Text Chunk ${index + 1}`;
    chunks.push({
      type: 'text',
      index,
      content: truncate(section.text, source),
      source,
      data: section,
    });
  });

  logger.debug('Prepared document chunks', {
    table_chunks: doc.tables.length,
    text_chunks: doc.chunks.length,
  });

  return chunks;
}
