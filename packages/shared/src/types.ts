/**
 * Shared TypeScript Types
 *
 * Types for the parameter extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Parsed Documents (document conversion output)
// ============================================================================

/** One table row as an ordered field map keyed by column name. */
export type TableRow = Record<string, string>;

/** A cell as converters and callers may send it; normalized to a string on ingestion. */
export type TableCell = string | number | null;

export type WireTableRow = Record<string, TableCell>;

export interface ParsedTable {
  id: number;
  /** Page the table starts on, -1 when the converter could not tell */
  page: number;
  columns: string[];
  rows: TableRow[];
}

export interface TextSection {
  header: string;
  text: string;
  page: number;
}

export interface ParsedDocument {
  text: string;
  tables: ParsedTable[];
  chunks: TextSection[];
  /**
   * Retrieval chunks with their embeddings, attached explicitly by a caller that
   * wants to reuse vectors across repeated extractions of the same document.
   */
  embeddedChunks?: DocumentChunk[];
}

export interface WireParsedTable {
  id: number;
  page: number;
  columns: string[];
  rows: WireTableRow[];
}

/** A parsed document as received from the converter or a caller (parsed_document.schema.json). */
export interface WireParsedDocument {
  text: string;
  tables: WireParsedTable[];
  chunks: TextSection[];
}

// ============================================================================
// Parse Cache Entries (parse_cache_entry.schema.json)
// ============================================================================

/** Disk form of a table: rows stored as `content` beside an explicit column list. */
export interface CachedTable {
  id: number;
  page: number;
  columns: string[];
  content: WireTableRow[];
}

export interface ParseCacheMetadata {
  source_file: string;
  cached_at: string;
  file_hash: string;
  file_size_bytes: number;
}

export interface ParseCacheEntry {
  metadata: ParseCacheMetadata;
  data: {
    text: string;
    chunks: TextSection[];
    tables: CachedTable[];
  };
}

// ============================================================================
// Retrieval Chunks
// ============================================================================

interface ChunkBase {
  index: number;
  /** Text handed to the embedding capability, capped in length */
  content: string;
  /** Human-readable provenance label, e.g. "Table 3" */
  source: string;
  embedding?: number[];
}

export interface TableChunk extends ChunkBase {
  type: 'table';
  data: ParsedTable;
}

export interface TextChunk extends ChunkBase {
  type: 'text';
  data: TextSection;
}

export type DocumentChunk = TableChunk | TextChunk;

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;
}

// ============================================================================
// Extraction Results
// ============================================================================

export type ExtractionStatus = 'extracted' | 'not_found' | 'not_applicable' | 'extraction_failed';

export type ExtractionMethod = 'chunk_scoped' | 'full_report' | 'computed' | 'llm_with_rag';

export type ParameterValue = number | boolean | string | null;

export interface ExtractionResult {
  value: ParameterValue;
  source: string;
  confidence: number;
  status: ExtractionStatus;
  similarity_score?: number;
  extraction_method?: ExtractionMethod;
  rag_context?: string;
  error?: string;
}

export interface SalesRecord {
  month: string;
  sales: number | null;
  source: string;
  confidence: number;
  status: ExtractionStatus;
}

// ============================================================================
// API Contracts
// ============================================================================

/** A parameter requested by the caller (one row of the parameter file). */
export interface ParameterRequest {
  id: string;
  name: string;
  description: string;
}

/** A document uploaded inline, base64 encoded. */
export interface UploadedDocument {
  filename: string;
  content_base64: string;
}

export interface ExtractRequestBody {
  bureau_document: UploadedDocument;
  gst_document: UploadedDocument;
  /** Inline list, or the same list JSON-encoded */
  parameters: ParameterRequest[] | string;
}

export interface ExtractParsedRequestBody {
  bureau_document: WireParsedDocument;
  gst_document: WireParsedDocument;
  parameters: ParameterRequest[] | string;
}

export interface ExtractionResponse {
  bureau_parameters: Record<string, ExtractionResult>;
  gst_sales: SalesRecord[];
  overall_confidence_score: number;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: string[];
  };
}
