/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export interface Config {
  // HTTP
  port: number;
  maxRequestBody: string;

  // Parse cache
  parseCacheEnabled: boolean;
  parseCacheDir: string;

  // Document conversion
  documentConverterUrl: string;
  documentConverterTimeoutMs: number;

  // Embeddings
  openaiApiKey: string;
  embeddingModel: string;
  embeddingBatchSize: number;
  maxEmbeddingTextLength: number;

  // Retrieval
  similarityThreshold: number;
  topKChunks: number;

  // LLM fallback
  llmModel: string;
  llmRequestTimeoutMs: number;

  // RAG
  enableRag: boolean;
  knowledgeBasePath: string;
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * The knowledge base ships beside the shared sources; compiled output lives under dist/,
 * so the checked-in copy is looked up relative to the working directory as well.
 */
function defaultKnowledgeBasePath(): string {
  const candidates = [
    path.join(__dirname, '../knowledge/domain_knowledge.md'),
    path.join(process.cwd(), 'packages/shared/knowledge/domain_knowledge.md'),
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0];
}

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8090', 10),
  maxRequestBody: process.env.MAX_REQUEST_BODY || '25mb',

  // Parse cache
  parseCacheEnabled: process.env.PARSE_CACHE_ENABLED !== 'false',
  parseCacheDir: process.env.PARSE_CACHE_DIR || path.join(process.cwd(), 'parse-cache'),

  // Document conversion
  documentConverterUrl: process.env.DOCUMENT_CONVERTER_URL || 'http://document-converter:9100',
  documentConverterTimeoutMs: parseInt(process.env.DOCUMENT_CONVERTER_TIMEOUT_MS || '300000', 10),

  // Embeddings
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
  embeddingBatchSize: parseInt(process.env.EMBEDDING_BATCH_SIZE || '32', 10),
  maxEmbeddingTextLength: parseInt(process.env.MAX_EMBEDDING_TEXT_LENGTH || '1600', 10),

  // Retrieval
  similarityThreshold: parseNumber(process.env.SIMILARITY_THRESHOLD, 0.5),
  topKChunks: parseInt(process.env.TOP_K_CHUNKS || '3', 10),

  // LLM fallback
  llmModel: process.env.LLM_MODEL || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),

  // RAG
  enableRag: process.env.ENABLE_RAG === 'true',
  knowledgeBasePath: process.env.KNOWLEDGE_BASE_PATH || defaultKnowledgeBasePath(),
};
