/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  withDocumentContext,
  asyncLocalStorage,
  type RequestContext,
  type PipelineName,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  PipelineError,
  InvalidInputError,
  DocumentConversionError,
  UpstreamUnavailableError,
  CacheCorruptionError,
  isPipelineError,
  errorMessage,
  type PipelineErrorCode,
} from './errors';

// Types
export * from './types';

// Parameter specs
export {
  DEFAULT_PARAMETER_SPECS,
  createParameterRegistry,
  defaultParameterRegistry,
  matchesExpectedType,
  validateParameterValue,
  type ExpectedType,
  type ParameterCategory,
  type ParameterSpec,
  type ParameterRegistry,
  type NonNullValue,
} from './parameters/specs';

// Confidence model
export {
  METHOD_WEIGHTS,
  DEFAULT_METHOD_WEIGHT,
  SIMILARITY_BANDS,
  DEFAULT_CONFIDENCE_POLICY,
  getMethodWeight,
  getTypeCertainty,
  getSimilarityBoost,
  isSimilarityBoosted,
  calculateConfidence,
  scoreExtraction,
  calculateOverallConfidence,
  type ConfidencePolicy,
  type SimilarityBand,
} from './confidence';

// CRIF report
export {
  dpdForStatus,
  getWorstDpd,
  hasSuitFiled,
  hasWilfulDefault,
  hasSettlementOrWriteoff,
  countDpdAccounts,
  countActiveLoansByType,
  hasLivePersonalOrBusinessLoan,
  type Account,
  type AccountSummary,
  type CrifReport,
  type PaymentHistoryEntry,
} from './crif/models';
export {
  cleanNumber,
  parseDecimal,
  extractField,
  extractPaymentHistory,
  MONTH_ABBREVIATIONS,
} from './crif/patterns';
export {
  parseCrifReport,
  parseAccountFromText,
  parseAccountsFromSections,
  parseAccountsFromText,
  extractAccountSummaryFromTable,
  extractBureauScoreFromTable,
  extractCreditInquiriesFromTable,
  MIN_BUREAU_SCORE,
  MAX_BUREAU_SCORE,
} from './crif/parser';

// Retrieval
export { prepareChunks, renderTable, MAX_CHUNK_CHARS } from './retrieval/chunks';
export { cosineSimilarity, rankBySimilarity, selectTopMatches, type Ranked } from './retrieval/similarity';
export {
  OpenAiEmbeddingProvider,
  findRelevantChunks,
  ensureChunkEmbeddings,
  embedAll,
  DEFAULT_RETRIEVAL_OPTIONS,
  type EmbeddingProvider,
  type OpenAiEmbeddingOptions,
  type RetrievalOptions,
} from './retrieval/embedding-service';

// RAG
export { parseKnowledgeBase, type KnowledgeChunk } from './rag/knowledge-base';
export {
  KnowledgeRetriever,
  NoopKnowledgeRetriever,
  formatKnowledgeContext,
  MAX_CONTEXT_CHARS_PER_CHUNK,
  type DomainKnowledgeRetriever,
  type KnowledgeMatch,
} from './rag/retriever';

// LLM
export {
  OpenAiTextGenerator,
  NoopTextGenerator,
  type TextGenerator,
  type OpenAiTextGeneratorOptions,
} from './llm/text-generator';

// Parameter extraction
export * from './extractors';

// Sales
export {
  extractSalesRecords,
  extractFilingPeriod,
  findOutwardSuppliesTable,
  matchSalesTable,
  extractTaxableValue,
  cleanCurrency,
  UNKNOWN_MONTH,
  type SalesTableMatch,
  type SalesValue,
} from './sales/gstr3b';

// Parse cache
export { ParseCache, hashDocument, type ParseCacheStats } from './cache/parse-cache';

// Documents
export {
  HttpDocumentConverter,
  type DocumentConverter,
  type HttpDocumentConverterOptions,
} from './documents/converter';
export { DocumentParser } from './documents/parser';
export { parseParameterList } from './documents/parameters';
export { cellText, normalizeParsedDocument } from './documents/normalize';

// Output
export { formatExtractionResponse } from './output';

// Metrics
export {
  register,
  parameterExtractionsCounter,
  extractionDurationHistogram,
  salesExtractionsCounter,
  cacheLookupsCounter,
  embeddingRequestsCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  documentConversionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateParsedDocument,
  validateParseCacheEntry,
  validateParameterList,
  validateExtractionResponse,
  validateExtractRequest,
  validateExtractParsedRequest,
  type ValidationResult,
  type ContractName,
} from './schemas';
